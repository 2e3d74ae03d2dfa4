"use client";

import type { BatchProgress } from "@/lib/types";
import { formatDuration, formatRate } from "@/lib/format";

interface ProgressBarProps {
  progress: BatchProgress;
}

export function ProgressBar({ progress }: ProgressBarProps) {
  const fraction = progress.total > 0 ? progress.completed / progress.total : 0;
  const percentage = Math.round(fraction * 100);
  const color = progress.failed > 0 ? "bg-amber-500" : "bg-blue-500";

  return (
    <div className="space-y-1.5">
      <div className="h-3 bg-gray-700 rounded-full overflow-hidden">
        <div
          className={`h-3 ${color} rounded-full transition-all`}
          style={{ width: `${percentage}%` }}
        />
      </div>
      <div className="flex flex-wrap gap-x-4 text-xs text-gray-400">
        <span className="text-gray-200">
          {progress.completed}/{progress.total} ({percentage}%)
        </span>
        {progress.failed > 0 && <span className="text-amber-400">{progress.failed} failed</span>}
        <span>{formatRate(progress.ratePerSecond)}</span>
        <span>Elapsed {formatDuration(progress.elapsedMs)}</span>
        <span>Remaining {formatDuration(progress.etaMs)}</span>
      </div>
    </div>
  );
}
