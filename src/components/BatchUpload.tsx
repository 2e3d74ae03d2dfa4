"use client";

import { useState } from "react";
import { ProgressBar } from "./ProgressBar";
import { ReportKindSelect } from "./ReportKindSelect";
import { ResultTable } from "./ResultTable";
import { StreamEventDecoder, type BatchResponse, type BatchStreamEvent } from "@/lib/batch/stream";
import { downloadText } from "@/lib/download";
import { formatDuration } from "@/lib/format";
import { ReportKind, type BatchProgress } from "@/lib/types";
import { isRecord } from "@/lib/valuation/normalize";

const MIN_CONCURRENCY = 1;
const MAX_CONCURRENCY = 10;
const DEFAULT_CONCURRENCY = 5;

export function BatchUpload() {
  const [file, setFile] = useState<File | null>(null);
  const [kind, setKind] = useState<ReportKind>(ReportKind.FULL);
  const [concurrency, setConcurrency] = useState(DEFAULT_CONCURRENCY);
  const [running, setRunning] = useState(false);
  const [progress, setProgress] = useState<BatchProgress | null>(null);
  const [result, setResult] = useState<BatchResponse | null>(null);
  const [error, setError] = useState<string | null>(null);

  const handleEvent = (event: BatchStreamEvent) => {
    switch (event.type) {
      case "progress":
        setProgress(event.progress);
        break;
      case "result":
        setResult(event.result);
        break;
      case "error":
        setError(event.error);
        break;
    }
  };

  const handleRun = async () => {
    if (!file) return;
    setRunning(true);
    setError(null);
    setResult(null);
    setProgress(null);

    const form = new FormData();
    form.set("file", file);
    form.set("reportKind", kind);
    form.set("concurrency", String(concurrency));

    try {
      const res = await fetch("/api/batch", { method: "POST", body: form });

      if (!res.ok || !res.body) {
        const data: unknown = await res.json().catch(() => null);
        setError(isRecord(data) && typeof data.error === "string" ? data.error : "Batch failed");
        return;
      }

      const reader = res.body.getReader();
      const text = new TextDecoder();
      const decoder = new StreamEventDecoder();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        decoder.push(text.decode(value, { stream: true })).forEach(handleEvent);
      }
      decoder.flush().forEach(handleEvent);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Batch failed");
    } finally {
      setRunning(false);
    }
  };

  const errorEntries = result ? Object.entries(result.errors) : [];

  return (
    <section className="space-y-4">
      <div className="flex flex-wrap items-end gap-3">
        <div>
          <label className="block text-xs text-gray-400 mb-1">Address File (CSV or XLSX)</label>
          <input
            type="file"
            accept=".csv,.xlsx,.xls"
            disabled={running}
            onChange={(e) => setFile(e.target.files?.[0] ?? null)}
            className="text-sm text-gray-300 file:mr-3 file:bg-gray-700 file:border-0 file:rounded file:px-3 file:py-1.5 file:text-gray-200"
          />
        </div>
        <ReportKindSelect value={kind} onChange={setKind} disabled={running} />
        <div>
          <label className="block text-xs text-gray-400 mb-1">
            Parallel Requests: {concurrency}
          </label>
          <input
            type="range"
            min={MIN_CONCURRENCY}
            max={MAX_CONCURRENCY}
            value={concurrency}
            disabled={running}
            onChange={(e) => setConcurrency(Number(e.target.value))}
            className="w-40"
          />
        </div>
        <button
          onClick={handleRun}
          disabled={running || !file}
          className="bg-blue-600 hover:bg-blue-500 disabled:bg-blue-800 disabled:text-gray-400 text-white px-4 py-2 rounded text-sm font-medium transition-colors"
        >
          {running ? "Enriching..." : "Run Batch"}
        </button>
      </div>

      {error && (
        <div className="p-3 bg-red-900/30 border border-red-800 rounded text-red-300 text-sm">
          {error}
        </div>
      )}

      {progress && <ProgressBar progress={progress} />}

      {result && (
        <div className="space-y-3">
          <div className="flex flex-wrap items-center gap-3">
            <span className="text-sm text-gray-300">
              {result.label} &middot; {result.summary.succeeded} succeeded &middot;{" "}
              {result.summary.failed} failed &middot; {formatDuration(result.summary.durationMs)}
            </span>
            <button
              onClick={() => downloadText(result.csv, result.fileName)}
              className="bg-gray-700 hover:bg-gray-600 text-white px-4 py-2 rounded text-sm font-medium transition-colors ml-auto"
            >
              Download CSV
            </button>
          </div>

          {errorEntries.length > 0 && (
            <details className="text-xs text-amber-300">
              <summary className="cursor-pointer">
                {errorEntries.length} row(s) could not be enriched
              </summary>
              <ul className="mt-2 space-y-0.5">
                {errorEntries.map(([index, message]) => (
                  <li key={index}>
                    Row {Number(index) + 1}: {message}
                  </li>
                ))}
              </ul>
            </details>
          )}

          <ResultTable result={result} />
        </div>
      )}
    </section>
  );
}
