"use client";

import { ReportKind } from "@/lib/types";
import { REPORT_KINDS, getReportLabel, parseReportKind } from "@/lib/valuation/reports";

interface ReportKindSelectProps {
  value: ReportKind;
  onChange: (kind: ReportKind) => void;
  disabled?: boolean;
}

export function ReportKindSelect({ value, onChange, disabled }: ReportKindSelectProps) {
  return (
    <div>
      <label className="block text-xs text-gray-400 mb-1">Report Type</label>
      <select
        value={value}
        disabled={disabled}
        onChange={(e) => onChange(parseReportKind(e.target.value) ?? ReportKind.FULL)}
        className="bg-gray-800 border border-gray-700 rounded px-2 py-1.5 text-sm text-gray-200 focus:outline-none focus:border-blue-500"
      >
        {REPORT_KINDS.map((kind) => (
          <option key={kind} value={kind}>
            {getReportLabel(kind)}
          </option>
        ))}
      </select>
    </div>
  );
}
