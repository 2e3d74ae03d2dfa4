"use client";

import type { BatchResponse } from "@/lib/batch/stream";
import { formatCell } from "@/lib/format";

interface ResultTableProps {
  result: BatchResponse;
}

export function ResultTable({ result }: ResultTableProps) {
  const failed = new Set(result.failedRows);

  if (result.rows.length === 0) {
    return <div className="text-center text-gray-500 py-12">No rows in this batch.</div>;
  }

  return (
    <div className="overflow-x-auto">
      <table className="w-full text-sm">
        <thead className="sticky top-0 bg-gray-900 z-10">
          <tr className="border-b border-gray-800">
            <th className="px-3 py-2 text-left text-xs font-medium text-gray-400 uppercase tracking-wider w-8">
              #
            </th>
            {result.columns.map((column) => (
              <th
                key={column}
                className="px-3 py-2 text-left text-xs font-medium text-gray-400 uppercase tracking-wider"
              >
                {column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {result.rows.map((row, idx) => (
            <tr
              key={idx}
              title={result.errors[idx]}
              className={`border-b border-gray-800/50 hover:bg-gray-800/50 transition-colors ${
                failed.has(idx) ? "bg-red-950/30 text-red-300" : ""
              }`}
            >
              <td className="px-3 py-2 text-gray-500">{idx + 1}</td>
              {row.map((cell, i) => (
                <td key={i} className="px-3 py-2 text-gray-300 whitespace-nowrap">
                  {formatCell(cell)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
