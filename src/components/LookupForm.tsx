"use client";

import { useState } from "react";
import { ReportKindSelect } from "./ReportKindSelect";
import { isLookupResponse, type AddressInput, type LookupResponse } from "@/lib/lookup";
import { formatCell } from "@/lib/format";
import { ReportKind } from "@/lib/types";
import { isRecord } from "@/lib/valuation/normalize";

const EMPTY_ADDRESS: AddressInput = { address: "", city: "", state: "", zip: "" };

const FIELDS: { key: keyof AddressInput; label: string; placeholder: string }[] = [
  { key: "address", label: "Street Address", placeholder: "123 Main St" },
  { key: "city", label: "City", placeholder: "Springfield" },
  { key: "state", label: "State", placeholder: "IL" },
  { key: "zip", label: "Zip", placeholder: "62701" },
];

export function LookupForm() {
  const [input, setInput] = useState<AddressInput>(EMPTY_ADDRESS);
  const [kind, setKind] = useState<ReportKind>(ReportKind.FULL);
  const [result, setResult] = useState<LookupResponse | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const canSubmit = !loading && input.address.trim() !== "" && input.city.trim() !== "";

  const handleLookup = async () => {
    setLoading(true);
    setError(null);
    try {
      const res = await fetch("/api/lookup", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ ...input, reportKind: kind }),
      });
      const data: unknown = await res.json();

      if (!res.ok || !isLookupResponse(data)) {
        setResult(null);
        setError(isRecord(data) && typeof data.error === "string" ? data.error : "Lookup failed");
        return;
      }

      setResult(data);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Lookup failed");
    } finally {
      setLoading(false);
    }
  };

  return (
    <section className="space-y-4">
      <div className="flex flex-wrap items-end gap-3">
        {FIELDS.map((field) => (
          <div key={field.key}>
            <label className="block text-xs text-gray-400 mb-1">{field.label}</label>
            <input
              type="text"
              value={input[field.key]}
              placeholder={field.placeholder}
              onChange={(e) => setInput({ ...input, [field.key]: e.target.value })}
              className="bg-gray-800 border border-gray-700 rounded px-2 py-1.5 text-sm text-gray-200 focus:outline-none focus:border-blue-500"
            />
          </div>
        ))}
        <ReportKindSelect value={kind} onChange={setKind} disabled={loading} />
        <button
          onClick={handleLookup}
          disabled={!canSubmit}
          className="bg-blue-600 hover:bg-blue-500 disabled:bg-blue-800 disabled:text-gray-400 text-white px-4 py-2 rounded text-sm font-medium transition-colors"
        >
          {loading ? "Looking up..." : "Look Up"}
        </button>
      </div>

      {error && (
        <div className="p-3 bg-red-900/30 border border-red-800 rounded text-red-300 text-sm">
          {error}
        </div>
      )}

      {result && (
        <div className="space-y-3">
          <h2 className="text-sm font-medium text-gray-300">{result.label}</h2>
          <div className="grid grid-cols-2 md:grid-cols-4 gap-3">
            {result.columns.map((column, i) => {
              const value = result.cells[i] ?? null;
              const isLink = typeof value === "string" && /^https?:\/\//.test(value);
              return (
                <div key={column} className="bg-gray-900 border border-gray-800 rounded p-3">
                  <div className="text-xs text-gray-400 uppercase tracking-wider">{column}</div>
                  {isLink ? (
                    <a
                      href={value}
                      target="_blank"
                      rel="noopener noreferrer"
                      className="text-sm text-blue-400 hover:text-blue-300"
                    >
                      Open PDF
                    </a>
                  ) : (
                    <div className="text-lg font-semibold">{formatCell(value)}</div>
                  )}
                </div>
              );
            })}
          </div>
          <details className="text-xs text-gray-400">
            <summary className="cursor-pointer hover:text-gray-200">Raw response</summary>
            <pre className="mt-2 p-3 bg-gray-900 rounded overflow-x-auto">
              {JSON.stringify(result.raw, null, 2)}
            </pre>
          </details>
        </div>
      )}
    </section>
  );
}
