"use client";

import { useState } from "react";
import { BatchUpload } from "@/components/BatchUpload";
import { LookupForm } from "@/components/LookupForm";

type Tab = "lookup" | "batch";

const TABS: { key: Tab; label: string }[] = [
  { key: "lookup", label: "Single Lookup" },
  { key: "batch", label: "Batch Enrichment" },
];

export default function Home() {
  const [tab, setTab] = useState<Tab>("lookup");

  return (
    <div className="min-h-screen p-4 md:p-8 max-w-[1400px] mx-auto">
      <header className="mb-6">
        <h1 className="text-2xl font-bold mb-1">Property Enrichment Dashboard</h1>
        <p className="text-gray-400 text-sm">
          Look up a single property or enrich an address list with valuation data
        </p>
      </header>

      <div className="flex items-center gap-2 mb-6">
        {TABS.map((t) => (
          <button
            key={t.key}
            onClick={() => setTab(t.key)}
            className={`px-3 py-1 rounded-full text-xs font-medium transition-colors ${
              tab === t.key
                ? "bg-blue-600 text-white"
                : "bg-gray-800 text-gray-300 hover:bg-gray-700"
            }`}
          >
            {t.label}
          </button>
        ))}
      </div>

      {tab === "lookup" ? <LookupForm /> : <BatchUpload />}
    </div>
  );
}
