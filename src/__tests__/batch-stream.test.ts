import { describe, it, expect, vi } from "vitest";
import { encodeStreamEvent, StreamEventDecoder, type BatchStreamEvent } from "../lib/batch/stream";
import { toBatchResponse } from "../lib/batch/response";
import { runBatch } from "../lib/batch/orchestrator";
import { parseDataset } from "../lib/dataset";
import { ReportKind } from "../lib/types";
import type { ValuationClient } from "../lib/valuation/client";

const PROGRESS: BatchStreamEvent = {
  type: "progress",
  progress: { completed: 1, failed: 0, total: 2, elapsedMs: 500, ratePerSecond: 2, etaMs: 500 },
};

describe("StreamEventDecoder", () => {
  it("decodes events split across chunks", () => {
    const line = encodeStreamEvent(PROGRESS) + encodeStreamEvent({ type: "error", error: "boom" });
    const decoder = new StreamEventDecoder();

    const first = decoder.push(line.slice(0, 20));
    const second = decoder.push(line.slice(20));

    expect(first).toEqual([]);
    expect(second).toEqual([PROGRESS, { type: "error", error: "boom" }]);
  });

  it("decodes a final line without a trailing newline on flush", () => {
    const decoder = new StreamEventDecoder();
    expect(decoder.push('{"type":"error","error":"late"}')).toEqual([]);
    expect(decoder.flush()).toEqual([{ type: "error", error: "late" }]);
  });

  it("drops malformed and unknown lines", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const decoder = new StreamEventDecoder();

    const events = decoder.push('not json\n{"type":"other"}\n{"type":"progress","progress":{}}\n');

    expect(events).toEqual([]);
  });
});

describe("toBatchResponse", () => {
  it("joins dataset columns with report cells and flags failed rows", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const dataset = parseDataset("address,city,state,zip\n1 Elm St,Boston,MA,02134\n2 Oak Ave,Boston,MA,02135\n");
    const client: ValuationClient = {
      fetchReport: async (record) =>
        record.index === 0
          ? { ok: true, data: { prediction: { predictedPrice: 610000 } } }
          : { ok: false, error: "API returned status 502" },
    };

    const result = await runBatch(dataset.records, {
      kind: ReportKind.SIMPLE,
      client,
      concurrency: 2,
    });
    const response = toBatchResponse(result, dataset);

    expect(response.label).toBe("Simple Report");
    expect(response.columns.slice(0, 5)).toEqual(["address", "city", "state", "zip", "Bedrooms"]);
    expect(response.rows[0]).toEqual([
      "1 Elm St", "Boston", "MA", "02134", null, null, null, null, null, null, 610000, null,
    ]);
    expect(response.rows[1][4]).toBe("Error");
    expect(response.failedRows).toEqual([1]);
    expect(response.errors).toEqual({ 1: "API returned status 502" });
    expect(response.fileName).toBe("enriched_property_data_simple_report.csv");
  });
});
