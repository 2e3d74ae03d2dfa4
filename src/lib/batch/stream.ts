import type { BatchProgress, BatchSummary, CellValue, ReportKind } from "../types";
import { isRecord } from "../valuation/normalize";

/** What the dashboard receives once a batch has drained */
export interface BatchResponse {
  kind: ReportKind;
  label: string;
  /** Dataset columns followed by report columns */
  columns: string[];
  reportColumns: string[];
  rows: CellValue[][];
  failedRows: number[];
  errors: Record<number, string>;
  summary: BatchSummary;
  csv: string;
  fileName: string;
}

export type BatchStreamEvent =
  | { type: "progress"; progress: BatchProgress }
  | { type: "result"; result: BatchResponse }
  | { type: "error"; error: string };

export function encodeStreamEvent(event: BatchStreamEvent): string {
  return JSON.stringify(event) + "\n";
}

function isProgress(value: unknown): value is BatchProgress {
  return (
    isRecord(value) &&
    typeof value.completed === "number" &&
    typeof value.failed === "number" &&
    typeof value.total === "number" &&
    typeof value.elapsedMs === "number" &&
    typeof value.ratePerSecond === "number" &&
    typeof value.etaMs === "number"
  );
}

function isBatchResponse(value: unknown): value is BatchResponse {
  return (
    isRecord(value) &&
    typeof value.kind === "string" &&
    typeof value.label === "string" &&
    Array.isArray(value.columns) &&
    Array.isArray(value.reportColumns) &&
    Array.isArray(value.rows) &&
    Array.isArray(value.failedRows) &&
    isRecord(value.errors) &&
    isRecord(value.summary) &&
    typeof value.csv === "string" &&
    typeof value.fileName === "string"
  );
}

export function isBatchStreamEvent(value: unknown): value is BatchStreamEvent {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case "progress":
      return isProgress(value.progress);
    case "result":
      return isBatchResponse(value.result);
    case "error":
      return typeof value.error === "string";
    default:
      return false;
  }
}

/**
 * Incremental NDJSON reader for the batch stream. Chunks may split a line
 * anywhere; only complete lines are decoded. Unparseable lines are dropped.
 */
export class StreamEventDecoder {
  private buffer = "";

  push(chunk: string): BatchStreamEvent[] {
    this.buffer += chunk;
    const lines = this.buffer.split("\n");
    this.buffer = lines.pop() ?? "";
    return this.decodeLines(lines);
  }

  flush(): BatchStreamEvent[] {
    const rest = this.buffer;
    this.buffer = "";
    return this.decodeLines([rest]);
  }

  private decodeLines(lines: string[]): BatchStreamEvent[] {
    const events: BatchStreamEvent[] = [];
    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        console.warn("[batch-stream] Skipping malformed line");
        continue;
      }
      if (isBatchStreamEvent(parsed)) events.push(parsed);
    }
    return events;
  }
}
