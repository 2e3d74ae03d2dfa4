import { config } from "../config";
import type {
  BatchProgress,
  BatchResult,
  FetchOutcome,
  InputRecord,
  ReportKind,
} from "../types";
import type { ValuationClient } from "../valuation/client";
import { normalizeResponse } from "../valuation/normalize";
import { getReportLabel } from "../valuation/reports";
import { assembleTable } from "./assemble";
import { BatchValidationError } from "./errors";
import { BatchRun } from "./run";
import { runWorkerPool } from "./worker-pool";

// Only the first few row failures are logged individually
const MAX_LOGGED_FAILURES = 5;

export interface RunBatchOptions {
  kind: ReportKind;
  client: ValuationClient;
  /** Parallel Provider calls, 1–10. Defaults to config.defaultConcurrency. */
  concurrency?: number;
  onProgress?: (progress: BatchProgress) => void;
  now?: () => number;
}

export function validateConcurrency(concurrency: number): number {
  if (
    !Number.isInteger(concurrency) ||
    concurrency < config.minConcurrency ||
    concurrency > config.maxConcurrency
  ) {
    throw new BatchValidationError(
      `Concurrency must be an integer between ${config.minConcurrency} and ${config.maxConcurrency}, got ${concurrency}`
    );
  }
  return concurrency;
}

/** Large uploads are gentler on the Provider with at most 3 workers */
export function recommendConcurrency(total: number, requested: number): number {
  return total > config.largeDatasetRows ? Math.min(3, requested) : requested;
}

function validateRecords(records: readonly InputRecord[]): void {
  const seen = new Set<number>();
  for (const record of records) {
    if (seen.has(record.index)) {
      throw new BatchValidationError(`Duplicate record index ${record.index}`);
    }
    seen.add(record.index);
  }
}

/** One Provider call for one record, folded into an outcome. Never rejects. */
export async function fetchOutcome(
  record: InputRecord,
  kind: ReportKind,
  client: ValuationClient
): Promise<FetchOutcome> {
  try {
    const result = await client.fetchReport(record, kind);
    if (!result.ok) {
      return { status: "failure", index: record.index, error: result.error };
    }
    return {
      status: "success",
      index: record.index,
      record: normalizeResponse(result.data, kind),
    };
  } catch (error: unknown) {
    return {
      status: "failure",
      index: record.index,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

export async function runBatch(
  records: readonly InputRecord[],
  options: RunBatchOptions
): Promise<BatchResult> {
  const { kind, client, onProgress } = options;
  const concurrency = validateConcurrency(options.concurrency ?? config.defaultConcurrency);
  validateRecords(records);

  const label = getReportLabel(kind);
  const run = new BatchRun(kind, records.length, concurrency, options.now);

  if (records.length > config.largeDatasetRows) {
    console.warn(
      `[batch] Large dataset: ${records.length} records. Recommended concurrency: ${recommendConcurrency(records.length, concurrency)}`
    );
  }

  run.start();
  console.log(`[batch] ${label}: ${records.length} records, ${concurrency} workers`);

  await runWorkerPool(records, {
    concurrency,
    worker: (record) => fetchOutcome(record, kind, client),
    onResult: (outcome) => {
      const progress = run.record(outcome);

      if (outcome.status === "failure" && run.failedCount <= MAX_LOGGED_FAILURES) {
        console.warn(`[batch] Row ${outcome.index + 1} failed: ${outcome.error}`);
      }

      if (onProgress) {
        try {
          onProgress(progress);
        } catch (err) {
          console.error("[batch] Progress listener threw:", err);
        }
      }
    },
  });

  run.finish();

  const table = assembleTable(records, run.getOutcomes(), kind);
  const summary = run.summary();

  console.log(
    `[batch] Completed ${summary.total} records in ${(summary.durationMs / 1000).toFixed(1)}s (${summary.failed} failed)`
  );

  return { table, errors: run.getErrors(), summary };
}
