import type { FetchOutcome, InputRecord, ReportKind, ResultRow, ResultTable } from "../types";
import { getReportColumns, toReportCells } from "../valuation/reports";

/** Written into every report column of a row whose Provider call failed */
export const ERROR_SENTINEL = "Error";

/**
 * Join outcomes back onto the input rows by index. Output row i is always
 * input row i; the column set depends only on the report kind.
 */
export function assembleTable(
  records: readonly InputRecord[],
  outcomes: ReadonlyMap<number, FetchOutcome>,
  kind: ReportKind
): ResultTable {
  const columns = getReportColumns(kind);

  const rows = records.map((record): ResultRow => {
    const outcome = outcomes.get(record.index);
    if (!outcome) {
      throw new Error(`No outcome recorded for row ${record.index}`);
    }

    if (outcome.status === "failure") {
      return {
        record,
        status: "error",
        error: outcome.error,
        cells: columns.map(() => ERROR_SENTINEL),
      };
    }

    if (outcome.record.kind !== kind) {
      throw new Error(
        `Row ${record.index} was normalized as ${outcome.record.kind}, expected ${kind}`
      );
    }
    return { record, status: "ok", cells: toReportCells(outcome.record) };
  });

  return { kind, columns, rows };
}
