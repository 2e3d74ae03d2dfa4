import { exportFileName, toCsv } from "../dataset";
import type { BatchResult, InputDataset } from "../types";
import { getReportLabel } from "../valuation/reports";
import type { BatchResponse } from "./stream";

export function toBatchResponse(result: BatchResult, dataset: InputDataset): BatchResponse {
  const { table } = result;

  return {
    kind: table.kind,
    label: getReportLabel(table.kind),
    columns: [...dataset.columns, ...table.columns],
    reportColumns: table.columns,
    rows: table.rows.map((row) => {
      const source = dataset.rows[row.record.index] ?? {};
      return [...dataset.columns.map((c) => source[c] ?? ""), ...row.cells];
    }),
    failedRows: table.rows.filter((r) => r.status === "error").map((r) => r.record.index),
    errors: result.errors,
    summary: result.summary,
    csv: toCsv(table, dataset),
    fileName: exportFileName(table.kind),
  };
}
