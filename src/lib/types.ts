// ===== Enums =====

export enum ReportKind {
  FULL = "full",
  SIMPLE = "simple",
  RANGED = "ranged",
}

export enum BatchRunState {
  CREATED = "created",
  RUNNING = "running",
  COMPLETED = "completed",
}

// ===== Input =====

/** One row of the uploaded dataset, keyed by its original position */
export interface InputRecord {
  readonly index: number;
  readonly address: string;
  readonly city: string;
  readonly state: string;
  readonly zip: string; // kept as text so leading zeros survive
}

export interface InputDataset {
  /** Normalized column names (trimmed, lower-cased), in file order */
  columns: string[];
  /** Raw cell text per row, keyed by normalized column name */
  rows: Record<string, string>[];
  records: InputRecord[];
}

// ===== Provider payloads =====

/** Decoded JSON body of a Provider response; shape is interpreted per report kind */
export type RawResponse = Record<string, unknown>;

export type FetchResult =
  | { ok: true; data: RawResponse }
  | { ok: false; error: string };

// ===== Normalized records =====

/** null = the Provider omitted the field */
export type FieldValue = number | string | null;

export interface FullReportFields {
  bedrooms: FieldValue;
  bathrooms: FieldValue;
  yearBuilt: FieldValue;
  homeSize: FieldValue;
  lotSize: FieldValue;
  estimatedValue: FieldValue;
  confidenceScore: FieldValue;
  variance: FieldValue;
  pdfLink: FieldValue;
}

interface PredictionFields {
  bedrooms: FieldValue;
  bathrooms: FieldValue;
  homeSize: FieldValue;
  priceLow: FieldValue;
  priceHigh: FieldValue;
  confidenceScore: FieldValue;
  pdfLink: FieldValue;
}

export interface SimpleReportFields extends PredictionFields {
  predictedPrice: FieldValue;
}

export interface RangedReportFields extends PredictionFields {
  errorMargin: FieldValue;
}

export type NormalizedRecord =
  | { kind: ReportKind.FULL; fields: FullReportFields }
  | { kind: ReportKind.SIMPLE; fields: SimpleReportFields }
  | { kind: ReportKind.RANGED; fields: RangedReportFields };

// ===== Batch =====

export type FetchOutcome =
  | { status: "success"; index: number; record: NormalizedRecord }
  | { status: "failure"; index: number; error: string };

export interface BatchProgress {
  completed: number;
  failed: number;
  total: number;
  elapsedMs: number;
  ratePerSecond: number;
  etaMs: number;
}

export interface BatchSummary {
  kind: ReportKind;
  total: number;
  succeeded: number;
  failed: number;
  concurrency: number;
  durationMs: number;
}

// ===== Result table =====

export type CellValue = number | string | null;

export interface ResultRow {
  record: InputRecord;
  status: "ok" | "error";
  error?: string;
  /** One entry per report column, in column order */
  cells: CellValue[];
}

export interface ResultTable {
  kind: ReportKind;
  columns: string[];
  rows: ResultRow[];
}

export interface BatchResult {
  table: ResultTable;
  /** Failed row index → error message */
  errors: Record<number, string>;
  summary: BatchSummary;
}
