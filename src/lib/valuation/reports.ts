import {
  ReportKind,
  type CellValue,
  type FullReportFields,
  type NormalizedRecord,
  type RangedReportFields,
  type SimpleReportFields,
} from "../types";

export interface ReportColumn<F> {
  header: string;
  field: keyof F;
}

export interface ReportDefinition<F> {
  kind: ReportKind;
  label: string;
  endpoint: string;
  columns: ReportColumn<F>[];
}

export const FULL_REPORT: ReportDefinition<FullReportFields> = {
  kind: ReportKind.FULL,
  label: "Full Report",
  endpoint: "api/Valuation/advantage",
  columns: [
    { header: "Bedrooms", field: "bedrooms" },
    { header: "Bathrooms", field: "bathrooms" },
    { header: "YearBuilt", field: "yearBuilt" },
    { header: "HomeSize", field: "homeSize" },
    { header: "LotSize", field: "lotSize" },
    { header: "EstimatedValue", field: "estimatedValue" },
    { header: "ConfidenceScore", field: "confidenceScore" },
    { header: "Variance", field: "variance" },
    { header: "PDFReportLink", field: "pdfLink" },
  ],
};

export const SIMPLE_REPORT: ReportDefinition<SimpleReportFields> = {
  kind: ReportKind.SIMPLE,
  label: "Simple Report",
  endpoint: "api/Valuation/simple",
  columns: [
    { header: "Bedrooms", field: "bedrooms" },
    { header: "Bathrooms", field: "bathrooms" },
    { header: "HomeSize", field: "homeSize" },
    { header: "PriceLow", field: "priceLow" },
    { header: "PriceHigh", field: "priceHigh" },
    { header: "ConfidenceScore", field: "confidenceScore" },
    { header: "PredictedPrice", field: "predictedPrice" },
    { header: "PDFReportLink", field: "pdfLink" },
  ],
};

export const RANGED_REPORT: ReportDefinition<RangedReportFields> = {
  kind: ReportKind.RANGED,
  label: "Ranged Report",
  endpoint: "api/Valuation/ranged",
  columns: [
    { header: "Bedrooms", field: "bedrooms" },
    { header: "Bathrooms", field: "bathrooms" },
    { header: "HomeSize", field: "homeSize" },
    { header: "PriceLow", field: "priceLow" },
    { header: "PriceHigh", field: "priceHigh" },
    { header: "ConfidenceScore", field: "confidenceScore" },
    { header: "ErrorMargin", field: "errorMargin" },
    { header: "PDFReportLink", field: "pdfLink" },
  ],
};

export const REPORT_KINDS: ReportKind[] = [
  ReportKind.FULL,
  ReportKind.SIMPLE,
  ReportKind.RANGED,
];

export function getReportLabel(kind: ReportKind): string {
  switch (kind) {
    case ReportKind.FULL:
      return FULL_REPORT.label;
    case ReportKind.SIMPLE:
      return SIMPLE_REPORT.label;
    case ReportKind.RANGED:
      return RANGED_REPORT.label;
  }
}

export function getReportEndpoint(kind: ReportKind): string {
  switch (kind) {
    case ReportKind.FULL:
      return FULL_REPORT.endpoint;
    case ReportKind.SIMPLE:
      return SIMPLE_REPORT.endpoint;
    case ReportKind.RANGED:
      return RANGED_REPORT.endpoint;
  }
}

/** Report column headers for a kind, in output order */
export function getReportColumns(kind: ReportKind): string[] {
  switch (kind) {
    case ReportKind.FULL:
      return FULL_REPORT.columns.map((c) => c.header);
    case ReportKind.SIMPLE:
      return SIMPLE_REPORT.columns.map((c) => c.header);
    case ReportKind.RANGED:
      return RANGED_REPORT.columns.map((c) => c.header);
  }
}

/** Lay a normalized record out along its kind's columns */
export function toReportCells(record: NormalizedRecord): CellValue[] {
  switch (record.kind) {
    case ReportKind.FULL: {
      const fields = record.fields;
      return FULL_REPORT.columns.map((c) => fields[c.field]);
    }
    case ReportKind.SIMPLE: {
      const fields = record.fields;
      return SIMPLE_REPORT.columns.map((c) => fields[c.field]);
    }
    case ReportKind.RANGED: {
      const fields = record.fields;
      return RANGED_REPORT.columns.map((c) => fields[c.field]);
    }
  }
}

const KIND_ALIASES = new Map<string, ReportKind>([
  ["full", ReportKind.FULL],
  ["full report", ReportKind.FULL],
  ["advantage", ReportKind.FULL],
  ["simple", ReportKind.SIMPLE],
  ["simple report", ReportKind.SIMPLE],
  ["ranged", ReportKind.RANGED],
  ["ranged report", ReportKind.RANGED],
]);

/** Accepts wire values and labels, case-insensitively. Returns null when unknown. */
export function parseReportKind(raw: unknown): ReportKind | null {
  if (typeof raw !== "string") return null;
  return KIND_ALIASES.get(raw.trim().toLowerCase()) ?? null;
}
