import {
  ReportKind,
  type FieldValue,
  type FullReportFields,
  type NormalizedRecord,
  type RangedReportFields,
  type RawResponse,
  type SimpleReportFields,
} from "../types";

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_RE = /^[+-]?\d+$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Walk nested objects; any missing or non-object step yields null */
export function dig(root: unknown, ...path: string[]): Record<string, unknown> | null {
  let current: unknown = root;
  for (const key of path) {
    if (!isRecord(current)) return null;
    current = current[key];
  }
  return isRecord(current) ? current : null;
}

/**
 * Flatten a raw Provider value to a cell value. Blank strings count as absent;
 * booleans and nested structures are kept as text.
 */
export function toFieldValue(value: unknown): FieldValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string") return value.trim() === "" ? null : value;
  if (typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/** Numeric-looking strings become numbers; anything else is left as provided */
export function toDecimal(value: unknown): FieldValue {
  const v = toFieldValue(value);
  if (typeof v !== "string") return v;
  const trimmed = v.trim();
  return DECIMAL_RE.test(trimmed) ? Number(trimmed) : v;
}

/** Whole-number fields: numbers are truncated, integer strings parsed, the rest left as provided */
export function toInteger(value: unknown): FieldValue {
  const v = toFieldValue(value);
  if (typeof v === "number") return Math.trunc(v);
  if (typeof v !== "string") return v;
  const trimmed = v.trim();
  return INTEGER_RE.test(trimmed) ? parseInt(trimmed, 10) : v;
}

function field(obj: Record<string, unknown> | null, key: string): unknown {
  return obj ? obj[key] : undefined;
}

function reportPdfLink(raw: RawResponse): FieldValue {
  return toFieldValue(field(dig(raw, "metadata"), "reportPDFLink"));
}

export function normalizeFullReport(raw: RawResponse): FullReportFields {
  const searchData = dig(raw, "searchData");
  const current = dig(raw, "analysis", "houseWorth", "valuations", "current");

  return {
    bedrooms: toDecimal(field(searchData, "beds")),
    bathrooms: toDecimal(field(searchData, "baths")),
    yearBuilt: toInteger(field(searchData, "yearBuilt")),
    homeSize: toInteger(field(searchData, "size")),
    lotSize: toInteger(field(searchData, "lotSize")),
    estimatedValue: toDecimal(field(current, "value")),
    confidenceScore: toDecimal(field(current, "confidence")),
    variance: toDecimal(field(current, "variance")),
    pdfLink: reportPdfLink(raw),
  };
}

/** Simple and Ranged reports describe the subject through its first structure */
function firstStructure(raw: RawResponse): Record<string, unknown> | null {
  const parcel = dig(raw, "subjectParcel");
  const structures = parcel ? parcel["structures"] : undefined;
  if (!Array.isArray(structures) || structures.length === 0) return null;
  const first: unknown = structures[0];
  return isRecord(first) ? first : null;
}

export function normalizeSimpleReport(raw: RawResponse): SimpleReportFields {
  const prediction = dig(raw, "prediction");
  const structure = firstStructure(raw);

  return {
    bedrooms: toDecimal(field(structure, "bedrooms")),
    bathrooms: toDecimal(field(structure, "bathrooms")),
    homeSize: toInteger(field(structure, "gla")),
    priceLow: toDecimal(field(prediction, "priceLow")),
    priceHigh: toDecimal(field(prediction, "priceHigh")),
    confidenceScore: toDecimal(field(prediction, "confidence")),
    predictedPrice: toDecimal(field(prediction, "predictedPrice")),
    pdfLink: reportPdfLink(raw),
  };
}

export function normalizeRangedReport(raw: RawResponse): RangedReportFields {
  const prediction = dig(raw, "prediction");
  const structure = firstStructure(raw);

  return {
    bedrooms: toDecimal(field(structure, "bedrooms")),
    bathrooms: toDecimal(field(structure, "bathrooms")),
    homeSize: toInteger(field(structure, "gla")),
    priceLow: toDecimal(field(prediction, "priceLow")),
    priceHigh: toDecimal(field(prediction, "priceHigh")),
    confidenceScore: toDecimal(field(prediction, "confidence")),
    errorMargin: toDecimal(field(prediction, "error")),
    pdfLink: reportPdfLink(raw),
  };
}

export function normalizeResponse(raw: RawResponse, kind: ReportKind): NormalizedRecord {
  switch (kind) {
    case ReportKind.FULL:
      return { kind, fields: normalizeFullReport(raw) };
    case ReportKind.SIMPLE:
      return { kind, fields: normalizeSimpleReport(raw) };
    case ReportKind.RANGED:
      return { kind, fields: normalizeRangedReport(raw) };
  }
}
