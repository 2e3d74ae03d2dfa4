import type { CellValue, InputRecord, NormalizedRecord, RawResponse, ReportKind } from "./types";
import type { ValuationClient } from "./valuation/client";
import { isRecord, normalizeResponse } from "./valuation/normalize";

export interface AddressInput {
  address: string;
  city: string;
  state: string;
  zip: string;
}

export type LookupResult =
  | { ok: true; record: NormalizedRecord; raw: RawResponse }
  | { ok: false; error: string };

/** Body of a successful /api/lookup response */
export interface LookupResponse {
  kind: ReportKind;
  label: string;
  columns: string[];
  cells: CellValue[];
  record: NormalizedRecord;
  raw: RawResponse;
}

export function isLookupResponse(value: unknown): value is LookupResponse {
  return (
    isRecord(value) &&
    typeof value.kind === "string" &&
    typeof value.label === "string" &&
    Array.isArray(value.columns) &&
    Array.isArray(value.cells) &&
    isRecord(value.record) &&
    isRecord(value.raw)
  );
}

/** Single-address lookup: one Provider call, normalized, with the raw payload kept for display */
export async function lookupProperty(
  input: AddressInput,
  kind: ReportKind,
  client: ValuationClient
): Promise<LookupResult> {
  const record: InputRecord = {
    index: 0,
    address: input.address.trim(),
    city: input.city.trim(),
    state: input.state.trim(),
    zip: input.zip.trim(),
  };

  const result = await client.fetchReport(record, kind);
  if (!result.ok) {
    console.warn(`[lookup] ${kind} lookup failed for "${record.address}": ${result.error}`);
    return { ok: false, error: result.error };
  }

  return { ok: true, record: normalizeResponse(result.data, kind), raw: result.data };
}
