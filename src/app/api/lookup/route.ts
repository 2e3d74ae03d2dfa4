import { NextRequest, NextResponse } from "next/server";
import { lookupProperty, type LookupResponse } from "@/lib/lookup";
import { createValuationClient } from "@/lib/valuation/client";
import { isRecord } from "@/lib/valuation/normalize";
import {
  getReportColumns,
  getReportLabel,
  parseReportKind,
  toReportCells,
} from "@/lib/valuation/reports";

export const runtime = "nodejs";

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export async function POST(request: NextRequest) {
  try {
    const body: unknown = await request.json().catch(() => ({}));
    const fields = isRecord(body) ? body : {};

    const kind = parseReportKind(fields.reportKind);
    if (!kind) {
      return NextResponse.json(
        { error: "reportKind must be one of: full, simple, ranged" },
        { status: 400 }
      );
    }

    const result = await lookupProperty(
      {
        address: text(fields.address),
        city: text(fields.city),
        state: text(fields.state),
        zip: text(fields.zip),
      },
      kind,
      createValuationClient()
    );

    if (!result.ok) {
      return NextResponse.json({ error: result.error }, { status: 502 });
    }

    const response: LookupResponse = {
      kind,
      label: getReportLabel(kind),
      columns: getReportColumns(kind),
      cells: toReportCells(result.record),
      record: result.record,
      raw: result.raw,
    };
    return NextResponse.json(response);
  } catch (error) {
    console.error("[api/lookup] Error:", error);
    return NextResponse.json(
      {
        error: error instanceof Error ? error.message : "Lookup failed",
      },
      { status: 500 }
    );
  }
}
