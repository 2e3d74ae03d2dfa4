import { NextRequest, NextResponse } from "next/server";
import { config } from "@/lib/config";
import { parseDataset } from "@/lib/dataset";
import { DatasetError, isValidationError } from "@/lib/batch/errors";
import { runBatch, validateConcurrency } from "@/lib/batch/orchestrator";
import { toBatchResponse } from "@/lib/batch/response";
import { encodeStreamEvent, type BatchStreamEvent } from "@/lib/batch/stream";
import type { InputDataset } from "@/lib/types";
import { createValuationClient } from "@/lib/valuation/client";
import { parseReportKind } from "@/lib/valuation/reports";

export const runtime = "nodejs";

function parseConcurrency(raw: FormDataEntryValue | null): number {
  if (typeof raw !== "string" || raw.trim() === "") return config.defaultConcurrency;
  return Number(raw);
}

async function readUpload(
  file: Blob,
  rawConcurrency: FormDataEntryValue | null
): Promise<{ concurrency: number; dataset: InputDataset }> {
  const concurrency = validateConcurrency(parseConcurrency(rawConcurrency));
  const dataset = parseDataset(new Uint8Array(await file.arrayBuffer()));
  if (dataset.records.length === 0) {
    throw new DatasetError("Uploaded file contains no rows");
  }
  return { concurrency, dataset };
}

/**
 * Multipart upload (file, reportKind, concurrency). Configuration and file
 * problems are answered with 400 before any Provider call; otherwise the
 * response is an NDJSON stream of progress events and one final result.
 */
export async function POST(request: NextRequest) {
  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    return NextResponse.json({ error: "Expected multipart form data" }, { status: 400 });
  }

  const kind = parseReportKind(form.get("reportKind"));
  if (!kind) {
    return NextResponse.json(
      { error: "reportKind must be one of: full, simple, ranged" },
      { status: 400 }
    );
  }

  const file = form.get("file");
  if (!(file instanceof Blob)) {
    return NextResponse.json({ error: "A CSV or XLSX file is required" }, { status: 400 });
  }

  let upload: { concurrency: number; dataset: InputDataset };
  try {
    upload = await readUpload(file, form.get("concurrency"));
  } catch (error) {
    if (isValidationError(error)) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }
    console.error("[api/batch] Error:", error);
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "Batch failed" },
      { status: 500 }
    );
  }

  const { concurrency, dataset } = upload;
  const client = createValuationClient();
  const encoder = new TextEncoder();

  const stream = new ReadableStream<Uint8Array>({
    async start(controller) {
      const send = (event: BatchStreamEvent) => {
        controller.enqueue(encoder.encode(encodeStreamEvent(event)));
      };

      try {
        const result = await runBatch(dataset.records, {
          kind,
          concurrency,
          client,
          onProgress: (progress) => send({ type: "progress", progress }),
        });
        send({ type: "result", result: toBatchResponse(result, dataset) });
      } catch (error) {
        console.error("[api/batch] Error:", error);
        send({
          type: "error",
          error: error instanceof Error ? error.message : "Batch failed",
        });
      } finally {
        controller.close();
      }
    },
  });

  return new Response(stream, {
    headers: {
      "Content-Type": "application/x-ndjson; charset=utf-8",
      "Cache-Control": "no-store",
    },
  });
}
