import { readFileSync, writeFileSync } from "node:fs";
import { config } from "../lib/config";
import { parseDataset, toCsv, exportFileName } from "../lib/dataset";
import { runBatch } from "../lib/batch/orchestrator";
import { formatDuration, formatRate } from "../lib/format";
import { ReportKind } from "../lib/types";
import { createValuationClient } from "../lib/valuation/client";
import { REPORT_KINDS, parseReportKind } from "../lib/valuation/reports";

interface CliOptions {
  input: string;
  kind: ReportKind;
  concurrency: number;
  output: string | null;
}

function parseArgs(args: string[]): CliOptions {
  let input: string | null = null;
  let kind: ReportKind = ReportKind.FULL;
  let concurrency = config.defaultConcurrency;
  let output: string | null = null;

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (value === undefined) break;
    switch (args[i]) {
      case "--input":
        input = value;
        i++;
        break;
      case "--kind": {
        const parsed = parseReportKind(value);
        if (!parsed) {
          throw new Error(`Unknown report kind "${value}". Available: ${REPORT_KINDS.join(", ")}`);
        }
        kind = parsed;
        i++;
        break;
      }
      case "--concurrency":
        concurrency = Number(value);
        i++;
        break;
      case "--output":
        output = value;
        i++;
        break;
    }
  }

  if (!input) {
    throw new Error(
      "Usage: enrich --input <file.csv|file.xlsx> [--kind full|simple|ranged] [--concurrency 1-10] [--output out.csv]"
    );
  }
  return { input, kind, concurrency, output };
}

async function main() {
  const options = parseArgs(process.argv.slice(2));

  const dataset = parseDataset(readFileSync(options.input));

  console.log(`Loaded ${dataset.records.length} rows from ${options.input}`);

  let lastLogged = 0;
  const result = await runBatch(dataset.records, {
    kind: options.kind,
    concurrency: options.concurrency,
    client: createValuationClient(),
    onProgress: (progress) => {
      const percent = Math.floor((progress.completed / progress.total) * 100);
      if (percent >= lastLogged + 10 || progress.completed === progress.total) {
        lastLogged = percent;
        console.log(
          `  ${progress.completed}/${progress.total} (${percent}%) ${formatRate(progress.ratePerSecond)}, ${formatDuration(progress.etaMs)} remaining`
        );
      }
    },
  });

  const output = options.output ?? exportFileName(options.kind);
  writeFileSync(output, toCsv(result.table, dataset));

  console.log(`\n=== Summary ===`);
  console.log(`Succeeded: ${result.summary.succeeded}`);
  console.log(`Failed: ${result.summary.failed}`);
  console.log(`Duration: ${formatDuration(result.summary.durationMs)}`);
  console.log(`Wrote ${output}`);
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
