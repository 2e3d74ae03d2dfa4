import type { CellValue } from "./types";

export function formatCell(value: CellValue): string {
  if (value === null) return "-";
  if (typeof value === "number") return value.toLocaleString("en-US");
  return value;
}

/** "42.0s" under a minute, "3m 07s" above */
export function formatDuration(ms: number): string {
  const seconds = Math.max(0, ms) / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = Math.floor(seconds % 60);
  return `${minutes}m ${String(rest).padStart(2, "0")}s`;
}

export function formatRate(ratePerSecond: number): string {
  return `${ratePerSecond.toFixed(1)} rows/s`;
}
