import { describe, it, expect } from "vitest";
import { formatCell, formatDuration, formatRate } from "../lib/format";

describe("formatDuration", () => {
  it("shows seconds under a minute", () => {
    expect(formatDuration(42000)).toBe("42.0s");
    expect(formatDuration(0)).toBe("0.0s");
  });

  it("shows minutes and padded seconds above a minute", () => {
    expect(formatDuration(187000)).toBe("3m 07s");
  });

  it("clamps negative durations to zero", () => {
    expect(formatDuration(-50)).toBe("0.0s");
  });
});

describe("formatCell", () => {
  it("renders absent values as a dash", () => {
    expect(formatCell(null)).toBe("-");
  });

  it("groups thousands in numbers", () => {
    expect(formatCell(425000)).toBe("425,000");
  });

  it("passes text through", () => {
    expect(formatCell("Error")).toBe("Error");
  });
});

describe("formatRate", () => {
  it("rounds to one decimal", () => {
    expect(formatRate(2 / 3)).toBe("0.7 rows/s");
  });
});
