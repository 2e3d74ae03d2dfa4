import { describe, it, expect } from "vitest";
import { BatchRun } from "../lib/batch/run";
import { normalizeSimpleReport } from "../lib/valuation/normalize";
import { BatchRunState, ReportKind, type FetchOutcome } from "../lib/types";

function success(index: number): FetchOutcome {
  return {
    status: "success",
    index,
    record: { kind: ReportKind.SIMPLE, fields: normalizeSimpleReport({}) },
  };
}

function failure(index: number, error = "API returned status 500"): FetchOutcome {
  return { status: "failure", index, error };
}

function makeRun(total: number) {
  const clock = { t: 1000 };
  const run = new BatchRun(ReportKind.SIMPLE, total, 2, () => clock.t);
  return { run, clock };
}

describe("BatchRun", () => {
  it("moves from created to running to completed", () => {
    const { run } = makeRun(1);
    expect(run.getState()).toBe(BatchRunState.CREATED);
    run.start();
    expect(run.getState()).toBe(BatchRunState.RUNNING);
    run.record(success(0));
    run.finish();
    expect(run.getState()).toBe(BatchRunState.COMPLETED);
  });

  it("derives rate and remaining time from elapsed time", () => {
    const { run, clock } = makeRun(4);
    run.start();

    clock.t = 3000;
    expect(run.record(success(0))).toEqual({
      completed: 1,
      failed: 0,
      total: 4,
      elapsedMs: 2000,
      ratePerSecond: 0.5,
      etaMs: 6000,
    });

    clock.t = 4000;
    const progress = run.record(failure(1));
    expect(progress.completed).toBe(2);
    expect(progress.failed).toBe(1);
    expect(progress.elapsedMs).toBe(3000);
    expect(progress.ratePerSecond).toBeCloseTo(2 / 3);
    expect(progress.etaMs).toBe(3000);
  });

  it("reports zero rate and remaining time before anything completes", () => {
    const { run } = makeRun(3);
    run.start();
    expect(run.progress()).toEqual({
      completed: 0,
      failed: 0,
      total: 3,
      elapsedMs: 0,
      ratePerSecond: 0,
      etaMs: 0,
    });
  });

  it("refuses outcomes outside the running state", () => {
    const { run } = makeRun(1);
    expect(() => run.record(success(0))).toThrow('Cannot record an outcome in state "created"');
  });

  it("refuses a second outcome for the same row", () => {
    const { run } = makeRun(2);
    run.start();
    run.record(success(0));
    expect(() => run.record(failure(0))).toThrow("Duplicate outcome for row 0");
  });

  it("refuses to finish before every record is drained", () => {
    const { run } = makeRun(2);
    run.start();
    run.record(success(0));
    expect(() => run.finish()).toThrow("Batch run drained 1 of 2 records");
  });

  it("keeps one error entry per failed row, in row order", () => {
    const { run } = makeRun(4);
    run.start();
    run.record(failure(3, "timeout"));
    run.record(success(0));
    run.record(failure(1, "API returned status 404"));
    run.record(success(2));

    expect(run.getErrors()).toEqual({ 1: "API returned status 404", 3: "timeout" });
    expect(Object.keys(run.getErrors())).toEqual(["1", "3"]);
  });

  it("freezes the duration once finished", () => {
    const { run, clock } = makeRun(1);
    run.start();
    clock.t = 2500;
    run.record(success(0));
    run.finish();
    clock.t = 9000;

    expect(run.summary()).toEqual({
      kind: ReportKind.SIMPLE,
      total: 1,
      succeeded: 1,
      failed: 0,
      concurrency: 2,
      durationMs: 1500,
    });
  });
});
