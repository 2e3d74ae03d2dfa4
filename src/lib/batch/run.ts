import {
  BatchRunState,
  type BatchProgress,
  type BatchSummary,
  type FetchOutcome,
  type ReportKind,
} from "../types";

/**
 * State of one batch execution: counters, the per-row error map and the
 * collected outcomes. Lives for a single run and is discarded afterwards.
 */
export class BatchRun {
  private state = BatchRunState.CREATED;
  private startMs = 0;
  private endMs: number | null = null;
  private completed = 0;
  private readonly outcomes = new Map<number, FetchOutcome>();
  private readonly errors = new Map<number, string>();

  constructor(
    readonly kind: ReportKind,
    readonly total: number,
    readonly concurrency: number,
    private readonly now: () => number = Date.now
  ) {}

  getState(): BatchRunState {
    return this.state;
  }

  get failedCount(): number {
    return this.errors.size;
  }

  start(): void {
    if (this.state !== BatchRunState.CREATED) {
      throw new Error(`Cannot start a batch run in state "${this.state}"`);
    }
    this.state = BatchRunState.RUNNING;
    this.startMs = this.now();
  }

  /** Accept one outcome and return the progress snapshot that follows it */
  record(outcome: FetchOutcome): BatchProgress {
    if (this.state !== BatchRunState.RUNNING) {
      throw new Error(`Cannot record an outcome in state "${this.state}"`);
    }
    if (this.outcomes.has(outcome.index)) {
      throw new Error(`Duplicate outcome for row ${outcome.index}`);
    }

    this.outcomes.set(outcome.index, outcome);
    this.completed++;
    if (outcome.status === "failure") {
      this.errors.set(outcome.index, outcome.error);
    }
    return this.progress();
  }

  finish(): void {
    if (this.state !== BatchRunState.RUNNING) {
      throw new Error(`Cannot finish a batch run in state "${this.state}"`);
    }
    if (this.completed !== this.total) {
      throw new Error(`Batch run drained ${this.completed} of ${this.total} records`);
    }
    this.state = BatchRunState.COMPLETED;
    this.endMs = this.now();
  }

  progress(): BatchProgress {
    const elapsedMs = Math.max(0, (this.endMs ?? this.now()) - this.startMs);
    const ratePerSecond = elapsedMs > 0 ? this.completed / (elapsedMs / 1000) : 0;
    const etaMs =
      this.completed > 0
        ? Math.max(0, (elapsedMs / this.completed) * this.total - elapsedMs)
        : 0;

    return {
      completed: this.completed,
      failed: this.errors.size,
      total: this.total,
      elapsedMs,
      ratePerSecond,
      etaMs,
    };
  }

  getOutcomes(): ReadonlyMap<number, FetchOutcome> {
    return this.outcomes;
  }

  /** Failed row index → message, in row order */
  getErrors(): Record<number, string> {
    const sorted = [...this.errors.entries()].sort((a, b) => a[0] - b[0]);
    return Object.fromEntries(sorted);
  }

  summary(): BatchSummary {
    return {
      kind: this.kind,
      total: this.total,
      succeeded: this.completed - this.errors.size,
      failed: this.errors.size,
      concurrency: this.concurrency,
      durationMs: this.progress().elapsedMs,
    };
  }
}
