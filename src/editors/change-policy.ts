/**
 * Policies deciding which changes are kept or logged in detail
 */

/**
 * Decides whether a trace change becomes a ChangeRecord
 */
export interface ChangeRecordPolicy {
  /**
   * @param recorded Records kept so far in this pass
   * @param traceIndex Trace being changed
   */
  shouldRecord(recorded: number, traceIndex: number): boolean;
}

/**
 * Every change is kept until `fullDetailLimit` records exist; after that
 * only changes on every `sampleEvery`-th trace index are kept
 */
export class SampledChangePolicy implements ChangeRecordPolicy {
  constructor(
    public readonly fullDetailLimit = 10_000,
    public readonly sampleEvery = 100
  ) {}

  shouldRecord(recorded: number, traceIndex: number): boolean {
    return recorded < this.fullDetailLimit || traceIndex % this.sampleEvery === 0;
  }
}

export const RECORD_ALL_CHANGES: ChangeRecordPolicy = {
  shouldRecord: () => true,
};

export type ThrottleDecision = "detail" | "summarize" | "silent";

/**
 * Log throttle: the first `detailLimit` changes are logged individually,
 * the next one triggers a single summary notice, the rest are silent
 */
export class ChangeLogThrottle {
  private seen = 0;

  constructor(public readonly detailLimit = 5) {}

  next(): ThrottleDecision {
    this.seen++;
    if (this.seen <= this.detailLimit) return "detail";
    return this.seen === this.detailLimit + 1 ? "summarize" : "silent";
  }

  get count(): number {
    return this.seen;
  }

  reset(): void {
    this.seen = 0;
  }
}
