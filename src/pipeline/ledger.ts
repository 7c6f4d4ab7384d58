import type { FailureRecord, RunSummary } from '../types/index.js';

/**
 * Run-wide success counter and ordered failure list.
 * Only the batch driver writes to it.
 */
export class RunLedger {
  private readonly failureRecords: FailureRecord[] = [];
  private successes = 0;

  recordSuccess(): void {
    this.successes += 1;
  }

  recordFailure(record: FailureRecord): void {
    this.failureRecords.push(record);
  }

  get failures(): readonly FailureRecord[] {
    return this.failureRecords;
  }

  summary(): RunSummary {
    return {
      processed: this.successes + this.failureRecords.length,
      succeeded: this.successes,
      failed: this.failureRecords.length
    };
  }
}
