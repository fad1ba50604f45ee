export const DEFAULT_CHECK_IN_THRESHOLD = 3;

export interface CheckInState {
  consecutiveAutoContinuations: number;
  threshold: number;
}

/**
 * Counts slot-to-slot continuations that happened with no user involvement.
 * Once the count reaches the threshold, automatic continuation stops until
 * the user does something explicit.
 */
export class CheckInCounter {
  private count = 0;

  constructor(readonly threshold: number = DEFAULT_CHECK_IN_THRESHOLD) {
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new RangeError(`Check-in threshold must be a positive integer, got ${threshold}`);
    }
  }

  get consecutiveAutoContinuations(): number {
    return this.count;
  }

  /** True when the next automatic continuation would be refused. */
  get checkInRequired(): boolean {
    return this.count >= this.threshold;
  }

  /**
   * Ask to continue automatically. Counts and returns true while under the
   * threshold; at the threshold returns false and leaves the count alone.
   */
  tryAutoContinue(): boolean {
    if (this.checkInRequired) return false;
    this.count += 1;
    return true;
  }

  /** Any tap on continue, break, stop or a check-in acknowledgement. */
  recordExplicitAction(): void {
    this.count = 0;
  }

  getState(): CheckInState {
    return { consecutiveAutoContinuations: this.count, threshold: this.threshold };
  }
}
