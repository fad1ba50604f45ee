/** Absolute deadlines of a running session. */
export interface SessionDeadlines {
  endAt: Date;
  breakNotifyAt: Date | null;
}

/** What to do with a running session after an unobserved gap. */
export type Reconciliation =
  | { kind: 'expired' }
  | { kind: 'running'; timeLeft: number; breakNotifyDue: boolean };

/**
 * Decide the state of a session after the host was suspended for an unknown
 * time. Only absolute instants are compared, so the gap length does not matter.
 */
export function reconcileDeadlines(deadlines: SessionDeadlines, now: Date): Reconciliation {
  const msLeft = deadlines.endAt.getTime() - now.getTime();
  if (msLeft <= 0) {
    return { kind: 'expired' };
  }
  return {
    kind: 'running',
    timeLeft: Math.trunc(msLeft / 1000),
    breakNotifyDue:
      deadlines.breakNotifyAt !== null && deadlines.breakNotifyAt.getTime() <= now.getTime(),
  };
}
