import type { Logger } from '@/lib/log';

/** An accounting bug: segment arithmetic no longer adds up. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export interface InvariantPolicy {
  /** Throw on violation. When off, the violation is logged and execution continues. */
  strict: boolean;
  logger: Logger;
}

/** Report a violated invariant per the policy. Never clamps. */
export function checkInvariant(condition: boolean, message: string, policy: InvariantPolicy): void {
  if (condition) return;
  if (policy.strict) {
    throw new InvariantError(message);
  }
  policy.logger.error(`Invariant violated: ${message}`);
}
