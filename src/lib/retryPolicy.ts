import type { ErrorClassification } from '@app-types/transfer';

export interface RetryPolicySettings {
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Attempts allowed at a single orchestrator state before giving up. */
  maxAttempts: number;
  /** Fraction of the computed delay applied as +/- random jitter. */
  jitter: number;
}

export type RetryDecision =
  | { retry: true; delayMs: number }
  | { retry: false; reason: 'PERMANENT' | 'RETRIES_EXHAUSTED' };

export class RetryPolicy {
  constructor(
    private readonly settings: RetryPolicySettings,
    private readonly random: () => number = Math.random
  ) {
    if (settings.maxAttempts < 1) {
      throw new Error('Retry policy needs at least one attempt');
    }
  }

  get maxAttempts(): number {
    return this.settings.maxAttempts;
  }

  /**
   * `attempt` is the number of the attempt that just failed (1-based).
   */
  decide(
    classification: ErrorClassification,
    attempt: number,
    retryAfterMs?: number
  ): RetryDecision {
    if (classification !== 'TRANSIENT' && classification !== 'RATE_LIMITED') {
      return { retry: false, reason: 'PERMANENT' };
    }

    if (attempt >= this.settings.maxAttempts) {
      return { retry: false, reason: 'RETRIES_EXHAUSTED' };
    }

    if (classification === 'RATE_LIMITED' && retryAfterMs !== undefined && retryAfterMs >= 0) {
      return { retry: true, delayMs: Math.min(retryAfterMs, this.settings.maxDelayMs) };
    }

    return { retry: true, delayMs: this.delayFor(attempt) };
  }

  delayFor(attempt: number): number {
    const { baseDelayMs, multiplier, maxDelayMs, jitter } = this.settings;
    const exponential = baseDelayMs * Math.pow(multiplier, Math.max(0, attempt - 1));
    const capped = Math.min(maxDelayMs, exponential);
    const spread = capped * jitter * (this.random() * 2 - 1);
    return Math.max(0, Math.min(maxDelayMs, Math.round(capped + spread)));
  }
}
