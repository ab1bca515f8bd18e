import type { FillRetryConfig } from '../config/index.js';

interface FillFailureState {
  failures: number;
  suspendedUntil: number;
}

/**
 * Tracks consecutive background fill failures per sandbox type and
 * suspends filling with exponential backoff once they pile up.
 */
export class FillRetryPolicy {
  private readonly state = new Map<string, FillFailureState>();

  constructor(
    private readonly policy: FillRetryConfig,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Calculate the suspension after `failures` consecutive failures:
   * baseDelay * (multiplier ^ failures), capped at maxDelay.
   */
  calculateDelay(failures: number): number {
    const exponentialDelay = this.policy.baseDelayMs * Math.pow(this.policy.backoffMultiplier, failures);
    return Math.floor(Math.min(exponentialDelay, this.policy.maxDelayMs));
  }

  canAttempt(type: string): boolean {
    const entry = this.state.get(type);
    return !entry || entry.suspendedUntil <= this.now();
  }

  /**
   * Record a failure. Returns the suspension in milliseconds, or 0 while
   * the type is still under its attempt budget.
   */
  recordFailure(type: string): number {
    const entry = this.state.get(type) ?? { failures: 0, suspendedUntil: 0 };
    entry.failures += 1;

    let delay = 0;
    if (entry.failures >= this.policy.maxAttempts) {
      delay = this.calculateDelay(entry.failures);
      entry.suspendedUntil = this.now() + delay;
    }

    this.state.set(type, entry);
    return delay;
  }

  recordSuccess(type: string): void {
    this.state.delete(type);
  }

  failures(type: string): number {
    return this.state.get(type)?.failures ?? 0;
  }
}
