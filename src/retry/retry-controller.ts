import type { ExecutionLedger } from "../core/ledger";
import type { AttemptKey } from "../core/types";

export interface BackoffPolicy {
  baseMs: number;
  factor: number;
  maxMs: number;
}

export interface RetryPolicy {
  defaultCeiling: number;
  ceilings: Partial<Record<AttemptKey, number>>;
  backoff: BackoffPolicy;
}

export interface RetryStatus {
  key: AttemptKey;
  attempts: number;
  ceiling: number;
  remaining: number;
  exhausted: boolean;
  fatal: boolean;
  /** Delay to apply before the next attempt; 0 unless the last attempts failed. */
  backoffMs: number;
}

export class RetryController {
  constructor(private readonly policy: RetryPolicy) {}

  ceiling(key: AttemptKey): number {
    return this.policy.ceilings[key] ?? this.policy.defaultCeiling;
  }

  /** Exponential delay for the n-th consecutive failure (n >= 1). */
  backoffFor(consecutiveFailures: number): number {
    if (consecutiveFailures <= 0) {
      return 0;
    }
    const { baseMs, factor, maxMs } = this.policy.backoff;
    return Math.min(baseMs * factor ** (consecutiveFailures - 1), maxMs);
  }

  evaluate(key: AttemptKey, ledger: ExecutionLedger): RetryStatus {
    const attempts = ledger.attemptsFor(key);
    const ceiling = this.ceiling(key);
    const fatal = ledger.hasFatal(key);
    const remaining = fatal ? 0 : Math.max(ceiling - attempts, 0);

    return {
      key,
      attempts,
      ceiling,
      remaining,
      exhausted: remaining === 0,
      fatal,
      backoffMs: this.backoffFor(ledger.consecutiveFailures(key)),
    };
  }
}
