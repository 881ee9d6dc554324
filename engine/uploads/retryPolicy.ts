export interface RetryDecision {
  shouldRetry: boolean;
  delayMs: number;
  reason: string;
  terminal: boolean;
  attempt: number;
}

/**
 * What went wrong with one transport attempt.
 */
export type TransportFailure =
  | { kind: 'status'; status: number }
  | { kind: 'network'; message: string };

export interface FailureClassification {
  retryable: boolean;
  reason: string;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 1_000;

const RETRYABLE_CLIENT_STATUSES: ReadonlySet<number> = new Set([408, 429]);

/**
 * Retryable statuses are exactly 408, 429 and every 5xx.
 */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 || RETRYABLE_CLIENT_STATUSES.has(status);
}

const classifyFailure = (failure: TransportFailure): FailureClassification => {
  if (failure.kind === 'network') {
    return { retryable: true, reason: `Network error: ${failure.message}` };
  }

  return {
    retryable: isRetryableStatus(failure.status),
    reason: `HTTP ${failure.status}`,
  };
};

export interface RetryPolicyOptions {
  /** Total attempt ceiling, first attempt included. */
  maxRetries?: number;
  baseDelayMs?: number;
  /** Optional ceiling on a single delay; uncapped when absent. */
  maxDelayMs?: number;
}

export class RetryPolicy {
  readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs?: number;

  constructor(options?: RetryPolicyOptions) {
    this.maxRetries = Math.max(1, Math.floor(options?.maxRetries ?? DEFAULT_MAX_RETRIES));
    this.baseDelayMs = options?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = options?.maxDelayMs;
  }

  classify(failure: TransportFailure): FailureClassification {
    return classifyFailure(failure);
  }

  /**
   * Delay to wait after `failedAttempt` before the next one: 1x, 2x, 4x... the base.
   */
  computeDelayMs(failedAttempt: number): number {
    const raw = this.baseDelayMs * 2 ** (failedAttempt - 1);
    return this.maxDelayMs === undefined ? raw : Math.min(raw, this.maxDelayMs);
  }

  decide(currentAttempt: number, failure: TransportFailure): RetryDecision {
    // currentAttempt is 1-indexed (1 is the first attempt that just failed)
    const classification = this.classify(failure);

    if (!classification.retryable) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: classification.reason,
        terminal: true,
        attempt: currentAttempt,
      };
    }

    if (currentAttempt >= this.maxRetries) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Retry limit reached (${this.maxRetries}) after attempt ${currentAttempt}: ${classification.reason}`,
        terminal: true,
        attempt: currentAttempt,
      };
    }

    return {
      shouldRetry: true,
      delayMs: this.computeDelayMs(currentAttempt),
      reason: classification.reason,
      terminal: false,
      attempt: currentAttempt,
    };
  }
}
