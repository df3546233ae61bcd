import { errorMessage } from './errors';

export type JitterStrategy = 'none' | 'full';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: JitterStrategy;
}

export interface RetryDecision {
  retry: boolean;
  delayHintMs?: number; // Server-provided delay, e.g. from a Retry-After header; above maxDelayMs it ends the retries
}

export type RetryClassifier = (error: unknown, attempt: number) => RetryDecision;

export interface RetryHooks {
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitter: 'none'
};

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retry with exponential backoff. What counts as retryable is decided by the
 * call site through a classifier, so the same policy serves every upstream.
 */
export class RetryPolicy {
  private readonly options: RetryPolicyOptions;

  constructor(options: Partial<RetryPolicyOptions> = {}, private hooks: RetryHooks = {}) {
    this.options = { ...DEFAULT_RETRY_POLICY, ...options };
    if (this.options.maxAttempts < 1) {
      throw new RangeError('Retry policy needs at least one attempt');
    }
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  /**
   * Backoff for a zero-based attempt number.
   */
  public delayFor(attempt: number): number {
    const delay = Math.min(this.options.baseDelayMs * Math.pow(2, attempt), this.options.maxDelayMs);

    if (this.options.jitter === 'full') {
      const random = this.hooks.random ?? Math.random;
      return Math.floor(random() * delay);
    }
    return delay;
  }

  public async execute<T>(operation: (attempt: number) => Promise<T>, classify: RetryClassifier): Promise<T> {
    const wait = this.hooks.sleep ?? sleep;
    let lastError: unknown;

    for (let attempt = 0; attempt < this.options.maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error;
        const decision = classify(error, attempt);

        if (!decision.retry || attempt === this.options.maxAttempts - 1) {
          throw error;
        }

        // A server asking for a longer wait than we allow is left to the caller
        if (decision.delayHintMs !== undefined && decision.delayHintMs > this.options.maxDelayMs) {
          throw error;
        }

        const delay = decision.delayHintMs ?? this.delayFor(attempt);
        this.hooks.onRetry?.(error, attempt, delay);
        await wait(delay);
      }
    }

    throw new Error(`Failed after ${this.options.maxAttempts} attempts: ${errorMessage(lastError)}`);
  }
}
