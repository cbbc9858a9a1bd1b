/**
 * Retry policy and timeouts for collaborator calls.
 *
 * One policy type covers provisioning, generation and notification: exponential
 * backoff from a base delay, capped, with proportional jitter, and a predicate
 * deciding which errors are worth another attempt.
 */

export interface RetryPolicyOptions {
  /** Delay before the first retry. */
  baseDelayMs: number;
  /** Growth factor applied per retry. */
  multiplier: number;
  /** Total attempts, including the first. */
  maxAttempts: number;
  /** Upper bound on the delay before jitter. */
  maxDelayMs: number;
  /** Fraction of the delay added as random jitter (0 disables jitter). */
  jitter: number;
  /** Whether a failed attempt may be retried. */
  isRetryable: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  /** Source of randomness in [0, 1). */
  random?: () => number;
}

/** Passed to onRetry before each backoff sleep. */
export interface RetryAttemptInfo {
  /** The attempt that just failed (1-based). */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryHooks {
  onRetry?: (info: RetryAttemptInfo) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RetryPolicy {
  readonly baseDelayMs: number;
  readonly multiplier: number;
  readonly maxAttempts: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly options: RetryPolicyOptions) {
    if (options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be at least 1, got ${options.maxAttempts}`);
    }
    this.baseDelayMs = options.baseDelayMs;
    this.multiplier = options.multiplier;
    this.maxAttempts = options.maxAttempts;
    this.maxDelayMs = options.maxDelayMs;
    this.jitter = options.jitter;
    this.isRetryable = options.isRetryable;
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /** Copy of this policy with some options replaced. */
  with(overrides: Partial<RetryPolicyOptions>): RetryPolicy {
    return new RetryPolicy({ ...this.options, ...overrides });
  }

  /**
   * Delay before retry number `retry` (1 = after the first failed attempt),
   * without jitter: base × multiplier^(retry−1), capped at maxDelayMs.
   */
  baseDelayFor(retry: number): number {
    return Math.min(this.baseDelayMs * Math.pow(this.multiplier, retry - 1), this.maxDelayMs);
  }

  /** Delay before retry number `retry`, with jitter applied. */
  delayFor(retry: number): number {
    const delay = this.baseDelayFor(retry);
    return Math.round(delay + delay * this.jitter * this.random());
  }

  /**
   * Run an operation until it succeeds, fails with a non-retryable error, or
   * the attempts run out. The last error is rethrown unchanged.
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, hooks?: RetryHooks): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (attempt >= this.maxAttempts || !this.isRetryable(error)) {
          throw error;
        }
        const delayMs = this.delayFor(attempt);
        hooks?.onRetry?.({ attempt, delayMs, error });
        await this.sleepFn(delayMs);
      }
    }
  }
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, label = 'Operation') {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a call against a timer. The call itself is not cancelled; its late
 * result is ignored.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  label?: string,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(timeoutMs, label)), timeoutMs);
    let pending: Promise<T>;
    try {
      pending = fn();
    } catch (error) {
      clearTimeout(timer);
      reject(error);
      return;
    }
    pending
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}
