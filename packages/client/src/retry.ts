/**
 * Retry policy shared by the HTTP transport (transient 5xx, 429, network
 * failures) and the coordinator (wallet lock conflicts).
 *
 * Delay before retry n (zero-based): min(baseDelayMs * 2^n + U(0, jitterMs), maxDelayMs)
 */

export interface RetryConfig {
  /** Attempts including the first. Default: 3 */
  readonly maxAttempts: number;
  /** Default: 500 */
  readonly baseDelayMs: number;
  /** Default: 8000 */
  readonly maxDelayMs: number;
  /** Default: 100 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitterMs: 100,
};

export type SleepFn = (ms: number) => Promise<void>;

export interface RetryEvent {
  /** 1 for the first retry */
  readonly retry: number;
  readonly delayMs: number;
  readonly error: unknown;
}

export interface RetryOptions {
  /** Errors outside this predicate are thrown at once */
  readonly retryable: (err: unknown) => boolean;
  readonly sleepFn?: SleepFn | undefined;
  readonly onRetry?: ((event: RetryEvent) => void) | undefined;
  /**
   * Replaces the last error once every attempt has failed.
   * Default: the last error is thrown as is.
   */
  readonly onExhausted?: ((lastError: unknown, attempts: number) => Error) | undefined;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(
  retryIndex: number,
  config: RetryConfig,
  random: () => number = Math.random,
): number {
  const exponential = config.baseDelayMs * 2 ** retryIndex;
  return Math.min(exponential + random() * config.jitterMs, config.maxDelayMs);
}

/**
 * Run `fn` until it succeeds, throws a non-retryable error, or the
 * attempt budget runs out.
 */
export async function retrying<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig,
  options: RetryOptions,
): Promise<T> {
  const sleepFn = options.sleepFn ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err: unknown) {
      if (!options.retryable(err)) {
        throw err;
      }
      const attempts = attempt + 1;
      if (attempts >= config.maxAttempts) {
        throw options.onExhausted !== undefined ? options.onExhausted(err, attempts) : err;
      }
      const delayMs = backoffDelay(attempt, config);
      options.onRetry?.({ retry: attempts, delayMs, error: err });
      await sleepFn(delayMs);
    }
  }
}
