import { RateLimitedError, RunCancelledError, classifyFailure, toError, type FailureClass } from './errors.js';

export interface BackoffPolicy {
  /** Delay before the first retry, doubled on every further attempt */
  baseDelayMs: number;
  /** Upper bound for the computed delay (a server-supplied wait may exceed it) */
  maxDelayMs: number;
  /** Symmetric jitter as a fraction of the exponential delay (0.25 = ±25%) */
  jitterFraction: number;
}

export interface RetryOptions extends BackoffPolicy {
  /** Retries after the initial attempt; total attempts = maxRetries + 1 */
  maxRetries: number;
  /** Invoked before each sleep with the 1-based number of the attempt about to run */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  classify?: (error: unknown) => FailureClass;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  signal?: AbortSignal;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 5000,
  maxDelayMs: 60000,
  jitterFraction: 0.25,
};

const DEFAULT_OPTIONS: RetryOptions = {
  ...DEFAULT_BACKOFF,
  maxRetries: 3,
};

/**
 * Jittered exponential delay for a 0-based attempt.
 *
 * Formula: min(maxDelay, baseDelay * 2^attempt * (1 ± jitterFraction))
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, attempt);
  const jitter = 1 + (random() * 2 - 1) * policy.jitterFraction;
  return Math.min(exponential * jitter, policy.maxDelayMs);
}

/**
 * Delay to wait after `error` on `attempt`. A rate-limit failure that carries a
 * server minimum never waits less than that minimum, even above the ceiling.
 */
export function retryDelayFor(
  error: unknown,
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const computed = computeBackoffDelay(attempt, policy, random);
  if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
    return Math.max(computed, error.retryAfterMs);
  }
  return computed;
}

/**
 * Run `fn` until it succeeds, a fatal failure occurs, or retries run out.
 * Fatal failures are rethrown on the spot; after the last retry the final
 * failure is rethrown unchanged.
 *
 * @example
 * const page = await withRetry(() => client.fetchPage(cursor), {
 *   maxRetries: 3,
 *   onRetry: (error, attempt, delayMs) => log.warn('Retrying page', { attempt, delayMs, error: error.message }),
 * });
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };
  const classify = opts.classify ?? classifyFailure;
  const wait = opts.sleep ?? sleep;
  const random = opts.random ?? Math.random;

  for (let attempt = 0; ; attempt++) {
    if (opts.signal?.aborted) {
      throw new RunCancelledError('aborted before attempt');
    }

    try {
      return await fn(attempt);
    } catch (error) {
      if (classify(error) === 'fatal' || attempt >= opts.maxRetries) {
        throw error;
      }

      const delayMs = retryDelayFor(error, attempt, opts, random);
      opts.onRetry?.(toError(error), attempt + 1, delayMs);
      await wait(delayMs, opts.signal);
    }
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
