import {
  CollectionError,
  MalformedResponseError,
  NetworkFailureError,
  RateLimitedError,
  RunCancelledError,
  UpstreamClientError,
  UpstreamServerError,
  errorMessage,
} from './errors.js';

export const DEFAULT_RETRY_AFTER_MS = 60_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchWithTimeoutOptions {
  timeoutMs: number;
  /** Caller cancellation, e.g. run shutdown */
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}

/**
 * fetch() with a per-call deadline that also covers reading the body: `read`
 * runs before the timer is cleared, so a stalled stream still times out.
 * Transport failures and the deadline become NetworkFailureError; a caller
 * abort becomes RunCancelledError.
 */
export async function fetchWithTimeout<R>(
  url: string,
  init: RequestInit,
  options: FetchWithTimeoutOptions,
  read: (response: Response) => Promise<R>,
): Promise<R> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onCallerAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    if (options.signal?.aborted) {
      throw new RunCancelledError('request not sent');
    }
    const fetchImpl = options.fetchImpl ?? fetch;
    const response = await fetchImpl(url, { ...init, signal: controller.signal });
    return await read(response);
  } catch (error) {
    if (timedOut) {
      throw new NetworkFailureError(`Request timeout after ${options.timeoutMs}ms`, error);
    }
    if (options.signal?.aborted) {
      throw error instanceof RunCancelledError ? error : new RunCancelledError('request aborted');
    }
    if (error instanceof CollectionError) throw error;
    throw new NetworkFailureError(errorMessage(error), error);
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }
}

/** Retry-After in seconds; HTTP-date values and garbage fall back to the default. */
export function parseRetryAfter(value: string | null): number {
  if (value === null) return DEFAULT_RETRY_AFTER_MS;
  const seconds = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    return DEFAULT_RETRY_AFTER_MS;
  }
  return Math.round(seconds * 1000);
}

/** Maps a non-2xx response onto the failure taxonomy; null for success. */
export function errorForStatus(response: Response, context: string): CollectionError | null {
  if (response.ok) return null;
  const { status } = response;
  if (status === 429) {
    return new RateLimitedError(parseRetryAfter(response.headers.get('retry-after')), `${context}: rate limited`);
  }
  if (status >= 500) {
    return new UpstreamServerError(status, `${context}: HTTP ${status}`);
  }
  if (status === 404) {
    return new UpstreamClientError(status, `${context}: not found`);
  }
  return new UpstreamClientError(status, `${context}: HTTP ${status}`);
}

export async function readJson(response: Response, context: string): Promise<unknown> {
  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new NetworkFailureError(`${context}: failed reading body (${errorMessage(error)})`, error);
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (error) {
    throw new MalformedResponseError(`${context}: response is not valid JSON`, error);
  }
}
