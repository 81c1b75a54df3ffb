export type FailureClass = 'retriable' | 'fatal';

export type CollectionErrorCode =
  | 'NETWORK_FAILURE'
  | 'RATE_LIMITED'
  | 'UPSTREAM_SERVER_ERROR'
  | 'UPSTREAM_CLIENT_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'BUDGET_EXCEEDED'
  | 'QUOTA_EXCEEDED'
  | 'PAGINATION_LIMIT_EXCEEDED'
  | 'INVALID_TRANSITION'
  | 'PRECONDITION_FAILED'
  | 'RUN_CANCELLED';

/**
 * Base class for every failure the collection pipeline raises on purpose.
 * `retriable` is fixed per subclass; callers branch on `code`, never on message text.
 */
export class CollectionError extends Error {
  readonly code: CollectionErrorCode;
  readonly retriable: boolean;

  constructor(code: CollectionErrorCode, message: string, retriable: boolean, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CollectionError';
    this.code = code;
    this.retriable = retriable;
  }
}

export class NetworkFailureError extends CollectionError {
  constructor(message: string, cause?: unknown) {
    super('NETWORK_FAILURE', message, true, cause);
    this.name = 'NetworkFailureError';
  }
}

export class RateLimitedError extends CollectionError {
  /** Minimum wait the server asked for, when it sent one. */
  readonly retryAfterMs: number | undefined;

  constructor(retryAfterMs?: number, message = 'Upstream rate limit reached') {
    super('RATE_LIMITED', message, true);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class UpstreamServerError extends CollectionError {
  readonly status: number;

  constructor(status: number, message = `Upstream server error (HTTP ${status})`) {
    super('UPSTREAM_SERVER_ERROR', message, true);
    this.name = 'UpstreamServerError';
    this.status = status;
  }
}

export class UpstreamClientError extends CollectionError {
  readonly status: number;

  constructor(status: number, message = `Upstream rejected request (HTTP ${status})`) {
    super('UPSTREAM_CLIENT_ERROR', message, false);
    this.name = 'UpstreamClientError';
    this.status = status;
  }
}

export class MalformedResponseError extends CollectionError {
  constructor(message: string, cause?: unknown) {
    super('MALFORMED_RESPONSE', message, false, cause);
    this.name = 'MalformedResponseError';
  }
}

/** Local request budget is spent. Soft stop: the run keeps what it already collected. */
export class BudgetExceededError extends CollectionError {
  readonly used: number;
  readonly ceiling: number;

  constructor(used: number, ceiling: number) {
    super('BUDGET_EXCEEDED', `Request budget exhausted (${used}/${ceiling})`, false);
    this.name = 'BudgetExceededError';
    this.used = used;
    this.ceiling = ceiling;
  }
}

/** The provider reported its own quota as exhausted. Hard stop, never retried. */
export class QuotaExceededError extends CollectionError {
  constructor(message: string) {
    super('QUOTA_EXCEEDED', message, false);
    this.name = 'QuotaExceededError';
  }
}

export class PaginationLimitExceededError extends CollectionError {
  readonly maxPages: number;

  constructor(maxPages: number) {
    super('PAGINATION_LIMIT_EXCEEDED', `Pagination exceeded ${maxPages} pages`, false);
    this.name = 'PaginationLimitExceededError';
    this.maxPages = maxPages;
  }
}

export class InvalidTransitionError extends CollectionError {
  readonly runId: string;
  readonly expected: readonly string[];
  /** Status found in the store, or null when the run does not exist. */
  readonly actual: string | null;

  constructor(runId: string, expected: readonly string[], actual: string | null) {
    super(
      'INVALID_TRANSITION',
      `Run ${runId} is ${actual ?? 'missing'}, expected ${expected.join(' or ')}`,
      false,
    );
    this.name = 'InvalidTransitionError';
    this.runId = runId;
    this.expected = expected;
    this.actual = actual;
  }
}

export class PreconditionFailedError extends CollectionError {
  constructor(message: string) {
    super('PRECONDITION_FAILED', message, false);
    this.name = 'PreconditionFailedError';
  }
}

export class RunCancelledError extends CollectionError {
  constructor(reason: string) {
    super('RUN_CANCELLED', `Cancelled: ${reason}`, false);
    this.name = 'RunCancelledError';
  }
}

const NETWORK_MESSAGE_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'enotfound',
  'enetunreach',
  'ehostunreach',
  'epipe',
  'socket hang up',
  'network error',
  'fetch failed',
  'timed out',
  'timeout',
];

/**
 * Decide whether a failure may be retried.
 *
 * Typed errors carry their own answer. Anything else is retriable only when
 * it looks like a transport failure; unknown errors are fatal.
 */
export function classifyFailure(error: unknown): FailureClass {
  if (error instanceof CollectionError) {
    return error.retriable ? 'retriable' : 'fatal';
  }
  if (error instanceof Error) {
    const text = `${error.name} ${error.message}`.toLowerCase();
    if (NETWORK_MESSAGE_PATTERNS.some((pattern) => text.includes(pattern))) {
      return 'retriable';
    }
  }
  return 'fatal';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
