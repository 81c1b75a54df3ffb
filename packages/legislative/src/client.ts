import { z } from 'zod';
import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  MalformedResponseError,
  QuotaExceededError,
  UpstreamClientError,
  errorForStatus,
  fetchWithTimeout,
  nullLogger,
  readJson,
  withRetry,
  type FetchLike,
  type Logger,
  type RetryOptions,
} from '@collector/shared';
import type { BudgetGuard } from '@collector/engine';
import { flattenNumberedEntries } from './numbered.js';
import {
  billDetailSchema,
  billSearchItemSchema,
  errorEnvelopeSchema,
  masterListEntrySchema,
  searchSummarySchema,
  sessionDetailSchema,
  sessionInfoSchema,
  type BillDetail,
  type MasterList,
  type MasterListEntry,
  type SearchResult,
  type SessionInfo,
} from './types.js';

export const DEFAULT_LEGISLATIVE_BASE_URL = 'https://api.legiscan.com';

const QUOTA_MESSAGE = /limit|quota/i;

/** A reply with `status: "ERROR"` that is not about quota. */
export class LegislativeApiError extends UpstreamClientError {
  constructor(message: string, status = 200) {
    super(status, `Legislative API error: ${message}`);
    this.name = 'LegislativeApiError';
  }
}

export interface LegislativeClientConfig {
  apiKey: string;
  /** Shared by every call made during one session */
  budget: BudgetGuard;
  baseUrl?: string;
  userAgent?: string;
  requestTimeoutMs?: number;
  retry?: Partial<RetryOptions>;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

type Params = Record<string, string>;

const masterListResponseSchema = z.object({
  masterlist: z.record(z.unknown()),
});

const sessionListResponseSchema = z.object({
  sessions: z.array(sessionInfoSchema),
});

const billResponseSchema = z.object({
  bill: billDetailSchema,
});

const searchResponseSchema = z.object({
  searchresult: z.record(z.unknown()),
});

/**
 * Metered client for the legislative data API.
 *
 * Each public method is one logical call: it reserves one unit of the shared
 * budget before any network I/O (retries of that call reserve nothing), then
 * checks the reply envelope before decoding the typed payload. The API key
 * only ever appears in the request URL, never in logs or error messages.
 */
export class LegislativeClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly budget: BudgetGuard;
  private readonly userAgent: string;
  private readonly requestTimeoutMs: number;
  private readonly retry: Partial<RetryOptions>;
  private readonly fetchImpl?: FetchLike;
  private readonly logger: Logger;

  constructor(config: LegislativeClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? DEFAULT_LEGISLATIVE_BASE_URL).replace(/\/+$/, '');
    this.budget = config.budget;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retry = config.retry ?? {};
    this.fetchImpl = config.fetchImpl;
    this.logger = config.logger ?? nullLogger;
  }

  get requestsUsed(): number {
    return this.budget.usedCount;
  }

  async getMasterList(state: string, signal?: AbortSignal): Promise<MasterList> {
    const body = await this.call('getMasterList', { state: state.toUpperCase() }, masterListResponseSchema, signal);
    return this.toMasterList(body.masterlist, `getMasterList(state=${state})`);
  }

  async getMasterListBySession(sessionId: number, signal?: AbortSignal): Promise<MasterList> {
    const body = await this.call('getMasterList', { id: String(sessionId) }, masterListResponseSchema, signal);
    return this.toMasterList(body.masterlist, `getMasterList(id=${sessionId})`);
  }

  async getSessionList(state: string, signal?: AbortSignal): Promise<SessionInfo[]> {
    const body = await this.call('getSessionList', { state: state.toUpperCase() }, sessionListResponseSchema, signal);
    return body.sessions;
  }

  async getBill(billId: number, signal?: AbortSignal): Promise<BillDetail> {
    const body = await this.call('getBill', { id: String(billId) }, billResponseSchema, signal);
    return body.bill;
  }

  async searchBills(query: string, state?: string, signal?: AbortSignal): Promise<SearchResult> {
    const params: Params = { query };
    if (state) params.state = state.toUpperCase();
    const body = await this.call('search', params, searchResponseSchema, signal);

    const context = `search(query=${query})`;
    const summary = searchSummarySchema.safeParse(body.searchresult.summary);
    if (!summary.success) {
      throw malformed(context, summary.error);
    }
    const results = flattenNumberedEntries(body.searchresult).flatMap((entry) => {
      const item = billSearchItemSchema.safeParse(entry);
      return item.success ? [item.data] : [];
    });
    return { summary: summary.data, results };
  }

  buildUrl(op: string, params: Params = {}): string {
    const query = new URLSearchParams({ key: this.apiKey, op, ...params });
    return `${this.baseUrl}/?${query.toString()}`;
  }

  private async call<T>(
    op: string,
    params: Params,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<T> {
    this.budget.reserve();

    const url = this.buildUrl(op, params);
    const context = describeCall(op, params);

    const body = await withRetry(
      async () => {
        return fetchWithTimeout(
          url,
          { method: 'GET', headers: { Accept: 'application/json', 'User-Agent': this.userAgent } },
          { timeoutMs: this.requestTimeoutMs, signal, fetchImpl: this.fetchImpl },
          async (response) => {
            const failure = errorForStatus(response, context);
            if (failure) throw failure;
            return readJson(response, context);
          },
        );
      },
      {
        ...this.retry,
        signal,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn('Retrying legislative call', { op: context, attempt, delayMs, error: error.message });
        },
      },
    );

    checkEnvelope(body, context);

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw malformed(context, parsed.error);
    }
    return parsed.data;
  }

  private toMasterList(masterlist: Record<string, unknown>, context: string): MasterList {
    const session = sessionDetailSchema.safeParse(masterlist.session);
    if (!session.success) {
      throw malformed(context, session.error);
    }

    const entries: MasterListEntry[] = [];
    for (const raw of flattenNumberedEntries(masterlist)) {
      const entry = masterListEntrySchema.safeParse(raw);
      if (entry.success) {
        entries.push(entry.data);
      } else {
        this.logger.warn('Skipping malformed master list entry', { op: context, error: entry.error.message });
      }
    }
    return { session: session.data, entries };
  }
}

/** Throws for an error envelope; quota and limit messages become QuotaExceededError. */
export function checkEnvelope(body: unknown, context: string): void {
  const envelope = errorEnvelopeSchema.safeParse(body);
  if (!envelope.success) return;

  const message = envelope.data.alert?.message ?? 'unknown error';
  if (QUOTA_MESSAGE.test(message)) {
    throw new QuotaExceededError(`${context}: ${message}`);
  }
  throw new LegislativeApiError(`${context}: ${message}`);
}

function describeCall(op: string, params: Params): string {
  const args = Object.entries(params)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
  return `${op}(${args})`;
}

function malformed(context: string, error: z.ZodError): MalformedResponseError {
  const issue = error.issues[0];
  const detail = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'schema mismatch';
  return new MalformedResponseError(`${context}: unexpected payload (${detail})`, error);
}
