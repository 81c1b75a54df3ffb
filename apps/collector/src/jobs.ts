import {
  NotifyCategory,
  PreconditionFailedError,
  RUN_KIND_PRODUCTS,
  RUN_KIND_REGULATORY_BILLS,
  formatDuration,
  notify as slackNotify,
  type ChangeHashStore,
  type FetchLike,
  type Logger,
  type NotifyOptions,
  type RecordSink,
  type RetryOptions,
  type RunStore,
} from '@collector/shared';
import { BudgetGuard, JobRegistry, RunCoordinator, type CollectionJob, type RunResult } from '@collector/engine';
import { StorefrontClient, createProductCollector, type BrandTarget } from '@collector/storefront';
import { LegislativeClient, billEntityKey, createBillCollection, type BillCandidate } from '@collector/legislative';
import { retryOptions, type CollectorConfig } from './config.js';

export const PRODUCTS_JOB = 'products';
export const REGULATORY_JOB = 'regulatory_bills';

export interface JobDependencies {
  config: CollectorConfig;
  runs: RunStore;
  hashes: ChangeHashStore;
  records: RecordSink;
  logger: Logger;
  loadBrands: () => Promise<BrandTarget[]>;
  fetchImpl?: FetchLike;
  notify?: (options: NotifyOptions) => Promise<void>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

export interface ProductsJobOptions {
  /** Restrict the run to one brand */
  brandKey?: string;
}

export interface RegulatoryJobOptions {
  states: readonly string[];
  keywords: readonly string[];
  allSessions?: boolean;
  /** Overrides LEGISLATIVE_MAX_REQUESTS for this job */
  maxRequests?: number;
}

function coordinatorFor(deps: JobDependencies): RunCoordinator {
  return new RunCoordinator({
    runs: deps.runs,
    logger: deps.logger,
    maxIdleMs: deps.config.maxRunIdleMs > 0 ? deps.config.maxRunIdleMs : undefined,
    now: deps.now,
  });
}

function retryFor(deps: JobDependencies): Partial<RetryOptions> {
  return deps.sleep ? { ...retryOptions(deps.config), sleep: deps.sleep } : retryOptions(deps.config);
}

export function selectBrands(brands: readonly BrandTarget[], brandKey?: string): BrandTarget[] {
  if (!brandKey) return [...brands];
  const match = brands.find((brand) => brand.key === brandKey);
  if (!match) {
    throw new PreconditionFailedError(`Unknown brand '${brandKey}'`);
  }
  return [match];
}

export function runSummary(result: RunResult): string {
  const { totals } = result;
  const parts = [
    `${totals.succeeded}/${totals.attempted} entities succeeded`,
    `${totals.failed} failed`,
    `${totals.skipped} skipped`,
    `${result.notAttempted.length} not attempted`,
    `${totals.recordsProcessed} records`,
  ];
  return parts.join(', ');
}

const STATUS_CATEGORY: Record<RunResult['status'], NotifyCategory> = {
  succeeded: NotifyCategory.RUN_COMPLETED,
  partial: NotifyCategory.RUN_PARTIAL_SUCCESS,
  failed: NotifyCategory.RUN_FAILED,
};

/** Posts the run outcome, plus a quota alert when the upstream allowance ran out. */
export async function announceRun(
  result: RunResult,
  startedAt: Date,
  completedAt: Date,
  send: (options: NotifyOptions) => Promise<void> = slackNotify,
): Promise<void> {
  const context: Record<string, string> = {
    runId: result.runId,
    runKind: result.runKind,
    duration: formatDuration(startedAt, completedAt),
  };
  const message = result.errorMessage ? `${runSummary(result)}\n${result.errorMessage}` : runSummary(result);

  await send({
    category: STATUS_CATEGORY[result.status],
    title: `${result.runKind} run ${result.status}`,
    message,
    context,
  });

  if (result.quotaExhausted) {
    await send({
      category: NotifyCategory.QUOTA_EXHAUSTED,
      title: `${result.runKind} upstream quota exhausted`,
      message: `${result.outcomes.filter((o) => o.status === 'failed').length} entities could not be collected`,
      context,
    });
  }
}

async function runAndAnnounce(deps: JobDependencies, execute: () => Promise<RunResult>): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const result = await execute();
  await announceRun(result, startedAt, now(), deps.notify);
  return result;
}

export function createProductsJob(deps: JobDependencies, options: ProductsJobOptions = {}): CollectionJob {
  const { config } = deps;

  return {
    name: PRODUCTS_JOB,
    description: 'Sync product catalogs from every configured brand storefront',
    run: ({ triggerSource, signal }) =>
      runAndAnnounce(deps, () => {
        const client = new StorefrontClient({
          userAgent: config.userAgent,
          requestTimeoutMs: config.requestTimeoutMs,
          fetchImpl: deps.fetchImpl,
        });
        const collect = createProductCollector({
          client,
          records: deps.records,
          interPageDelayMs: config.interPageDelayMs,
          retry: retryFor(deps),
          sleep: deps.sleep,
        });

        return coordinatorFor(deps).runCollection<BrandTarget>({
          runKind: RUN_KIND_PRODUCTS,
          triggerSource,
          signal,
          concurrency: config.maxConcurrentEntities,
          targets: async () => selectBrands(await deps.loadBrands(), options.brandKey),
          keyOf: (brand) => brand.key,
          collect,
        });
      }),
  };
}

export function createRegulatoryJob(deps: JobDependencies, options: RegulatoryJobOptions): CollectionJob {
  const { config } = deps;
  const missingKey = async (): Promise<never> => {
    throw new PreconditionFailedError('LEGISLATIVE_API_KEY is not set');
  };

  return {
    name: REGULATORY_JOB,
    description: 'Ingest regulatory bills matching the configured keywords',
    run: ({ triggerSource, signal }) =>
      runAndAnnounce(deps, () => {
        const apiKey = config.legislative.apiKey;
        // One budget per run; the ceiling is the upstream session allowance
        const collection = apiKey
          ? createBillCollection({
              client: new LegislativeClient({
                apiKey,
                budget: new BudgetGuard(options.maxRequests ?? config.legislative.maxRequests),
                baseUrl: config.legislative.baseUrl,
                userAgent: config.userAgent,
                requestTimeoutMs: config.requestTimeoutMs,
                retry: retryFor(deps),
                fetchImpl: deps.fetchImpl,
                logger: deps.logger,
              }),
              hashes: deps.hashes,
              records: deps.records,
              states: options.states,
              keywords: options.keywords,
              allSessions: options.allSessions,
            })
          : null;

        return coordinatorFor(deps).runCollection<BillCandidate>({
          runKind: RUN_KIND_REGULATORY_BILLS,
          triggerSource,
          signal,
          concurrency: config.maxConcurrentEntities,
          targets: collection ? collection.resolve : missingKey,
          keyOf: billEntityKey,
          collect: collection ? collection.collect : missingKey,
        });
      }),
  };
}

/**
 * Registers the recurring jobs. The regulatory job is only registered when
 * it has states to scan.
 */
export function buildJobRegistry(deps: JobDependencies): JobRegistry {
  const registry = new JobRegistry();
  registry.register(createProductsJob(deps));

  const { regulatoryStates, regulatoryKeywords } = deps.config.schedule;
  if (regulatoryStates.length > 0) {
    registry.register(
      createRegulatoryJob(deps, { states: regulatoryStates, keywords: regulatoryKeywords }),
    );
  }
  return registry;
}
