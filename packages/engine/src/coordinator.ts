import {
  BudgetExceededError,
  DEFAULT_MAX_CONCURRENT_ENTITIES,
  QuotaExceededError,
  RunCancelledError,
  capErrorMessage,
  errorMessage,
  errorOutcome,
  noteOutcome,
  processWithConcurrency,
  type EntityOutcome,
  type Logger,
  type OutcomeStatus,
  type RunStore,
  type RunTotals,
  type TerminalRunStatus,
  type TriggerSource,
} from '@collector/shared';
import { RunWatchdog } from './watchdog.js';

/** What a per-entity collector reports when it finishes without throwing. */
export interface EntityResult {
  status: Exclude<OutcomeStatus, 'failed'>;
  recordsProcessed: number;
  note?: string;
}

export interface EntityContext {
  runId: string;
  entityKey: string;
  /** Aborted on shutdown or when the run is force-failed */
  signal: AbortSignal;
  logger: Logger;
  /** Report progress to the run watchdog, e.g. after each page */
  progress(): void;
}

export type EntityCollector<T> = (target: T, ctx: EntityContext) => Promise<EntityResult>;

export interface ResolvedTargets<T> {
  targets: T[];
  /** Work that could not even be listed (e.g. a jurisdiction discovery never ran) */
  unresolved?: string[];
  budgetExhausted?: boolean;
}

export interface ResolverContext {
  runId: string;
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Produces the entity list once the run is running. Throwing here is a
 * run-level precondition failure and fails the run before any entity starts.
 */
export type TargetResolver<T> = (ctx: ResolverContext) => Promise<T[] | ResolvedTargets<T>>;

export interface RunCollectionRequest<T> {
  runKind: string;
  triggerSource?: TriggerSource;
  targets: readonly T[] | TargetResolver<T>;
  keyOf: (target: T) => string;
  collect: EntityCollector<T>;
  concurrency?: number;
  signal?: AbortSignal;
}

export interface RunResult {
  runId: string;
  runKind: string;
  status: TerminalRunStatus;
  /** Ledger rows written by this run, in completion order */
  outcomes: EntityOutcome[];
  /** Entity keys never started because the budget ran out or the run was stopped */
  notAttempted: string[];
  budgetExhausted: boolean;
  quotaExhausted: boolean;
  cancelled: boolean;
  totals: RunTotals;
  errorMessage?: string;
}

export interface RunCoordinatorOptions {
  runs: RunStore;
  logger: Logger;
  /** Force-fail a run with no progress for this long; disabled when unset */
  maxIdleMs?: number;
  watchdogIntervalMs?: number;
  now?: () => Date;
}

export const QUOTA_NOT_ATTEMPTED = 'not attempted: upstream quota exhausted';

type StopReason = 'budget' | 'quota' | 'cancelled' | 'ledger';

type FanOutEnd =
  | { kind: 'done' }
  | { kind: 'crashed'; error: unknown }
  | { kind: 'stalled'; idleMs: number };

export function summarizeOutcomes(outcomes: readonly EntityOutcome[]): RunTotals {
  const totals: RunTotals = { attempted: 0, succeeded: 0, failed: 0, skipped: 0, recordsProcessed: 0 };
  for (const outcome of outcomes) {
    totals.attempted++;
    totals.recordsProcessed += outcome.recordsProcessed;
    if (outcome.status === 'failed') totals.failed++;
    else if (outcome.status === 'skipped') totals.skipped++;
    else totals.succeeded++;
  }
  return totals;
}

/**
 * Final status from the ledger: failed only when every recorded entity
 * failed; partial when anything failed, finished partially, or never ran.
 */
export function classifyRun(outcomes: readonly EntityOutcome[], notAttempted: number): TerminalRunStatus {
  if (outcomes.length > 0 && outcomes.every((outcome) => outcome.status === 'failed')) {
    return 'failed';
  }
  const mixed = outcomes.some((outcome) => outcome.status === 'failed' || outcome.status === 'partial');
  return mixed || notAttempted > 0 ? 'partial' : 'succeeded';
}

/**
 * Marks a run failed, logging and discarding any error from the store so the
 * original failure reason stays the one reported.
 */
export async function failRunBestEffort(
  runs: RunStore,
  runId: string,
  reason: string,
  totals: RunTotals,
  logger: Logger,
): Promise<void> {
  try {
    await runs.failRun(runId, capErrorMessage(reason), totals);
  } catch (secondary) {
    logger.error('Could not mark run as failed', secondary, { runId, originalReason: reason });
  }
}

export class RunCoordinator {
  private readonly runs: RunStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: RunCoordinatorOptions) {
    this.runs = options.runs;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async runCollection<T>(request: RunCollectionRequest<T>): Promise<RunResult> {
    const run = await this.runs.createRun({
      runKind: request.runKind,
      triggerSource: request.triggerSource ?? 'cli',
    });
    const runId = run.runId;
    const log = this.logger.child({ runId, runKind: request.runKind });

    await this.runs.startRun(runId);
    log.info('Run started');

    const controller = new AbortController();
    const onExternalAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onExternalAbort, { once: true });

    try {
      return await this.execute(runId, request, controller, log);
    } finally {
      request.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  private async execute<T>(
    runId: string,
    request: RunCollectionRequest<T>,
    controller: AbortController,
    log: Logger,
  ): Promise<RunResult> {
    const base = { runId, runKind: request.runKind };

    let resolved: ResolvedTargets<T>;
    try {
      resolved = await this.resolve(request, { runId, signal: controller.signal, logger: log });
    } catch (error) {
      const reason = `precondition failed: ${errorMessage(error)}`;
      log.error('Run precondition failed', error);
      const totals = summarizeOutcomes([]);
      await failRunBestEffort(this.runs, runId, reason, totals, log);
      return {
        ...base,
        status: 'failed',
        outcomes: [],
        notAttempted: [],
        budgetExhausted: error instanceof BudgetExceededError,
        quotaExhausted: error instanceof QuotaExceededError,
        cancelled: false,
        totals,
        errorMessage: reason,
      };
    }

    const targets = resolved.targets;
    const outcomes = new Map<string, EntityOutcome>();
    const notAttempted: string[] = [...(resolved.unresolved ?? [])];
    // Entities whose outcome never reached the store
    const unrecorded: string[] = [];
    const state: { stopReason: StopReason | null; finalized: boolean } = { stopReason: null, finalized: false };

    const stalled = deferred<number>();
    const watchdog = this.options.maxIdleMs
      ? new RunWatchdog({
          maxIdleMs: this.options.maxIdleMs,
          checkIntervalMs: this.options.watchdogIntervalMs,
          onStall: (idleMs) => stalled.resolve(idleMs),
        })
      : null;

    const record = async (
      entityKey: string,
      status: OutcomeStatus,
      recordsProcessed: number,
      message?: EntityOutcome['message'],
    ): Promise<void> => {
      if (state.finalized) {
        log.warn('Ignoring outcome for a finalized run', { entityKey, status });
        return;
      }
      const outcome: EntityOutcome = { runId, entityKey, status, recordsProcessed, message, recordedAt: this.now() };
      watchdog?.touch();
      try {
        await this.runs.upsertEntityOutcome(outcome);
        outcomes.set(entityKey, outcome);
      } catch (error) {
        unrecorded.push(entityKey);
        state.stopReason = 'ledger';
        log.error('Failed to write entity outcome, stopping dispatch', error, { entityKey, status });
      }
    };

    const processTarget = async (target: T): Promise<void> => {
      const entityKey = request.keyOf(target);
      const entityLog = log.child({ entityKey });

      try {
        const result = await request.collect(target, {
          runId,
          entityKey,
          signal: controller.signal,
          logger: entityLog,
          progress: () => watchdog?.touch(),
        });
        await record(entityKey, result.status, result.recordsProcessed, result.note ? noteOutcome(result.note) : undefined);
        entityLog.info('Entity collected', { status: result.status, recordsProcessed: result.recordsProcessed });
      } catch (error) {
        if (error instanceof BudgetExceededError) {
          state.stopReason ??= 'budget';
          notAttempted.push(entityKey);
          entityLog.warn('Request budget exhausted, stopping dispatch', { used: error.used, ceiling: error.ceiling });
          return;
        }
        if (error instanceof QuotaExceededError) {
          state.stopReason = 'quota';
        }
        entityLog.error('Entity collection failed', error);
        await record(entityKey, 'failed', 0, errorOutcome(capErrorMessage(errorMessage(error))));
      }
    };

    watchdog?.start();
    const fanOut: Promise<FanOutEnd> = processWithConcurrency(
      targets,
      processTarget,
      request.concurrency ?? DEFAULT_MAX_CONCURRENT_ENTITIES,
      {
        shouldContinue: () => {
          if (state.stopReason === null && controller.signal.aborted) state.stopReason = 'cancelled';
          return state.stopReason === null;
        },
      },
    ).then(
      (): FanOutEnd => ({ kind: 'done' }),
      (error: unknown): FanOutEnd => ({ kind: 'crashed', error }),
    );

    const winner = await Promise.race([
      fanOut,
      stalled.promise.then((idleMs): FanOutEnd => ({ kind: 'stalled', idleMs })),
    ]);
    watchdog?.stop();

    if (winner.kind === 'crashed') {
      state.finalized = true;
      log.error('Entity fan-out crashed', winner.error);
      const totals = summarizeOutcomes([...outcomes.values()]);
      await failRunBestEffort(this.runs, runId, `fan-out crashed: ${errorMessage(winner.error)}`, totals, log);
      throw winner.error;
    }

    if (winner.kind === 'stalled') {
      state.finalized = true;
      controller.abort();
      const reason = `run stalled: no progress for ${winner.idleMs}ms`;
      log.error('Run watchdog fired, failing run', undefined, { idleMs: winner.idleMs });
      const recorded = [...outcomes.values()];
      const totals = summarizeOutcomes(recorded);
      await failRunBestEffort(this.runs, runId, reason, totals, log);
      return {
        ...base,
        status: 'failed',
        outcomes: recorded,
        notAttempted: targets.map(request.keyOf).filter((key) => !outcomes.has(key)),
        budgetExhausted: state.stopReason === 'budget',
        quotaExhausted: state.stopReason === 'quota',
        cancelled: true,
        totals,
        errorMessage: reason,
      };
    }

    // Targets the fan-out never reached
    const handled = new Set([...outcomes.keys(), ...notAttempted, ...unrecorded]);
    for (const target of targets) {
      const key = request.keyOf(target);
      if (handled.has(key)) continue;
      if (state.stopReason === 'quota') {
        await record(key, 'failed', 0, errorOutcome(QUOTA_NOT_ATTEMPTED));
      } else {
        notAttempted.push(key);
      }
    }
    state.finalized = true;

    const recorded = [...outcomes.values()];
    const totals = summarizeOutcomes(recorded);

    if (unrecorded.length > 0) {
      const reason = `audit trail incomplete: could not record outcome for ${unrecorded.join(', ')}`;
      log.error('Run failed with missing ledger rows', undefined, { unrecorded });
      await failRunBestEffort(this.runs, runId, reason, totals, log);
      return {
        ...base,
        status: 'failed',
        outcomes: recorded,
        notAttempted,
        budgetExhausted: resolved.budgetExhausted === true,
        quotaExhausted: false,
        cancelled: false,
        totals,
        errorMessage: reason,
      };
    }

    const status = classifyRun(recorded, notAttempted.length);
    const result: RunResult = {
      ...base,
      status,
      outcomes: recorded,
      notAttempted,
      budgetExhausted: state.stopReason === 'budget' || resolved.budgetExhausted === true,
      quotaExhausted: state.stopReason === 'quota',
      cancelled: state.stopReason === 'cancelled',
      totals,
    };

    if (status === 'failed') {
      result.errorMessage = `all ${recorded.length} entities failed collection`;
      await failRunBestEffort(this.runs, runId, result.errorMessage, totals, log);
      log.error('Run failed', undefined, { ...totals });
      return result;
    }

    try {
      await this.runs.completeRun(runId, status, totals);
    } catch (error) {
      log.error('Could not finalize run', error, { status });
      await failRunBestEffort(this.runs, runId, `finalization failed: ${errorMessage(error)}`, totals, log);
      throw error;
    }

    log.info('Run finished', {
      status,
      ...totals,
      notAttempted: notAttempted.length,
      budgetExhausted: result.budgetExhausted,
    });
    return result;
  }

  private async resolve<T>(request: RunCollectionRequest<T>, ctx: ResolverContext): Promise<ResolvedTargets<T>> {
    const { targets } = request;
    if (typeof targets !== 'function') {
      return { targets: [...targets] };
    }
    if (ctx.signal.aborted) {
      throw new RunCancelledError('run stopped before targets were resolved');
    }
    const resolved = await targets(ctx);
    return Array.isArray(resolved) ? { targets: resolved } : resolved;
  }
}

function deferred<V>(): { promise: Promise<V>; resolve: (value: V) => void } {
  let resolve: (value: V) => void = () => {};
  const promise = new Promise<V>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
