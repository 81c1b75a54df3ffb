import { parseArgs } from 'node:util';
import { errorMessage, type CollectionRun, type EntityOutcome } from '@collector/shared';
import type { RunResult } from '@collector/engine';
import { CollectionScheduler } from './scheduler.js';
import {
  PRODUCTS_JOB,
  REGULATORY_JOB,
  buildJobRegistry,
  createProductsJob,
  createRegulatoryJob,
  runSummary,
  selectBrands,
  type JobDependencies,
} from './jobs.js';

export const USAGE = `
Collection engine CLI

Usage:
  collector collect products [--brand <key>] [--dry-run]
      Sync product catalogs for every configured brand, or one brand

  collector regs ingest --state <XX> [--state <XX>]... [--keyword <kw>]...
                        [--all-sessions] [--max-requests <n>] [--dry-run]
      Discover and ingest regulatory bills for the given states

  collector runs list [--limit <n>]
      Show the most recent collection runs

  collector runs show <runId>
      Show one run with its per-entity outcomes

  collector schedule [--run-now]
      Run the recurring jobs until SIGINT or SIGTERM

Examples:
  collector collect products --brand north-ridge --dry-run
  collector regs ingest --state CA --state TX --keyword hemp
  collector runs show 2f1d5c3e-8a4b-4c7e-9f21-6b0d3a9e5c11
`;

/** Bad arguments; the caller prints usage. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface RunReader {
  listRuns(limit: number): Promise<CollectionRun[]>;
  getRun(runId: string): Promise<CollectionRun | null>;
  listEntityOutcomes(runId: string): Promise<EntityOutcome[]>;
}

export interface CommandContext extends JobDependencies {
  reader: RunReader;
  print: (line: string) => void;
  /** Aborted on SIGINT/SIGTERM */
  signal: AbortSignal;
}

const STATE_CODE = /^[A-Z]{2}$/;

/** Runs a parseArgs call, turning its rejections into UsageError. */
function usage<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

function positiveInt(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new UsageError(`--${flag} must be a positive integer, got '${raw}'`);
  }
  return value;
}

function exitCodeFor(result: RunResult): number {
  return result.status === 'failed' ? 1 : 0;
}

function printResult(ctx: CommandContext, result: RunResult): void {
  ctx.print(`Run ${result.runId} ${result.status}: ${runSummary(result)}`);
  if (result.errorMessage) ctx.print(`  reason: ${result.errorMessage}`);
  if (result.notAttempted.length > 0) {
    ctx.print(`  not attempted: ${result.notAttempted.join(', ')}`);
  }
}

export function formatRunRow(run: CollectionRun): string {
  const { totals } = run;
  return [
    run.runId,
    run.runKind.padEnd(16),
    run.status.padEnd(9),
    run.createdAt.toISOString(),
    `${totals.succeeded}/${totals.attempted} ok`,
    `${totals.recordsProcessed} records`,
  ].join('  ');
}

export function formatOutcomeRow(outcome: EntityOutcome): string {
  const message = outcome.message ? `  [${outcome.message.kind}] ${outcome.message.text}` : '';
  return `  ${outcome.entityKey.padEnd(24)}  ${outcome.status.padEnd(9)}  ${outcome.recordsProcessed}${message}`;
}

async function collectProducts(ctx: CommandContext, args: string[]): Promise<number> {
  const { values } = usage(() =>
    parseArgs({
      args,
      options: {
        brand: { type: 'string' },
        'dry-run': { type: 'boolean' },
      },
      strict: true,
    }),
  );
  const brandKey = values.brand;

  if (values['dry-run'] === true) {
    const brands = selectBrands(await ctx.loadBrands(), brandKey);
    ctx.print(`Would collect ${brands.length} brand(s):`);
    for (const brand of brands) {
      const profile = brand.alternateProfile ? ' (alternate profile allowed)' : '';
      ctx.print(`  ${brand.key}  ${brand.shopUrl ?? '(no storefront)'}${profile}`);
    }
    return 0;
  }

  const result = await createProductsJob(ctx, { brandKey }).run({ triggerSource: 'cli', signal: ctx.signal });
  printResult(ctx, result);
  return exitCodeFor(result);
}

async function ingestBills(ctx: CommandContext, args: string[]): Promise<number> {
  const { values } = usage(() =>
    parseArgs({
      args,
      options: {
        state: { type: 'string', multiple: true },
        keyword: { type: 'string', multiple: true },
        'all-sessions': { type: 'boolean' },
        'max-requests': { type: 'string' },
        'dry-run': { type: 'boolean' },
      },
      strict: true,
    }),
  );

  const states = (values.state ?? []).map((state) => state.trim().toUpperCase());
  if (states.length === 0) {
    throw new UsageError('regs ingest needs at least one --state');
  }
  const invalid = states.find((state) => !STATE_CODE.test(state));
  if (invalid) {
    throw new UsageError(`Invalid state code '${invalid}', expected two letters`);
  }
  const keywords = values.keyword ?? [];
  const allSessions = values['all-sessions'] === true;
  const maxRequests = positiveInt(
    'max-requests',
    values['max-requests'],
    ctx.config.legislative.maxRequests,
  );

  if (values['dry-run'] === true) {
    ctx.print(`Would ingest bills for ${states.join(', ')}`);
    ctx.print(`  keywords: ${keywords.length > 0 ? keywords.join(', ') : '(all bills)'}`);
    ctx.print(`  sessions: ${allSessions ? 'all' : 'current'}`);
    ctx.print(`  request budget: ${maxRequests}`);
    return 0;
  }

  const job = createRegulatoryJob(ctx, { states, keywords, allSessions, maxRequests });
  const result = await job.run({ triggerSource: 'cli', signal: ctx.signal });
  printResult(ctx, result);
  return exitCodeFor(result);
}

async function listRuns(ctx: CommandContext, args: string[]): Promise<number> {
  const { values } = usage(() => parseArgs({ args, options: { limit: { type: 'string' } }, strict: true }));
  const limit = positiveInt('limit', values.limit, 20);

  const runs = await ctx.reader.listRuns(limit);
  if (runs.length === 0) {
    ctx.print('No runs recorded');
    return 0;
  }
  for (const run of runs) {
    ctx.print(formatRunRow(run));
  }
  return 0;
}

async function showRun(ctx: CommandContext, args: string[]): Promise<number> {
  const { positionals } = usage(() => parseArgs({ args, options: {}, allowPositionals: true, strict: true }));
  const runId = positionals[0];
  if (!runId) {
    throw new UsageError('runs show needs a run id');
  }

  const run = await ctx.reader.getRun(runId);
  if (!run) {
    ctx.print(`Run not found: ${runId}`);
    return 1;
  }

  ctx.print(formatRunRow(run));
  if (run.startedAt) ctx.print(`  started:   ${run.startedAt.toISOString()}`);
  if (run.completedAt) ctx.print(`  completed: ${run.completedAt.toISOString()}`);
  ctx.print(`  trigger:   ${run.triggerSource}`);
  if (run.errorMessage) ctx.print(`  reason:    ${run.errorMessage}`);

  const outcomes = await ctx.reader.listEntityOutcomes(runId);
  ctx.print(`Entities (${outcomes.length}):`);
  for (const outcome of outcomes) {
    ctx.print(formatOutcomeRow(outcome));
  }
  return 0;
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

async function schedule(ctx: CommandContext, args: string[]): Promise<number> {
  const { values } = usage(() => parseArgs({ args, options: { 'run-now': { type: 'boolean' } }, strict: true }));

  const registry = buildJobRegistry(ctx);
  const scheduler = new CollectionScheduler({ logger: ctx.logger, runOnStart: values['run-now'] === true });
  const intervals: Record<string, number> = {
    [PRODUCTS_JOB]: ctx.config.schedule.productsIntervalMs,
    [REGULATORY_JOB]: ctx.config.schedule.regulatoryIntervalMs,
  };
  for (const job of registry.getAll()) {
    scheduler.register(job, intervals[job.name] ?? ctx.config.schedule.productsIntervalMs);
  }

  scheduler.start();
  ctx.print(`Scheduler running: ${scheduler.jobNames.join(', ')}`);

  await waitForAbort(ctx.signal);
  await scheduler.stop();
  return 0;
}

/** Dispatches one invocation. Resolves to the process exit code. */
export async function runCommand(argv: string[], ctx: CommandContext): Promise<number> {
  const [command, subcommand, ...rest] = argv;

  switch (command) {
    case 'collect':
      if (subcommand === 'products') return collectProducts(ctx, rest);
      break;
    case 'regs':
      if (subcommand === 'ingest') return ingestBills(ctx, rest);
      break;
    case 'runs':
      if (subcommand === 'list') return listRuns(ctx, rest);
      if (subcommand === 'show') return showRun(ctx, rest);
      break;
    case 'schedule':
      return schedule(ctx, argv.slice(1));
    case undefined:
    case 'help':
    case '--help':
      ctx.print(USAGE);
      return 0;
  }

  throw new UsageError(`Unknown command: ${argv.join(' ')}`);
}
