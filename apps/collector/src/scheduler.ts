import type { Logger } from '@collector/shared';
import type { CollectionJob, RunResult } from '@collector/engine';

interface ScheduledEntry {
  job: CollectionJob;
  intervalMs: number;
  timer: ReturnType<typeof setInterval> | null;
  inFlight: Promise<void> | null;
}

export interface CollectionSchedulerOptions {
  logger: Logger;
  /** Trigger every job once as soon as the scheduler starts */
  runOnStart?: boolean;
  onError?: (jobName: string, error: unknown) => void;
}

/**
 * Runs registered jobs on fixed intervals. A job never overlaps itself:
 * a tick that lands while the previous run is still going is skipped.
 */
export class CollectionScheduler {
  private readonly entries = new Map<string, ScheduledEntry>();
  private readonly controller = new AbortController();
  private started = false;
  private stopped = false;

  constructor(private readonly options: CollectionSchedulerOptions) {}

  register(job: CollectionJob, intervalMs: number): void {
    if (this.stopped) {
      throw new Error('Cannot register jobs on a stopped scheduler');
    }
    if (this.entries.has(job.name)) {
      throw new Error(`Job already scheduled: ${job.name}`);
    }
    if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
      throw new Error(`Interval for ${job.name} must be a positive integer, got ${intervalMs}`);
    }
    const entry: ScheduledEntry = { job, intervalMs, timer: null, inFlight: null };
    this.entries.set(job.name, entry);
    if (this.started) this.arm(entry);
  }

  start(): void {
    if (this.stopped) throw new Error('Scheduler has been stopped');
    if (this.started) return;
    this.started = true;

    for (const entry of this.entries.values()) {
      this.arm(entry);
    }
    this.options.logger.info('Scheduler started', {
      jobs: Array.from(this.entries.values()).map((entry) => ({ name: entry.job.name, intervalMs: entry.intervalMs })),
    });

    if (this.options.runOnStart) {
      for (const name of this.entries.keys()) {
        this.tick(name);
      }
    }
  }

  /**
   * Runs a job now. Resolves to null when the job is already running, the
   * scheduler is stopped, or the run threw.
   */
  async trigger(name: string): Promise<RunResult | null> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Unknown scheduled job: ${name}`);
    }
    if (this.stopped) return null;
    if (entry.inFlight) {
      this.options.logger.warn('Previous run still in progress, skipping', { job: name });
      return null;
    }

    const execution = entry.job.run({ triggerSource: 'scheduler', signal: this.controller.signal });
    const settled = execution.then(
      () => undefined,
      () => undefined,
    );
    entry.inFlight = settled;
    void settled.then(() => {
      entry.inFlight = null;
    });

    try {
      const result = await execution;
      this.options.logger.info('Scheduled run finished', {
        job: name,
        runId: result.runId,
        status: result.status,
      });
      return result;
    } catch (error) {
      this.options.logger.error('Scheduled run failed', error, { job: name });
      this.options.onError?.(name, error);
      return null;
    }
  }

  isRunning(name: string): boolean {
    return Boolean(this.entries.get(name)?.inFlight);
  }

  get jobNames(): string[] {
    return Array.from(this.entries.keys());
  }

  /** Aborts running jobs, clears every timer and waits for in-flight runs to settle. */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.controller.abort();

    const pending: Promise<void>[] = [];
    for (const entry of this.entries.values()) {
      if (entry.timer) clearInterval(entry.timer);
      entry.timer = null;
      if (entry.inFlight) pending.push(entry.inFlight);
    }

    this.options.logger.info('Scheduler stopping', { inFlight: pending.length });
    await Promise.all(pending);
    this.options.logger.info('Scheduler stopped');
  }

  private arm(entry: ScheduledEntry): void {
    entry.timer = setInterval(() => this.tick(entry.job.name), entry.intervalMs);
  }

  private tick(name: string): void {
    this.trigger(name).catch((error: unknown) => {
      this.options.logger.error('Scheduler tick failed', error, { job: name });
    });
  }
}
