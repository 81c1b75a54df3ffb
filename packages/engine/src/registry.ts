import type { TriggerSource } from '@collector/shared';
import type { RunResult } from './coordinator.js';

export interface JobRunOptions {
  triggerSource: TriggerSource;
  signal?: AbortSignal;
}

/** A named, repeatable collection workflow (one run kind, fully wired). */
export interface CollectionJob {
  name: string;
  description: string;
  run(options: JobRunOptions): Promise<RunResult>;
}

/**
 * Central registry of collection jobs. The command line and the scheduler
 * both resolve jobs by name through it.
 */
export class JobRegistry {
  private jobs = new Map<string, CollectionJob>();

  register(job: CollectionJob): void {
    if (this.jobs.has(job.name)) {
      throw new Error(`Collection job already registered: ${job.name}`);
    }
    this.jobs.set(job.name, job);
  }

  get(name: string): CollectionJob {
    const job = this.jobs.get(name);
    if (!job) {
      const available = Array.from(this.jobs.keys()).join(', ');
      throw new Error(`Unknown collection job: '${name}'. Available jobs: ${available}`);
    }
    return job;
  }

  has(name: string): boolean {
    return this.jobs.has(name);
  }

  getAll(): CollectionJob[] {
    return Array.from(this.jobs.values());
  }

  getNames(): string[] {
    return Array.from(this.jobs.keys());
  }
}
