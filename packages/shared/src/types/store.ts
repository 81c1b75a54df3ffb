import type { CollectionRun, EntityOutcome, RunTotals, TriggerSource } from './run.js';

export interface CreateRunInput {
  runKind: string;
  triggerSource: TriggerSource;
}

/**
 * Run lifecycle persistence. Every transition is conditional on the current
 * status and throws InvalidTransitionError, leaving the run untouched, when
 * the run is not in the expected state.
 */
export interface RunStore {
  createRun(input: CreateRunInput): Promise<CollectionRun>;
  /** queued -> running */
  startRun(runId: string): Promise<CollectionRun>;
  /** running -> succeeded | partial */
  completeRun(runId: string, status: 'succeeded' | 'partial', totals: RunTotals): Promise<CollectionRun>;
  /** running -> failed */
  failRun(runId: string, errorMessage: string, totals: RunTotals): Promise<CollectionRun>;
  /** One row per (run, entity); a second write for the same pair replaces the first. */
  upsertEntityOutcome(outcome: EntityOutcome): Promise<void>;
  getRun(runId: string): Promise<CollectionRun | null>;
}

/** Last stored content hash per upstream entity, keyed by source. */
export interface ChangeHashStore {
  getStoredHashes(source: string, externalIds: readonly string[]): Promise<Map<string, string>>;
  updateStoredHash(source: string, externalId: string, hash: string): Promise<void>;
}

export interface RawRecordInput {
  source: string;
  externalId: string;
  runId: string;
  entityKey: string;
  payload: Record<string, unknown>;
}

export interface RecordSink {
  /** Returns false when the stored payload was already identical. */
  upsertRecord(record: RawRecordInput): Promise<boolean>;
}
