import type {
  ChangeHashStore,
  CollectionRun,
  CreateRunInput,
  EntityOutcome,
  RawRecordInput,
  RecordSink,
  RunStore,
  RunTotals,
} from '@collector/shared';
import { completeRun, createRun, failRun, getRun, startRun } from './queries/runs.js';
import { upsertEntityOutcome } from './queries/entity-outcomes.js';
import { getStoredHashes, updateStoredHash } from './queries/change-hashes.js';
import { upsertRawRecord } from './queries/raw-records.js';

/** RunStore backed by the collection_runs and collection_run_entities tables. */
export class PgRunStore implements RunStore {
  createRun(input: CreateRunInput): Promise<CollectionRun> {
    return createRun(input.runKind, input.triggerSource);
  }

  startRun(runId: string): Promise<CollectionRun> {
    return startRun(runId);
  }

  completeRun(runId: string, status: 'succeeded' | 'partial', totals: RunTotals): Promise<CollectionRun> {
    return completeRun(runId, status, totals);
  }

  failRun(runId: string, errorMessage: string, totals: RunTotals): Promise<CollectionRun> {
    return failRun(runId, errorMessage, totals);
  }

  upsertEntityOutcome(outcome: EntityOutcome): Promise<void> {
    return upsertEntityOutcome(outcome);
  }

  getRun(runId: string): Promise<CollectionRun | null> {
    return getRun(runId);
  }
}

export class PgChangeHashStore implements ChangeHashStore {
  getStoredHashes(source: string, externalIds: readonly string[]): Promise<Map<string, string>> {
    return getStoredHashes(source, externalIds);
  }

  updateStoredHash(source: string, externalId: string, hash: string): Promise<void> {
    return updateStoredHash(source, externalId, hash);
  }
}

export class PgRecordSink implements RecordSink {
  upsertRecord(record: RawRecordInput): Promise<boolean> {
    return upsertRawRecord(record);
  }
}
