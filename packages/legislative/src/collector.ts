import { SOURCE_LEGISLATIVE, type ChangeHashStore, type RecordSink } from '@collector/shared';
import {
  commitAfterPersist,
  filterChanged,
  type EntityCollector,
  type ResolvedTargets,
  type TargetResolver,
} from '@collector/engine';
import type { LegislativeClient } from './client.js';
import { discoverCandidates, type BillCandidate } from './discovery.js';
import { normalizeBill } from './normalize.js';

export interface BillCollectionOptions {
  client: LegislativeClient;
  hashes: ChangeHashStore;
  records: RecordSink;
  states: readonly string[];
  keywords: readonly string[];
  allSessions?: boolean;
}

export interface BillCollection {
  resolve: TargetResolver<BillCandidate>;
  collect: EntityCollector<BillCandidate>;
  keyOf: (candidate: BillCandidate) => string;
}

export function billEntityKey(candidate: BillCandidate): string {
  return `${candidate.state}:${candidate.number}:${candidate.id}`;
}

/**
 * Regulatory bills run: discovery lists candidates, one bulk stored-hash
 * lookup drops the unchanged ones, and each changed bill is fetched,
 * persisted, and only then has its stored hash advanced.
 */
export function createBillCollection(options: BillCollectionOptions): BillCollection {
  const { client, hashes, records } = options;

  const resolve: TargetResolver<BillCandidate> = async (ctx): Promise<ResolvedTargets<BillCandidate>> => {
    const discovery = await discoverCandidates(client, {
      states: options.states,
      keywords: options.keywords,
      allSessions: options.allSessions,
      signal: ctx.signal,
      logger: ctx.logger,
    });

    const stored = await hashes.getStoredHashes(
      SOURCE_LEGISLATIVE,
      discovery.candidates.map((candidate) => candidate.id),
    );
    const changed = filterChanged(discovery.candidates, stored);

    ctx.logger.info('Discovery finished', {
      candidates: discovery.candidates.length,
      changed: changed.length,
      unchanged: discovery.candidates.length - changed.length,
      budgetHit: discovery.budgetHit,
      skippedStates: discovery.skippedStates,
      requestsUsed: client.requestsUsed,
    });

    return {
      targets: changed,
      unresolved: [...discovery.skippedStates, ...discovery.unscannedStates].map((state) => `state:${state}`),
      budgetExhausted: discovery.budgetHit,
    };
  };

  const collect: EntityCollector<BillCandidate> = async (candidate, ctx) => {
    const detail = await client.getBill(candidate.billId, ctx.signal);
    ctx.progress();

    await commitAfterPersist(hashes, SOURCE_LEGISLATIVE, candidate, () =>
      records.upsertRecord({
        source: SOURCE_LEGISLATIVE,
        externalId: candidate.id,
        runId: ctx.runId,
        entityKey: ctx.entityKey,
        payload: { ...normalizeBill(detail), raw: detail },
      }),
    );

    return { status: 'succeeded', recordsProcessed: 1 };
  };

  return { resolve, collect, keyOf: billEntityKey };
}
