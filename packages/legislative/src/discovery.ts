import {
  BudgetExceededError,
  QuotaExceededError,
  RunCancelledError,
  errorMessage,
  nullLogger,
  type Logger,
} from '@collector/shared';
import type { LegislativeClient } from './client.js';
import type { MasterListEntry } from './types.js';

/** A bill listed by discovery, keyed by its upstream id. */
export interface BillCandidate {
  /** Upstream bill id as a string, the change-hash key */
  id: string;
  billId: number;
  state: string;
  number: string;
  title: string;
  /** Content hash the master list reported for this bill */
  hash: string;
}

export interface DiscoveryOptions {
  states: readonly string[];
  /** Case-insensitive title substrings; an empty list matches every bill */
  keywords: readonly string[];
  /** Walk every session of each state instead of only the current one */
  allSessions?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface DiscoveryResult {
  /** In first-seen order */
  candidates: BillCandidate[];
  budgetHit: boolean;
  /** States whose listing failed and was skipped */
  skippedStates: string[];
  /** States never reached because the budget ran out */
  unscannedStates: string[];
}

export function matchesKeywords(title: string, keywords: readonly string[]): boolean {
  if (keywords.length === 0) return true;
  const lower = title.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
}

/**
 * Lists candidate bills per state with master-list calls.
 *
 * A budget stop ends discovery and keeps what was found so far. A quota
 * failure propagates. Any other failure skips that state (or, in backfill
 * mode, that session) and discovery moves on.
 */
export async function discoverCandidates(
  client: LegislativeClient,
  options: DiscoveryOptions,
): Promise<DiscoveryResult> {
  const logger = options.logger ?? nullLogger;
  const candidates = new Map<string, BillCandidate>();
  const skippedStates: string[] = [];

  const collect = (state: string, entries: MasterListEntry[]) => {
    let matched = 0;
    for (const entry of entries) {
      if (!matchesKeywords(entry.title, options.keywords)) continue;
      matched++;
      const id = String(entry.bill_id);
      if (candidates.has(id)) continue;
      candidates.set(id, {
        id,
        billId: entry.bill_id,
        state,
        number: entry.number,
        title: entry.title,
        hash: entry.change_hash,
      });
    }
    logger.info('Master list scanned', { state, entries: entries.length, matched });
  };

  for (const [index, rawState] of options.states.entries()) {
    const state = rawState.toUpperCase();
    if (options.signal?.aborted) {
      throw new RunCancelledError('discovery stopped');
    }

    try {
      if (options.allSessions) {
        const sessions = await client.getSessionList(state, options.signal);
        logger.info('Fetching master list per session', { state, sessions: sessions.length });
        for (const session of sessions) {
          try {
            const list = await client.getMasterListBySession(session.session_id, options.signal);
            collect(state, list.entries);
          } catch (error) {
            if (isStopping(error)) throw error;
            logger.warn('Session master list failed, skipping session', {
              state,
              sessionId: session.session_id,
              error: errorMessage(error),
            });
          }
        }
      } else {
        const list = await client.getMasterList(state, options.signal);
        collect(state, list.entries);
      }
    } catch (error) {
      if (error instanceof BudgetExceededError) {
        logger.warn('Request budget reached, stopping discovery', {
          state,
          used: error.used,
          ceiling: error.ceiling,
        });
        return {
          candidates: [...candidates.values()],
          budgetHit: true,
          skippedStates,
          unscannedStates: options.states.slice(index).map((s) => s.toUpperCase()),
        };
      }
      if (isStopping(error)) throw error;
      logger.warn('State listing failed, skipping state', { state, error: errorMessage(error) });
      skippedStates.push(state);
    }
  }

  return { candidates: [...candidates.values()], budgetHit: false, skippedStates, unscannedStates: [] };
}

function isStopping(error: unknown): boolean {
  return (
    error instanceof BudgetExceededError || error instanceof QuotaExceededError || error instanceof RunCancelledError
  );
}
