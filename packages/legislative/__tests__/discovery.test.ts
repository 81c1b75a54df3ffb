import { describe, it, expect } from 'vitest';
import { QuotaExceededError } from '@collector/shared';
import { createMockLogger } from '@collector/shared/testing';
import { BudgetGuard } from '@collector/engine';
import { LegislativeClient } from '../src/client.js';
import { discoverCandidates, matchesKeywords } from '../src/discovery.js';
import { entry, fakeApi, json, masterList, noRetryDelay, type Handler } from './fake-api.js';

function clientFor(handlers: Record<string, Handler>, ceiling = 100) {
  const api = fakeApi(handlers);
  const client = new LegislativeClient({
    apiKey: 'test-secret',
    budget: new BudgetGuard(ceiling),
    retry: noRetryDelay,
    fetchImpl: api.fetchImpl,
  });
  return { client, ...api };
}

const listsByState: Record<string, Array<Record<string, unknown>>> = {
  CA: [entry(1, 'Hemp beverage labeling'), entry(2, 'Highway funding'), entry(3, 'HEMP-derived THC limits')],
  TX: [entry(3, 'Hemp-derived THC limits', 'tx-copy'), entry(4, 'Cannabis beverage tax')],
  NY: [entry(5, 'Hemp farming grants')],
};

const byState: Handler = (params) => masterList(1, listsByState[params.get('state') ?? ''] ?? []);

describe('matchesKeywords', () => {
  it('matches case-insensitively on any keyword', () => {
    expect(matchesKeywords('Hemp-Derived THC', ['thc'])).toBe(true);
    expect(matchesKeywords('Road repair', ['hemp', 'cannabis'])).toBe(false);
  });

  it('matches everything without keywords', () => {
    expect(matchesKeywords('Road repair', [])).toBe(true);
  });
});

describe('discoverCandidates', () => {
  it('filters by keyword and keeps the first-seen hash for duplicates', async () => {
    const { client, ops } = clientFor({ getMasterList: byState });

    const result = await discoverCandidates(client, { states: ['ca', 'tx'], keywords: ['hemp', 'cannabis'] });

    expect(ops()).toEqual(['getMasterList:CA', 'getMasterList:TX']);
    expect(result.candidates.map((c) => [c.id, c.state, c.hash])).toEqual([
      ['1', 'CA', 'hash-1'],
      ['3', 'CA', 'hash-3'],
      ['4', 'TX', 'hash-4'],
    ]);
    expect(result).toMatchObject({ budgetHit: false, skippedStates: [], unscannedStates: [] });
  });

  it('skips a state whose listing fails and carries on', async () => {
    const logger = createMockLogger();
    const { client } = clientFor({
      getMasterList: (params) =>
        params.get('state') === 'TX' ? { status: 'ERROR', alert: { message: 'Unknown state' } } : byState(params),
    });

    const result = await discoverCandidates(client, { states: ['TX', 'NY'], keywords: ['hemp'], logger });

    expect(result.skippedStates).toEqual(['TX']);
    expect(result.candidates.map((c) => c.id)).toEqual(['5']);
    expect(logger.hasLog('warn', 'State listing failed, skipping state')).toBe(true);
  });

  it('stops at the budget and keeps what it found', async () => {
    const { client, ops } = clientFor({ getMasterList: byState }, 1);

    const result = await discoverCandidates(client, { states: ['CA', 'TX', 'NY'], keywords: ['hemp'] });

    expect(ops()).toEqual(['getMasterList:CA']);
    expect(result.budgetHit).toBe(true);
    expect(result.candidates.map((c) => c.id)).toEqual(['1', '3']);
    expect(result.unscannedStates).toEqual(['TX', 'NY']);
  });

  it('propagates an exhausted upstream quota', async () => {
    const { client } = clientFor({
      getMasterList: () => ({ status: 'ERROR', alert: { message: 'Query quota exceeded for this key' } }),
    });

    await expect(discoverCandidates(client, { states: ['CA', 'TX'], keywords: [] })).rejects.toBeInstanceOf(
      QuotaExceededError,
    );
  });

  it('walks every session in backfill mode', async () => {
    const { client, ops } = clientFor({
      getSessionList: () => ({
        status: 'OK',
        sessions: [
          { session_id: 11, state_id: 5, year_start: 2023, year_end: 2024, session_name: '2023-2024' },
          { session_id: 12, state_id: 5, year_start: 2025, year_end: 2026, session_name: '2025-2026' },
          { session_id: 13, state_id: 5, year_start: 2025, year_end: 2025, session_name: '2025 Special' },
        ],
      }),
      getMasterList: (params) => {
        if (params.get('id') === '12') return json({}, 404);
        return masterList(Number(params.get('id')), [entry(Number(params.get('id')) * 10, 'Hemp act')]);
      },
    });

    const result = await discoverCandidates(client, { states: ['CA'], keywords: ['hemp'], allSessions: true });

    expect(ops()).toEqual(['getSessionList:CA', 'getMasterList:11', 'getMasterList:12', 'getMasterList:13']);
    expect(result.candidates.map((c) => c.id)).toEqual(['110', '130']);
    expect(result.skippedStates).toEqual([]);
  });
});
