import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { capErrorMessage, safeLogError } from '../src/utils/logger.js';
import { _resetSlackState } from '../src/utils/slack.js';
import { createMockLogger } from '../src/testing/index.js';

describe('capErrorMessage', () => {
  it('leaves short messages alone', () => {
    expect(capErrorMessage('boom')).toBe('boom');
  });

  it('truncates past the limit', () => {
    expect(capErrorMessage('abcdefghij', 4)).toBe('abcd... (truncated)');
  });
});

describe('safeLogError', () => {
  beforeEach(() => {
    _resetSlackState();
    vi.stubEnv('SLACK_WEBHOOK_ERRORS', '');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('persists message, stack and context', async () => {
    const persist = vi.fn(async () => {});
    const error = new Error('upstream exploded');

    await safeLogError(persist, 'collector', error, { runId: 'run-1' });

    expect(persist).toHaveBeenCalledWith('collector', 'upstream exploded', error.stack, { runId: 'run-1' });
  });

  it('reports a failing persist through the logger instead of throwing', async () => {
    const logger = createMockLogger();
    const persist = vi.fn(async () => {
      throw new Error('connection refused');
    });

    await expect(safeLogError(persist, 'collector', 'plain failure', undefined, logger)).resolves.toBeUndefined();

    expect(logger.hasLog('warn', 'Failed to persist error log')).toBe(true);
    expect(persist).toHaveBeenCalledWith('collector', 'plain failure', undefined, undefined);
  });
});
