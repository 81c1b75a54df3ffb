import { optionalEnv } from './env.js';

export enum NotifyChannel {
  ERRORS = 'errors',
  PIPELINE = 'pipeline',
  OPS = 'ops',
}

export enum NotifyCategory {
  SCHEDULER_STARTED = 'scheduler_started',
  SCHEDULER_FAILED = 'scheduler_failed',
  RUN_COMPLETED = 'run_completed',
  RUN_PARTIAL_SUCCESS = 'run_partial_success',
  RUN_FAILED = 'run_failed',
  COLLECTOR_ERROR = 'collector_error',
  QUOTA_EXHAUSTED = 'quota_exhausted',
  DATABASE_ERROR = 'database_error',
}

interface CategoryRoute {
  channel: NotifyChannel;
  /** Slack attachment colour */
  color: string;
}

const GREEN = '#28a745';
const AMBER = '#ffc107';
const RED = '#dc3545';
const BLUE = '#17a2b8';

const CATEGORY_ROUTES: Record<NotifyCategory, CategoryRoute> = {
  [NotifyCategory.SCHEDULER_STARTED]: { channel: NotifyChannel.OPS, color: BLUE },
  [NotifyCategory.SCHEDULER_FAILED]: { channel: NotifyChannel.ERRORS, color: RED },
  [NotifyCategory.RUN_COMPLETED]: { channel: NotifyChannel.PIPELINE, color: GREEN },
  [NotifyCategory.RUN_PARTIAL_SUCCESS]: { channel: NotifyChannel.PIPELINE, color: AMBER },
  [NotifyCategory.RUN_FAILED]: { channel: NotifyChannel.ERRORS, color: RED },
  [NotifyCategory.COLLECTOR_ERROR]: { channel: NotifyChannel.ERRORS, color: RED },
  [NotifyCategory.QUOTA_EXHAUSTED]: { channel: NotifyChannel.OPS, color: AMBER },
  [NotifyCategory.DATABASE_ERROR]: { channel: NotifyChannel.ERRORS, color: RED },
};

const WEBHOOK_ENV_MAP: Record<NotifyChannel, string> = {
  [NotifyChannel.ERRORS]: 'SLACK_WEBHOOK_ERRORS',
  [NotifyChannel.PIPELINE]: 'SLACK_WEBHOOK_PIPELINE',
  [NotifyChannel.OPS]: 'SLACK_WEBHOOK_OPS',
};

export interface NotifyOptions {
  category: NotifyCategory;
  title: string;
  message: string;
  /** Structured fields shown under the message (runId, runKind, ...) */
  context?: Record<string, string>;
  error?: Error | unknown;
}

const missingWebhookWarned = new Set<NotifyChannel>();

// Slack accepts roughly one message per second per webhook
const MIN_SEND_INTERVAL_MS = 500;
const lastSendTime = new Map<NotifyChannel, number>();
const sendQueues = new Map<NotifyChannel, Promise<void>>();

const MAX_RETRIES = 3;
const BASE_RETRY_DELAY_MS = 1000;

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength - 3) + '...' : text;
}

function describeError(error: Error | unknown): string {
  if (!error) return '';
  if (error instanceof Error) {
    const stackLines = (error.stack ?? '').split('\n').slice(0, 5).join('\n');
    return `*Error:* \`${error.name}: ${error.message}\`\n\`\`\`${stackLines}\`\`\``;
  }
  return `*Error:* \`${String(error)}\``;
}

export function buildSlackPayload(options: NotifyOptions, now: Date = new Date()): Record<string, unknown> {
  const { color } = CATEGORY_ROUTES[options.category];
  const environment = optionalEnv('ENVIRONMENT', 'unknown');

  let text = truncate(options.message, 2800);
  if (options.error) {
    text = truncate(`${text}\n\n${describeError(options.error)}`, 3000);
  }

  const blocks: Array<Record<string, unknown>> = [
    { type: 'header', text: { type: 'plain_text', text: truncate(options.title, 150), emoji: false } },
    { type: 'section', text: { type: 'mrkdwn', text: text || '_(no details)_' } },
  ];

  const contextLine = Object.entries(options.context ?? {})
    .map(([key, value]) => `*${key}:* ${value}`)
    .join(' | ');
  if (contextLine) {
    blocks.push({ type: 'section', text: { type: 'mrkdwn', text: contextLine } });
  }

  blocks.push({
    type: 'context',
    elements: [
      { type: 'mrkdwn', text: `*category:* ${options.category}` },
      { type: 'mrkdwn', text: `*env:* ${environment}` },
      { type: 'mrkdwn', text: `*time:* ${now.toISOString()}` },
    ],
  });

  return { attachments: [{ color, blocks }] };
}

async function postWithRetry(webhookUrl: string, payload: Record<string, unknown>): Promise<void> {
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    const response = await fetch(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });

    if (response.ok) return;

    // Bad webhook configuration; retrying will not help
    if (response.status >= 400 && response.status < 500) {
      throw new Error(`Slack webhook returned ${response.status}: ${await response.text()}`);
    }

    if (attempt < MAX_RETRIES) {
      await pause(BASE_RETRY_DELAY_MS * Math.pow(2, attempt));
    }
  }

  throw new Error(`Slack webhook failed after ${MAX_RETRIES} retries`);
}

/**
 * Send a notification to the channel its category routes to.
 *
 * Unconfigured channels are skipped with a one-time warning. Sends are
 * serialized per channel. The returned promise never rejects.
 */
export function notify(options: NotifyOptions): Promise<void> {
  const { channel } = CATEGORY_ROUTES[options.category];
  const envVar = WEBHOOK_ENV_MAP[channel];
  const webhookUrl = optionalEnv(envVar, '');

  if (!webhookUrl) {
    if (!missingWebhookWarned.has(channel)) {
      missingWebhookWarned.add(channel);
      console.warn(`[slack] ${envVar} not configured, ${channel} notifications will be skipped`);
    }
    return Promise.resolve();
  }

  const previous = sendQueues.get(channel) ?? Promise.resolve();
  const next = previous.then(async () => {
    const elapsed = Date.now() - (lastSendTime.get(channel) ?? 0);
    if (elapsed < MIN_SEND_INTERVAL_MS) {
      await pause(MIN_SEND_INTERVAL_MS - elapsed);
    }
    lastSendTime.set(channel, Date.now());

    try {
      await postWithRetry(webhookUrl, buildSlackPayload(options));
    } catch (err) {
      console.error('[slack] Failed to send notification', {
        category: options.category,
        title: options.title,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  sendQueues.set(channel, next);
  return next;
}

/** Human-readable duration, e.g. "2h 15m" or "42s". */
export function formatDuration(startedAt: Date, completedAt: Date): string {
  const seconds = Math.floor((completedAt.getTime() - startedAt.getTime()) / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ${seconds % 60}s`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

/** Reset internal state (for testing only) */
export function _resetSlackState(): void {
  missingWebhookWarned.clear();
  lastSendTime.clear();
  sendQueues.clear();
}
