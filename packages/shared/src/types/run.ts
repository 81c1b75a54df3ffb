export type RunStatus = 'queued' | 'running' | 'succeeded' | 'partial' | 'failed';

export type TerminalRunStatus = Extract<RunStatus, 'succeeded' | 'partial' | 'failed'>;

export const RUN_STATUSES: readonly RunStatus[] = ['queued', 'running', 'succeeded', 'partial', 'failed'];

export function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: RunStatus): status is TerminalRunStatus {
  return status === 'succeeded' || status === 'partial' || status === 'failed';
}

export type TriggerSource = 'cli' | 'scheduler';

export interface RunTotals {
  attempted: number;
  /** Includes entities that finished as partial */
  succeeded: number;
  failed: number;
  skipped: number;
  recordsProcessed: number;
}

export const EMPTY_TOTALS: RunTotals = {
  attempted: 0,
  succeeded: 0,
  failed: 0,
  skipped: 0,
  recordsProcessed: 0,
};

export interface CollectionRun {
  runId: string;
  runKind: string;
  triggerSource: TriggerSource;
  status: RunStatus;
  startedAt?: Date;
  /** Set exactly when status is terminal */
  completedAt?: Date;
  totals: RunTotals;
  errorMessage?: string;
  createdAt: Date;
}

export type OutcomeStatus = 'skipped' | 'succeeded' | 'failed' | 'partial';

export const OUTCOME_STATUSES: readonly OutcomeStatus[] = ['skipped', 'succeeded', 'failed', 'partial'];

export function isOutcomeStatus(value: string): value is OutcomeStatus {
  return OUTCOME_STATUSES.some((status) => status === value);
}

/** Outcome messages are either real errors or informational notes, never both. */
export type OutcomeMessage =
  | { kind: 'error'; text: string }
  | { kind: 'note'; text: string };

export type OutcomeMessageKind = OutcomeMessage['kind'];

export function errorOutcome(text: string): OutcomeMessage {
  return { kind: 'error', text };
}

export function noteOutcome(text: string): OutcomeMessage {
  return { kind: 'note', text };
}

export interface EntityOutcome {
  runId: string;
  entityKey: string;
  status: OutcomeStatus;
  recordsProcessed: number;
  message?: OutcomeMessage;
  recordedAt: Date;
}
