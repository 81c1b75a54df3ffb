import { randomUUID } from 'node:crypto';
import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { notify, NotifyCategory } from './slack.js';

/**
 * Correlation fields attached to log entries.
 */
export interface LogContext {
  /** Collection run the entry belongs to */
  runId?: string;
  /** Category of the run, e.g. 'products' or 'regulatory_bills' */
  runKind?: string;
  /** Brand key, bill id, or other per-entity key */
  entityKey?: string;
  traceId?: string;
  /** Upstream source, e.g. 'storefront' */
  source?: string;
  service?: string;
  component?: string;
  [key: string]: string | undefined;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;
  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /** Child logger whose entries carry `context` merged over the parent's. */
  child(context: LogContext): Logger;

  getContext(): LogContext;
}

class ContextLogger implements Logger {
  constructor(
    private readonly pino: PinoLogger,
    private readonly context: LogContext = {},
  ) {}

  private formatData(data?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.context, ...data };
  }

  private formatError(error?: Error | unknown): Record<string, unknown> {
    if (!error) return {};
    if (error instanceof Error) {
      const stack = (error.stack?.split('\n') ?? []).slice(0, 6).join('\n');
      return { err: { type: error.name, message: error.message, stack } };
    }
    return { err: String(error) };
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(this.formatData(data), msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(this.formatData(data), msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(this.formatData(data), msg);
  }

  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.error({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.fatal({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  child(context: LogContext): Logger {
    return new ContextLogger(this.pino.child(context), { ...this.context, ...context });
  }

  getContext(): LogContext {
    return { ...this.context };
  }
}

export interface CreateLoggerOptions {
  service: string;
  /** Defaults to LOG_LEVEL, then 'info' */
  level?: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  /** Force pretty printing regardless of NODE_ENV */
  pretty?: boolean;
  context?: LogContext;
}

function shouldUsePretty(forceFlag?: boolean): boolean {
  if (forceFlag !== undefined) return forceFlag;
  const nodeEnv = process.env.NODE_ENV;
  return nodeEnv === 'development' || nodeEnv === 'test' || !nodeEnv;
}

function truncated(limit: number): (value: unknown) => string {
  return (value) => {
    const str = JSON.stringify(value) ?? '';
    return str.length > limit ? str.slice(0, limit) + '...[truncated]' : str;
  };
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'collector' });
 * const runLog = logger.child({ runId, runKind: 'products' });
 * runLog.info('Run started', { targets: 12 });
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const pinoOptions: LoggerOptions = {
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    base: {
      service: options.service,
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Upstream payloads can be large; keep log lines bounded
    serializers: {
      payload: truncated(1024),
      response: truncated(2048),
    },
  };

  if (shouldUsePretty(options.pretty)) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{service} | {msg}',
      },
    };
  }

  return new ContextLogger(pino(pinoOptions), options.context ?? {});
}

export function generateTraceId(): string {
  return randomUUID();
}

export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => nullLogger,
  getContext: () => ({}),
};

export interface ServiceLogContext {
  runId?: string;
  runKind?: string;
  traceId?: string;
}

export interface ServiceLogger extends Logger {
  /** Child logger carrying run correlation fields under their canonical names. */
  withContext(ctx: ServiceLogContext): Logger;
}

export function createServiceLogger(serviceName: string, baseContext?: LogContext): ServiceLogger {
  const inner = createLogger({ service: serviceName, context: baseContext });

  function wrap(logger: Logger): ServiceLogger {
    return {
      debug: (msg, data) => logger.debug(msg, data),
      info: (msg, data) => logger.info(msg, data),
      warn: (msg, data) => logger.warn(msg, data),
      error: (msg, error, data) => logger.error(msg, error, data),
      fatal: (msg, error, data) => logger.fatal(msg, error, data),
      child: (context) => wrap(logger.child(context)),
      getContext: () => logger.getContext(),
      withContext: (ctx) => {
        const childCtx: LogContext = {};
        if (ctx.runId) childCtx.runId = ctx.runId;
        if (ctx.runKind) childCtx.runKind = ctx.runKind;
        if (ctx.traceId) childCtx.traceId = ctx.traceId;
        return wrap(logger.child(childCtx));
      },
    };
  }

  return wrap(inner);
}

/** Bound a message before it reaches the store or a log line. */
export function capErrorMessage(message: string, maxLength = 1000): string {
  if (message.length <= maxLength) return message;
  return message.substring(0, maxLength) + '... (truncated)';
}

export type PersistErrorFn = (
  service: string,
  message: string,
  stack?: string,
  context?: Record<string, unknown>,
) => Promise<void>;

const SERVICE_ERROR_CATEGORY: Record<string, NotifyCategory> = {
  scheduler: NotifyCategory.SCHEDULER_FAILED,
  collector: NotifyCategory.COLLECTOR_ERROR,
};

/**
 * Persist an error to the error log table and announce it on Slack.
 * A failing persist is reported through `logger` (or stderr) and never thrown;
 * the returned promise settles once the persist attempt is over.
 */
export function safeLogError(
  persistFn: PersistErrorFn,
  service: string,
  error: unknown,
  context?: Record<string, unknown>,
  logger?: Logger,
  category?: NotifyCategory,
): Promise<void> {
  const message = capErrorMessage(error instanceof Error ? error.message : String(error));
  const stack = error instanceof Error ? error.stack : undefined;

  const persisted = persistFn(service, message, stack, context).catch((persistError: unknown) => {
    const details = {
      originalError: message,
      persistError: persistError instanceof Error ? persistError.message : String(persistError),
    };
    if (logger) {
      logger.warn('Failed to persist error log, falling back to stdout', details);
    } else {
      console.error('[log-persist-fallback]', { service, ...details });
    }
  });

  const slackContext: Record<string, string> = { service };
  for (const [key, value] of Object.entries(context ?? {})) {
    if (value !== undefined && value !== null) slackContext[key] = String(value);
  }

  // notify() never rejects
  void notify({
    category: category ?? SERVICE_ERROR_CATEGORY[service] ?? NotifyCategory.COLLECTOR_ERROR,
    title: `${service} error`,
    message,
    context: slackContext,
    error,
  });

  return persisted;
}
