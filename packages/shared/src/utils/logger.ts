import { randomUUID } from 'node:crypto';
import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { MAX_ERROR_MESSAGE_LENGTH } from '../constants.js';
import { notify, NotifyCategory } from './slack.js';

/**
 * Log context that can be attached to log entries for correlation and filtering.
 * These fields flow through the pipeline for distributed tracing.
 */
export interface LogContext {
  /** Unique identifier for the orchestration cycle */
  cycleId?: string;
  /** Unique identifier for trace correlation across services */
  traceId?: string;
  /** Source table being processed */
  tableId?: string;
  /** Service/component name */
  service?: string;
  /** Component within a service */
  component?: string;
  /** Allow additional string keys for flexibility */
  [key: string]: string | undefined;
}

/**
 * Extended logger interface with context support
 */
export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;
  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context.
   * The context is merged with parent context and included in all log entries.
   */
  child(context: LogContext): Logger;

  /**
   * Get the current context attached to this logger
   */
  getContext(): LogContext;
}

/**
 * Wrapper around pino that provides context-aware logging
 */
class ContextLogger implements Logger {
  private pino: PinoLogger;
  private context: LogContext;

  constructor(pinoInstance: PinoLogger, context: LogContext = {}) {
    this.pino = pinoInstance;
    this.context = context;
  }

  private formatData(data?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.context, ...data };
  }

  private formatError(error?: Error | unknown): Record<string, unknown> {
    if (!error) return {};
    if (error instanceof Error) {
      // Keep the first 5 frames; deep stacks from pg and the Azure SDK bury the message
      const stackLines = error.stack?.split('\n') ?? [];
      const truncatedStack = stackLines.slice(0, 6).join('\n');

      return {
        err: {
          type: error.name,
          message: error.message,
          stack: truncatedStack,
        },
      };
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
    const mergedContext = { ...this.context, ...context };
    const childPino = this.pino.child(context);
    return new ContextLogger(childPino, mergedContext);
  }

  getContext(): LogContext {
    return { ...this.context };
  }
}

/**
 * Configuration options for creating a logger
 */
export interface CreateLoggerOptions {
  /** Service name to include in all log entries */
  service: string;
  /** Log level (default: 'info', or 'debug' if LOG_LEVEL env is set) */
  level?: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  /** Force pretty printing regardless of environment */
  pretty?: boolean;
  /** Additional context to include in all log entries */
  context?: LogContext;
}

function truncateJson(value: unknown, maxLength: number): string {
  const str = JSON.stringify(value) ?? String(value);
  return str.length > maxLength ? str.slice(0, maxLength) + '...[truncated]' : str;
}

/**
 * Determine if we should use pretty printing
 */
function shouldUsePretty(forceFlag?: boolean): boolean {
  if (forceFlag !== undefined) return forceFlag;
  const nodeEnv = process.env.NODE_ENV;
  return nodeEnv === 'development' || nodeEnv === 'test' || !nodeEnv;
}

/**
 * Get the log level from environment or default
 */
function getLogLevel(configLevel?: string): string {
  return configLevel ?? process.env.LOG_LEVEL ?? 'info';
}

/**
 * Create a new logger instance with the specified configuration.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'scheduler' });
 * logger.info('Starting cycle');
 *
 * const tableLog = logger.child({ cycleId: 'c-1', tableId: 'orders' });
 * tableLog.info('Extracting delta'); // includes cycleId and tableId
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const usePretty = shouldUsePretty(options.pretty);
  const level = getLogLevel(options.level);

  const pinoOptions: LoggerOptions = {
    level,
    base: {
      service: options.service,
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Source rows can be arbitrarily wide; never log more than 1KB of them
    serializers: {
      row: (value: unknown) => truncateJson(value, 1024),
      rows: (value: unknown) => truncateJson(value, 1024),
      report: (value: unknown) => truncateJson(value, 4096),
    },
  };

  // Use pino-pretty transport for human-readable output in development
  if (usePretty) {
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

  const pinoInstance = pino(pinoOptions);
  return new ContextLogger(pinoInstance, options.context ?? {});
}

/**
 * Generate a unique trace ID for request correlation.
 * Uses randomUUID() for uniqueness.
 */
export function generateTraceId(): string {
  return randomUUID();
}

/**
 * No-op logger for testing or when logging should be disabled
 */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => nullLogger,
  getContext: () => ({}),
};

/**
 * Cap error messages to a maximum length to prevent exceeding database or log size limits.
 */
export function capErrorMessage(message: string, maxLength = MAX_ERROR_MESSAGE_LENGTH): string {
  if (message.length <= maxLength) return message;
  return message.substring(0, maxLength) + '... (truncated)';
}

/**
 * Safely persist an error to the error_logs table and send a Slack notification.
 * Falls back to the logger if the persist function throws, so log persistence
 * failures never mask the original error. Both side effects are fire-and-forget.
 *
 * @param persistFn - The insertErrorLog function from @deltaflow/database
 * @param service - Service name
 * @param error - The caught error
 * @param context - Optional context to persist
 * @param logger - Optional logger for fallback output
 */
export function safeLogError(
  persistFn: (service: string, msg: string, stack?: string, ctx?: Record<string, unknown>) => Promise<void>,
  service: string,
  error: unknown,
  context?: Record<string, unknown>,
  logger?: Logger,
): void {
  const rawMessage = error instanceof Error ? error.message : String(error);
  const errorMessage = capErrorMessage(rawMessage);
  const errorStack = error instanceof Error ? error.stack : undefined;

  persistFn(service, errorMessage, errorStack, context).catch((persistError: unknown) => {
    if (logger) {
      logger.warn('Failed to persist error log, falling back to stdout', {
        originalError: errorMessage,
        persistError: persistError instanceof Error ? persistError.message : String(persistError),
      });
    } else {
      console.error('[log-persist-fallback]', {
        service,
        error: errorMessage,
        persistError: persistError instanceof Error ? persistError.message : String(persistError),
      });
    }
  });

  const slackContext: Record<string, string> = { service };
  if (context) {
    for (const [k, v] of Object.entries(context)) {
      if (v !== undefined && v !== null) {
        slackContext[k] = String(v);
      }
    }
  }
  void notify({
    category: NotifyCategory.SCHEDULER_FAILED,
    title: `${service} error`,
    message: errorMessage,
    context: slackContext,
    error,
  });
}
