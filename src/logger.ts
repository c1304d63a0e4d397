/**
 * Structured logging for filter lifecycle events.
 *
 * Entries are plain objects; the default handler prints them to the console
 * as one JSON line each. Pass a custom `handler` to route entries elsewhere.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ component: 'bloom', minLevel: 'debug' });
 * logger.child({ filter: 'visitors' }).info('filter restored', { shards: 1 });
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  error?: {
    name: string;
    message: string;
    code?: string;
  };
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  /** Logger whose entries all carry `context` in addition to their own data */
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  component?: string;
  /** Minimum level to emit (default: info) */
  minLevel?: LogLevel;
  context?: Record<string, unknown>;
  handler?: (entry: LogEntry) => void;
}

function defaultHandler(entry: LogEntry): void {
  const output = JSON.stringify(entry);

  switch (entry.level) {
    case 'debug':
      console.debug(output);
      break;
    case 'info':
      console.info(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'error':
      console.error(output);
      break;
  }
}

function describeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined && { code }),
    };
  }
  return { name: 'Unknown', message: String(error) };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { component, minLevel = 'info', context = {}, handler = defaultHandler } = options;

  function log(
    level: LogLevel,
    message: string,
    error: unknown,
    data?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (component !== undefined) {
      entry.component = component;
    }
    if (error !== undefined) {
      entry.error = describeError(error);
    }

    const merged = { ...context, ...data };
    if (Object.keys(merged).length > 0) {
      entry.data = merged;
    }

    handler(entry);
  }

  return {
    debug: (message, data) => log('debug', message, undefined, data),
    info: (message, data) => log('info', message, undefined, data),
    warn: (message, data) => log('warn', message, undefined, data),
    error: (message, error, data) => log('error', message, error, data),
    child: (childContext) =>
      createLogger({
        ...(component !== undefined && { component }),
        minLevel,
        context: { ...context, ...childContext },
        handler,
      }),
  };
}

/** Discards everything. The engine's default. */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
};
