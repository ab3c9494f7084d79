/**
 * Structured logging for the dispatch layer.
 *
 * Every component creates a module-level logger with preset fields through
 * `createLogger`. Records are written by a single pino root logger; in the
 * development environment they are rendered by pino-pretty.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logging fields.
 *
 * Common fields include:
 * - component: Component/subsystem identifier (e.g., "registry", "cache")
 * - operation: Operation being performed (e.g., "register", "invoke")
 * - path: Dotted resource path
 * - tier: Override tier of a binding
 * - error_message: Error message for error logs
 * - duration_ms: Execution duration for timed operations
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

function buildRootLogger(): Logger {
  const environment = process.env.DISPATCH_ENV ?? process.env.NODE_ENV ?? 'development';
  const configuredLevel = process.env.DISPATCH_LOG_LEVEL;

  const loggerOptions: LoggerOptions = {
    name: 'resource-dispatch',
    level: isLogLevel(configuredLevel) ? configuredLevel : environment === 'test' ? 'silent' : 'info',
  };

  // Add pino-pretty transport in development
  if (environment === 'development') {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(loggerOptions);
}

let rootLogger: Logger | null = null;

/**
 * Get the process-wide pino logger, creating it on first use.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = buildRootLogger();
  }
  return rootLogger;
}

/**
 * Change the level of the root logger (and of every logger derived from it
 * afterwards).
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

/**
 * Drop undefined values so they do not show up as `null` in the output.
 */
function compactFields(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 *
 * The pino child is created lazily so that modules can declare their logger
 * at import time without fixing the level before configuration is loaded.
 *
 * @example
 * const log = createLogger({ component: 'registry' });
 * log.info('Registered resource', { path: 'billing.get_invoice' });
 */
export function createLogger(defaultFields: LogFields): ComponentLogger {
  let child: Logger | null = null;
  const logger = (): Logger => {
    if (!child || child.level !== getRootLogger().level) {
      child = getRootLogger().child(compactFields(defaultFields));
    }
    return child;
  };

  return {
    error: (message, fields) => logger().error(compactFields(fields), message),
    warn: (message, fields) => logger().warn(compactFields(fields), message),
    info: (message, fields) => logger().info(compactFields(fields), message),
    debug: (message, fields) => logger().debug(compactFields(fields), message),
    trace: (message, fields) => logger().trace(compactFields(fields), message),
  };
}
