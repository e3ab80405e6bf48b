/**
 * jailprof Profile Host — Diagnostic Logger
 *
 * pino writing JSON lines to stderr, so stdout stays reserved for profile
 * output. The level resolves with the following precedence:
 *
 *   1. Explicit level (e.g. from --log-level)
 *   2. JAILPROF_LOG_LEVEL environment variable
 *   3. Default: warn
 */

import pino from 'pino';

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export const LOG_LEVELS: ReadonlyArray<LogLevel> = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the log level.
 *
 * @throws {Error} If the explicit level or JAILPROF_LOG_LEVEL names no pino level
 */
export function resolveLogLevel(explicit?: string): LogLevel {
  const fromEnv = process.env['JAILPROF_LOG_LEVEL'];
  const value =
    explicit !== undefined && explicit !== ''
      ? explicit
      : fromEnv !== undefined && fromEnv !== ''
        ? fromEnv
        : DEFAULT_LOG_LEVEL;
  if (!isLogLevel(value)) {
    throw new Error(`Unknown log level '${value}', expected one of: ${LOG_LEVELS.join(', ')}`);
  }
  return value;
}

export interface CreateLoggerOptions {
  readonly level?: LogLevel | undefined;
  /** Where log lines go. Default: stderr. */
  readonly destination?: pino.DestinationStream | undefined;
}

export function createLogger(opts: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      name: 'jailprof',
      level: opts.level ?? DEFAULT_LOG_LEVEL,
    },
    opts.destination ?? pino.destination(2),
  );
}

/** A logger that drops everything; the default wherever a logger is optional. */
export const SILENT_LOGGER: Logger = pino({ level: 'silent' });
