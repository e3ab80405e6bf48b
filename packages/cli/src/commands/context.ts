/**
 * commands/context.ts — per-invocation state shared by every subcommand.
 *
 * Built from the program's global options:
 *   --log-level <level>   pino level (default: JAILPROF_LOG_LEVEL, then warn)
 *   --user-dir <dir>      user profile directory (default: JAILPROF_USER_DIR, then ~/.config/firejail)
 *   --system-dir <dir>    system profile directory (default: JAILPROF_SYSTEM_DIR, then /etc/firejail)
 */

import type { Command } from 'commander';
import { createLogger, resolveLogLevel } from '@jailprof/profile-host';
import type { Logger, LookupOptions } from '@jailprof/profile-host';

export interface CliContext {
  readonly logger: Logger;
  readonly lookup: LookupOptions;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

export function buildContext(command: Command): CliContext {
  const options: Record<string, unknown> = command.optsWithGlobals();
  const logger = createLogger({ level: resolveLogLevel(stringOption(options, 'logLevel')) });
  return {
    logger,
    lookup: {
      userDir: stringOption(options, 'userDir'),
      systemDir: stringOption(options, 'systemDir'),
      logger,
    },
  };
}

/** Write a failure to stderr and mark the process as failed. */
export function fail(message: string, exitCode = 1): void {
  process.stderr.write(`jailprof: ${message}\n`);
  process.exitCode = exitCode;
}

/**
 * Run a subcommand body with its context.
 *
 * Errors thrown by the body are reported through fail().
 */
export function runWithContext(command: Command, body: (ctx: CliContext) => void): void {
  try {
    body(buildContext(command));
  } catch (err: unknown) {
    if (err instanceof Error) {
      fail(err.message);
      return;
    }
    throw err;
  }
}
