/**
 * jailprof Profile Host — Search Directory Resolution
 *
 * Profiles are looked up in three directories, in this order:
 *
 *   1. The current working directory
 *   2. The user profile directory
 *   3. The system profile directory
 *
 * The user and system directories each resolve with the following precedence:
 *
 *   1. Explicit option (e.g. from a CLI flag)
 *   2. JAILPROF_USER_DIR / JAILPROF_SYSTEM_DIR environment variable
 *   3. Default: ~/.config/firejail, /etc/firejail
 *
 * Use resolveSearchDirs() throughout the host layer. Never hardcode the
 * profile directories in new code.
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

/** Default system profile directory. */
export const SYSTEM_PROFILE_DIR = '/etc/firejail';

/**
 * Options for search directory resolution.
 */
export interface SearchDirOptions {
  /** Directory searched first. Default: process.cwd(). */
  readonly cwd?: string | undefined;
  /** Explicit user profile directory — highest precedence. */
  readonly userDir?: string | undefined;
  /** Explicit system profile directory — highest precedence. */
  readonly systemDir?: string | undefined;
}

function fromEnv(variable: string): string | null {
  const value = process.env[variable];
  return typeof value === 'string' && value !== '' ? value : null;
}

function explicit(value: string | undefined): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

/**
 * Resolve the user profile directory.
 *
 * Precedence (highest to lowest):
 *   1. opts.userDir
 *   2. JAILPROF_USER_DIR env var
 *   3. Default: ~/.config/firejail
 */
export function resolveUserDir(opts?: SearchDirOptions): string {
  return (
    explicit(opts?.userDir) ??
    fromEnv('JAILPROF_USER_DIR') ??
    join(homedir(), '.config', 'firejail')
  );
}

/**
 * Resolve the system profile directory.
 *
 * Precedence (highest to lowest):
 *   1. opts.systemDir
 *   2. JAILPROF_SYSTEM_DIR env var
 *   3. Default: /etc/firejail
 */
export function resolveSystemDir(opts?: SearchDirOptions): string {
  return explicit(opts?.systemDir) ?? fromEnv('JAILPROF_SYSTEM_DIR') ?? SYSTEM_PROFILE_DIR;
}

/**
 * The directories searched for profiles, highest priority first.
 *
 * Directories are returned as absolute paths; they need not exist.
 */
export function resolveSearchDirs(opts?: SearchDirOptions): ReadonlyArray<string> {
  return [
    resolve(explicit(opts?.cwd) ?? process.cwd()),
    resolve(resolveUserDir(opts)),
    resolve(resolveSystemDir(opts)),
  ];
}
