/**
 * jailprof Profile Host — Profile Lookup and Reading
 *
 * A profile is addressed either by name (`firefox`, `dc`, `globals.local`),
 * completed with completeName() and searched for in resolveSearchDirs()
 * order, or by path (anything containing `/`), used as given.
 *
 * Synchronous I/O matches the CLI's one-shot, single-process design.
 */

import { readFileSync, statSync } from 'node:fs';
import { basename, join } from 'node:path';
import { completeName, isProfilePath } from './names.js';
import { resolveSearchDirs } from './locations.js';
import type { SearchDirOptions } from './locations.js';
import { SILENT_LOGGER } from './logger.js';
import type { Logger } from './logger.js';

export interface LookupOptions extends SearchDirOptions {
  readonly logger?: Logger | undefined;
}

/** A profile found and read from disk. */
export interface LoadedProfile {
  /** The name as given by the caller. */
  readonly rawName: string;
  /** The completed file name (`firefox.profile`). */
  readonly fullName: string;
  readonly path: string;
  readonly text: string;
}

export type ReadProfileResult =
  | { readonly ok: true; readonly profile: LoadedProfile }
  | { readonly ok: false; readonly error: Error };

/**
 * No file for a profile name exists in any search directory.
 */
export class ProfileNotFoundError extends Error {
  readonly profileName: string;
  readonly searched: ReadonlyArray<string>;

  constructor(profileName: string, searched: ReadonlyArray<string>) {
    super(
      searched.length === 0
        ? `Profile '${profileName}' does not exist`
        : `Profile '${profileName}' not found in ${searched.join(', ')}`,
    );
    this.name = 'ProfileNotFoundError';
    this.profileName = profileName;
    this.searched = searched;
  }
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

/**
 * Find the file of a profile.
 *
 * Returns the first existing file across the search directories, the path
 * itself for a path that exists, or null.
 *
 * @throws {ProfileNameError} If `name` is not a valid profile name
 */
export function lookupProfile(name: string, opts: LookupOptions = {}): string | null {
  const logger = opts.logger ?? SILENT_LOGGER;
  if (isProfilePath(name)) {
    return isFile(name) ? name : null;
  }

  const fullName = completeName(name);
  logger.debug({ name, fullName }, 'completed profile name');
  for (const dir of resolveSearchDirs(opts)) {
    const candidate = join(dir, fullName);
    if (isFile(candidate)) {
      logger.debug({ fullName, path: candidate }, 'found profile');
      return candidate;
    }
  }
  return null;
}

/**
 * Find and read a profile.
 *
 * Invalid names, missing profiles and read failures are returned as the
 * error of the result.
 */
export function readProfile(name: string, opts: LookupOptions = {}): ReadProfileResult {
  try {
    const fullName = isProfilePath(name) ? basename(name) : completeName(name);
    const path = lookupProfile(name, opts);
    if (path === null) {
      const error = isProfilePath(name)
        ? new ProfileNotFoundError(name, [])
        : new ProfileNotFoundError(fullName, resolveSearchDirs(opts));
      return { ok: false, error };
    }
    return {
      ok: true,
      profile: { rawName: name, fullName, path, text: readFileSync(path, 'utf-8') },
    };
  } catch (err: unknown) {
    if (err instanceof Error) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
