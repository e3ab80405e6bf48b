/**
 * jailprof Profile Host — Profile Sources
 *
 * Implementations of the ProfileSource seam through which include
 * expansion reads included profiles:
 *   - FileProfileSource   — lookup across the search directories
 *   - MemoryProfileSource — in-memory profiles for tests and embedded use
 */

import type { ProfileSource } from '@jailprof/profile-dsl';
import { ProfileNameError, completeName, isProfilePath } from './names.js';
import { ProfileNotFoundError, readProfile } from './lookup.js';
import type { LookupOptions } from './lookup.js';

/**
 * ProfileSource reading from the search directories.
 *
 * A profile that does not exist, or a name that cannot name one (`..`, an
 * empty target), loads as null; an unreadable file is thrown.
 */
export class FileProfileSource implements ProfileSource {
  constructor(private readonly opts: LookupOptions = {}) {}

  load(name: string): string | null {
    const result = readProfile(name, this.opts);
    if (result.ok) {
      return result.profile.text;
    }
    if (result.error instanceof ProfileNotFoundError || result.error instanceof ProfileNameError) {
      return null;
    }
    throw result.error;
  }
}

/**
 * In-memory ProfileSource.
 *
 * Profiles are stored under their completed names, so `dc` and
 * `disable-common.inc` address the same entry. No file system access.
 * Loading a name that cannot name a profile yields null; storing one throws.
 */
export class MemoryProfileSource implements ProfileSource {
  private readonly profiles: Map<string, string> = new Map();

  constructor(profiles: Readonly<Record<string, string>> = {}) {
    for (const [name, text] of Object.entries(profiles)) {
      this.set(name, text);
    }
  }

  set(name: string, text: string): void {
    this.profiles.set(MemoryProfileSource.key(name), text);
  }

  load(name: string): string | null {
    try {
      return this.profiles.get(MemoryProfileSource.key(name)) ?? null;
    } catch (err: unknown) {
      if (err instanceof ProfileNameError) {
        return null;
      }
      throw err;
    }
  }

  private static key(name: string): string {
    return isProfilePath(name) ? name : completeName(name);
  }
}
