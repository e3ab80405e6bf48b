/**
 * jailprof cat — Print a profile together with the files it pulls in
 *
 * Output order for each profile:
 *   1. Its `.local` includes (except the globals.local family)
 *   2. The profile itself
 *   3. Its `.profile` includes (redirects), each printed the same way
 *
 * Every file is printed under a `# <path>:` header. Redirects are followed
 * up to INCLUDE_DEPTH_LIMIT levels.
 */

import { Command } from 'commander';
import {
  INCLUDE_DEPTH_LIMIT,
  IncludeDepthError,
  ProfileStream,
  collectIncludes,
} from '@jailprof/profile-dsl';
import { readProfile } from '@jailprof/profile-host';
import type { LoadedProfile, Logger, LookupOptions } from '@jailprof/profile-host';
import { renderFileHeader } from '../output/render.js';
import { fail, runWithContext } from './context.js';

/** Locals every profile includes; printing them with each profile is noise. */
const GLOBAL_LOCALS: ReadonlySet<string> = new Set([
  'globals.local',
  'pre-globals.local',
  'post-globals.local',
]);

export interface CatOptions {
  readonly showLocals: boolean;
  readonly showRedirects: boolean;
}

/** One file `cat` prints. */
export interface CatSection {
  readonly path: string;
  readonly text: string;
}

export type CatResult =
  | { readonly ok: true; readonly sections: CatSection[] }
  | { readonly ok: false; readonly error: IncludeDepthError };

function readIncluded(name: string, lookup: LookupOptions, logger: Logger): LoadedProfile | null {
  const result = readProfile(name, lookup);
  if (!result.ok) {
    logger.warn({ name, err: result.error }, 'skipping included profile');
    return null;
  }
  return result.profile;
}

function collectSections(
  profile: LoadedProfile,
  chain: ReadonlyArray<string>,
  options: CatOptions,
  lookup: LookupOptions,
  logger: Logger,
  out: CatSection[],
): IncludeDepthError | null {
  if (chain.length > INCLUDE_DEPTH_LIMIT) {
    return new IncludeDepthError(INCLUDE_DEPTH_LIMIT, chain);
  }
  const includes = collectIncludes(ProfileStream.parse(profile.text).stream);

  if (options.showLocals) {
    for (const name of includes.locals) {
      if (GLOBAL_LOCALS.has(name)) continue;
      const local = readIncluded(name, lookup, logger);
      if (local !== null) {
        out.push({ path: local.path, text: local.text });
      }
    }
  }

  out.push({ path: profile.path, text: profile.text });

  if (options.showRedirects) {
    for (const name of includes.profiles) {
      const redirect = readIncluded(name, lookup, logger);
      if (redirect === null) continue;
      const error = collectSections(redirect, [...chain, redirect.fullName], options, lookup, logger, out);
      if (error !== null) {
        return error;
      }
    }
  }
  return null;
}

/**
 * The files `cat` prints for a profile, in output order.
 *
 * Redirects nested deeper than INCLUDE_DEPTH_LIMIT yield an IncludeDepthError.
 */
export function catSections(
  profile: LoadedProfile,
  options: CatOptions,
  lookup: LookupOptions,
  logger: Logger,
): CatResult {
  const sections: CatSection[] = [];
  const error = collectSections(profile, [profile.fullName], options, lookup, logger, sections);
  return error === null ? { ok: true, sections } : { ok: false, error };
}

export const catCommand = (): Command => new Command('cat')
  .description('Print a profile with its .local includes and redirects')
  .argument('<profile>', 'Profile name (e.g. firefox) or path')
  .option('--no-locals', 'Do not print .local includes')
  .option('--no-redirects', 'Do not print redirected .profile includes')
  .action(
    (name: string, options: { locals: boolean; redirects: boolean }, command: Command) => {
      runWithContext(command, ({ logger, lookup }) => {
        const result = readProfile(name, lookup);
        if (!result.ok) {
          fail(result.error.message);
          return;
        }

        const cat = catSections(
          result.profile,
          { showLocals: options.locals, showRedirects: options.redirects },
          lookup,
          logger,
        );
        if (!cat.ok) {
          fail(cat.error.message);
          return;
        }
        for (const section of cat.sections) {
          process.stdout.write(renderFileHeader(section.path) + '\n');
          process.stdout.write(section.text);
        }
      });
    },
  );
