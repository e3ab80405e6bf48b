/**
 * jailprof Profile DSL — Include Expansion
 *
 * expandIncludes() inlines every top-level `include NAME` directive, producing
 * a standalone profile. Included text is obtained through a ProfileSource so
 * this package stays free of filesystem access.
 *
 * Only unconditional includes are expanded; `?GUARD: include x` depends on
 * runtime state and is copied as it is.
 */

import type { Content, Line } from './types.js';
import { IncludeDepthError } from './errors.js';
import { ProfileStream } from './stream.js';

/** Deepest include nesting expandIncludes() follows. */
export const INCLUDE_DEPTH_LIMIT = 16;

/**
 * Supplies the text of included profiles by name.
 *
 * Returns null when no profile of that name exists.
 */
export interface ProfileSource {
  load(name: string): string | null;
}

export interface ExpandOptions {
  /** Leave `include *.inc` lines in place instead of inlining them. */
  readonly keepInc?: boolean;
}

export type ExpandResult =
  | {
      readonly ok: true;
      readonly stream: ProfileStream;
      /** Include targets the source could not supply, in encounter order. */
      readonly missing: ReadonlyArray<string>;
    }
  | { readonly ok: false; readonly error: IncludeDepthError };

export interface IncludeGroups {
  /** `*.local` targets. */
  readonly locals: ReadonlyArray<string>;
  /** `*.profile` targets (redirects). */
  readonly profiles: ReadonlyArray<string>;
  readonly others: ReadonlyArray<string>;
}

/** The target of an unconditional `include` directive, or null. */
function includeTarget(content: Content): string | null {
  if (content.kind !== 'command') {
    return null;
  }
  const { command } = content;
  return command.kind === 'include' ? command.value : null;
}

interface Expansion {
  readonly source: ProfileSource;
  readonly keepInc: boolean;
  readonly lines: Line[];
  readonly missing: string[];
}

function expandInto(
  stream: ProfileStream,
  chain: ReadonlyArray<string>,
  expansion: Expansion,
): IncludeDepthError | null {
  for (const line of stream) {
    const target = includeTarget(line.content);
    if (target === null || (expansion.keepInc && target.endsWith('.inc'))) {
      expansion.lines.push({ lineno: line.lineno, content: line.content });
      continue;
    }

    const nested = [...chain, target];
    if (nested.length > INCLUDE_DEPTH_LIMIT) {
      return new IncludeDepthError(INCLUDE_DEPTH_LIMIT, nested);
    }
    const text = expansion.source.load(target);
    if (text === null) {
      expansion.missing.push(target);
      continue;
    }
    const error = expandInto(ProfileStream.parse(text).stream, nested, expansion);
    if (error !== null) {
      return error;
    }
  }
  return null;
}

/**
 * Inline the includes of `stream`, recursively.
 *
 * Lines of an included profile replace its `include` line in place. Missing
 * includes are dropped and listed in `missing`. The result is numbered from 0.
 *
 * @example
 * const source = { load: (name: string) => (name === 'a.inc' ? 'noroot\n' : null) };
 * const result = expandIncludes(ProfileStream.parse('include a.inc\nnonewprivs\n').stream, source);
 * // result.ok && result.stream.toString() === 'noroot\nnonewprivs\n'
 */
export function expandIncludes(
  stream: ProfileStream,
  source: ProfileSource,
  options: ExpandOptions = {},
): ExpandResult {
  const expansion: Expansion = {
    source,
    keepInc: options.keepInc ?? false,
    lines: [],
    missing: [],
  };
  const error = expandInto(stream, [], expansion);
  if (error !== null) {
    return { ok: false, error };
  }

  const expanded = ProfileStream.from(expansion.lines);
  expanded.rewriteLineno();
  return { ok: true, stream: expanded, missing: expansion.missing };
}

/**
 * Group the unconditional include targets of `stream` by file type.
 */
export function collectIncludes(stream: ProfileStream): IncludeGroups {
  const locals: string[] = [];
  const profiles: string[] = [];
  const others: string[] = [];
  for (const line of stream) {
    const target = includeTarget(line.content);
    if (target === null) {
      continue;
    }
    if (target.endsWith('.local')) {
      locals.push(target);
    } else if (target.endsWith('.profile')) {
      profiles.push(target);
    } else {
      others.push(target);
    }
  }
  return { locals, profiles, others };
}
