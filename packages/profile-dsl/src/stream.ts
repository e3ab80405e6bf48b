/**
 * jailprof Profile DSL — Profile Stream
 *
 * A ProfileStream is a whole profile file: an ordered sequence of Lines in
 * file order. Parsing never aborts; malformed lines are kept as `invalid`
 * content and reported through hasErrors() / errors().
 *
 * Derived streams (filter, errors, concat) copy the Line records and share
 * the frozen Content values, so renumbering one stream never affects
 * another.
 */

import type { Content, Line } from './types.js';
import { contentEquals, formatContent, isInvalid, parseContent } from './content.js';

/**
 * Result of parsing a whole profile.
 *
 * Both branches carry the fully populated stream; `ok` is false iff at
 * least one line is invalid.
 */
export type StreamParseResult =
  | { readonly ok: true; readonly stream: ProfileStream }
  | { readonly ok: false; readonly stream: ProfileStream };

function copyLine(line: Line): Line {
  return { lineno: line.lineno, content: line.content };
}

/**
 * Split profile text into lines.
 *
 * A terminating newline does not start another line, and a `\r` before the
 * newline is dropped.
 */
function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

export class ProfileStream implements Iterable<Line> {
  private readonly lines: Line[];

  private constructor(lines: Line[]) {
    this.lines = lines;
  }

  /**
   * Parse profile text. Lines are numbered from 0.
   *
   * @example
   * const { ok, stream } = ProfileStream.parse('noroot\nbogus\n');
   * // ok === false, stream.length === 2, stream.errors().length === 1
   */
  static parse(text: string): StreamParseResult {
    let ok = true;
    const lines = splitLines(text).map((source, lineno): Line => {
      const parsed = parseContent(source);
      if (!parsed.ok) {
        ok = false;
      }
      return { lineno, content: parsed.content };
    });
    const stream = new ProfileStream(lines);
    return ok ? { ok: true, stream } : { ok: false, stream };
  }

  /** Build a stream from existing lines. The Line records are copied. */
  static from(lines: Iterable<Line>): ProfileStream {
    return new ProfileStream(Array.from(lines, copyLine));
  }

  get length(): number {
    return this.lines.length;
  }

  /** The line at `index` (negative counts from the end), or undefined. */
  at(index: number): Line | undefined {
    return this.lines.at(index);
  }

  [Symbol.iterator](): Iterator<Line> {
    return this.lines[Symbol.iterator]();
  }

  /** True if any line's content equals `content` by value. */
  contains(content: Content): boolean {
    return this.lines.some((line) => contentEquals(line.content, content));
  }

  hasErrors(): boolean {
    return this.lines.some((line) => isInvalid(line.content));
  }

  /** The invalid lines, with their original line numbers. */
  errors(): ProfileStream {
    return this.filter((line) => isInvalid(line.content));
  }

  filter(predicate: (line: Line) => boolean): ProfileStream {
    return new ProfileStream(this.lines.filter(predicate).map(copyLine));
  }

  /** This stream followed by `other`. Line numbers are kept as they are. */
  concat(other: ProfileStream): ProfileStream {
    return new ProfileStream([...this.lines, ...other.lines].map(copyLine));
  }

  /** Clear every line number. */
  stripLineno(): void {
    for (const line of this.lines) {
      line.lineno = null;
    }
  }

  /** Renumber every line sequentially from 0. */
  rewriteLineno(): void {
    this.lines.forEach((line, index) => {
      line.lineno = index;
    });
  }

  /** The formatted profile: every line's text, each ending in `\n`. */
  toString(): string {
    return this.lines.map((line) => formatContent(line.content)).join('');
  }
}
