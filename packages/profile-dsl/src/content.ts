/**
 * jailprof Profile DSL — Line Classification
 *
 * parseContent() is the single entry point for classifying one line of
 * profile text. Classification never fails in the exceptional sense: a line
 * that is not blank, a comment, a conditional or a directive becomes an
 * `invalid` Content that keeps the verbatim text and the reason.
 *
 * Order:
 *   1. empty string  → blank
 *   2. leading `#`   → comment (rest of the line, unparsed)
 *   3. leading `?`   → conditional, else invalid
 *   4. otherwise     → command, else invalid
 */

import { isDeepStrictEqual } from 'node:util';
import type {
  BlankContent,
  CommentContent,
  Content,
  ContentParseResult,
  InvalidContent,
  ProfileErrorKind,
} from './types.js';
import { formatCommand, parseCommand } from './command.js';
import { formatConditional, parseConditional } from './conditional.js';

const BLANK: BlankContent = Object.freeze({ kind: 'blank' });

/**
 * Freeze a parsed value and everything reachable from it.
 *
 * Content values are shared between streams (filtered views, diffs), so
 * they must never change after classification.
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function invalid(text: string, error: ProfileErrorKind): ContentParseResult {
  return { ok: false, content: Object.freeze({ kind: 'invalid', text, error }) };
}

/**
 * Classify one line of profile text (without its line terminator).
 */
export function parseContent(line: string): ContentParseResult {
  if (line === '') {
    return { ok: true, content: BLANK };
  }
  if (line.startsWith('#')) {
    return { ok: true, content: Object.freeze({ kind: 'comment', text: line.slice(1) }) };
  }
  if (line.startsWith('?')) {
    const conditional = parseConditional(line);
    return conditional.ok
      ? { ok: true, content: deepFreeze({ kind: 'conditional', conditional: conditional.value }) }
      : invalid(line, conditional.error);
  }
  const command = parseCommand(line);
  return command.ok
    ? { ok: true, content: deepFreeze({ kind: 'command', command: command.value }) }
    : invalid(line, command.error);
}

/**
 * Format a Content back to text, including its trailing newline.
 */
export function formatContent(content: Content): string {
  switch (content.kind) {
    case 'blank':
      return '\n';
    case 'comment':
      return `#${content.text}\n`;
    case 'conditional':
      return `${formatConditional(content.conditional)}\n`;
    case 'command':
      return `${formatCommand(content.command)}\n`;
    case 'invalid':
      return `${content.text}\n`;
    default: {
      const exhaustiveCheck: never = content;
      throw new Error(`Unknown content: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

/**
 * Value equality of two Contents.
 *
 * Compares the typed payloads, not object identity; list order is significant.
 */
export function contentEquals(a: Content, b: Content): boolean {
  return isDeepStrictEqual(a, b);
}

export function isBlank(content: Content): content is BlankContent {
  return content.kind === 'blank';
}

export function isComment(content: Content): content is CommentContent {
  return content.kind === 'comment';
}

export function isInvalid(content: Content): content is InvalidContent {
  return content.kind === 'invalid';
}
