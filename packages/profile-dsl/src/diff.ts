import type { Line } from './types.js';
import { isBlank, isComment } from './content.js';
import { ProfileStream } from './stream.js';

/** Lines unique to each side of a comparison, with their original line numbers. */
export interface StreamDiff {
  readonly onlyInLeft: ProfileStream;
  readonly onlyInRight: ProfileStream;
}

function isSignificant(line: Line): boolean {
  return !isComment(line.content) && !isBlank(line.content);
}

/**
 * Compare two profiles by content.
 *
 * Comments and blank lines are ignored. Two lines match when their contents
 * are equal by value, wherever they sit in their files.
 */
export function diffStreams(left: ProfileStream, right: ProfileStream): StreamDiff {
  return {
    onlyInLeft: left.filter((line) => isSignificant(line) && !right.contains(line.content)),
    onlyInRight: right.filter((line) => isSignificant(line) && !left.contains(line.content)),
  };
}
