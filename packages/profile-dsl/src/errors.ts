import { ProfileErrorKind } from './types.js';

const MESSAGES: Readonly<Record<ProfileErrorKind, string>> = {
  [ProfileErrorKind.BadCommand]: 'Invalid command',
  [ProfileErrorKind.BadCondition]: 'Invalid condition',
  [ProfileErrorKind.EmptyCondition]: 'No command after condition',
  [ProfileErrorKind.BadCap]: 'Invalid capability',
  [ProfileErrorKind.BadProtocol]: 'Invalid protocol',
  [ProfileErrorKind.BadDBusPolicy]: 'Invalid D-Bus policy',
  [ProfileErrorKind.BadSeccompErrorAction]: 'Invalid seccomp error action',
  [ProfileErrorKind.BadBind]: 'Invalid bind, expected <source>,<target>',
  [ProfileErrorKind.BadEnv]: 'Invalid env, expected <name>=<value>',
};

/**
 * Human-readable message for a classification error.
 */
export function describeProfileError(kind: ProfileErrorKind): string {
  return MESSAGES[kind];
}

/**
 * Include expansion went deeper than the nesting limit.
 *
 * Returned as data by expandIncludes(), never thrown by it, so callers can
 * decide how to report it.
 */
export class IncludeDepthError extends Error {
  /** Include targets from the outermost profile down to the one that overflowed. */
  readonly chain: ReadonlyArray<string>;

  constructor(limit: number, chain: ReadonlyArray<string>) {
    super(`Too many include levels (limit ${limit}): ${chain.join(' -> ')}`);
    this.name = 'IncludeDepthError';
    this.chain = chain;
  }
}
