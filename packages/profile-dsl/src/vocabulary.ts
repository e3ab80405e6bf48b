/**
 * jailprof Profile DSL — Value Vocabularies
 *
 * String ↔ value mappings for the closed vocabularies used inside
 * directives: capability names, protocol names, D-Bus policies and seccomp
 * error actions. Each parseX/formatX pair is a bijection over the recognized
 * tokens; an unknown token yields the vocabulary's error kind.
 */

import { Capability, DBusPolicy, ProfileErrorKind, Protocol } from './types.js';
import type { Result, SeccompErrorAction } from './types.js';
import { LIST_SEPARATOR } from './grammar.js';
import errnoNameList from '../data/errno-names.json' with { type: 'json' };

// ---------------------------------------------------------------------------
// Internal: enum lookup tables
// ---------------------------------------------------------------------------

function lookupTable<T extends string>(values: ReadonlyArray<T>): ReadonlyMap<string, T> {
  return new Map(values.map((v) => [v, v]));
}

const CAPABILITIES = lookupTable(Object.values(Capability));
const PROTOCOLS = lookupTable(Object.values(Protocol));
const DBUS_POLICIES = lookupTable(Object.values(DBusPolicy));

/** Errno names accepted by `seccomp-error-action`. */
const ERRNO_NAMES: ReadonlySet<string> = new Set(errnoNameList);

// ---------------------------------------------------------------------------
// Capability
// ---------------------------------------------------------------------------

export function parseCapability(token: string): Result<Capability, ProfileErrorKind> {
  const cap = CAPABILITIES.get(token);
  return cap === undefined
    ? { ok: false, error: ProfileErrorKind.BadCap }
    : { ok: true, value: cap };
}

export function formatCapability(cap: Capability): string {
  return cap;
}

// ---------------------------------------------------------------------------
// Protocol
// ---------------------------------------------------------------------------

export function parseProtocol(token: string): Result<Protocol, ProfileErrorKind> {
  const protocol = PROTOCOLS.get(token);
  return protocol === undefined
    ? { ok: false, error: ProfileErrorKind.BadProtocol }
    : { ok: true, value: protocol };
}

export function formatProtocol(protocol: Protocol): string {
  return protocol;
}

// ---------------------------------------------------------------------------
// DBusPolicy
// ---------------------------------------------------------------------------

export function parseDBusPolicy(token: string): Result<DBusPolicy, ProfileErrorKind> {
  const policy = DBUS_POLICIES.get(token);
  return policy === undefined
    ? { ok: false, error: ProfileErrorKind.BadDBusPolicy }
    : { ok: true, value: policy };
}

export function formatDBusPolicy(policy: DBusPolicy): string {
  return policy;
}

// ---------------------------------------------------------------------------
// SeccompErrorAction
// ---------------------------------------------------------------------------

/**
 * Parse a seccomp error action: `kill`, `log`, or an errno name such as
 * `EPERM`. Errno names are case-sensitive.
 */
export function parseSeccompErrorAction(
  token: string,
): Result<SeccompErrorAction, ProfileErrorKind> {
  if (token === 'kill' || token === 'log') {
    return { ok: true, value: { kind: token } };
  }
  if (ERRNO_NAMES.has(token)) {
    return { ok: true, value: { kind: 'errno', errno: token } };
  }
  return { ok: false, error: ProfileErrorKind.BadSeccompErrorAction };
}

export function formatSeccompErrorAction(action: SeccompErrorAction): string {
  return action.kind === 'errno' ? action.errno : action.kind;
}

/** Every errno name `seccomp-error-action` accepts, in table order. */
export function errnoNames(): ReadonlyArray<string> {
  return [...ERRNO_NAMES];
}

// ---------------------------------------------------------------------------
// Lists
// ---------------------------------------------------------------------------

/**
 * Split a comma-separated argument and parse every token.
 *
 * Fails with the first token's error; bad tokens are never dropped.
 * An empty argument is one empty token, which keeps `format(parse(x)) === x`.
 */
export function parseList<T>(
  argument: string,
  parseItem: (token: string) => Result<T, ProfileErrorKind>,
): Result<ReadonlyArray<T>, ProfileErrorKind> {
  const items: T[] = [];
  for (const token of argument.split(LIST_SEPARATOR)) {
    const parsed = parseItem(token);
    if (!parsed.ok) {
      return parsed;
    }
    items.push(parsed.value);
  }
  return { ok: true, value: Object.freeze(items) };
}

/**
 * Join list items with `,` in their original order.
 */
export function formatList<T>(items: ReadonlyArray<T>, formatItem: (item: T) => string): string {
  return items.map(formatItem).join(LIST_SEPARATOR);
}
