/**
 * jailprof Profile DSL — Conditional Parser and Formatter
 *
 * A conditional is a guard keyword followed by one directive:
 *
 *   ?HAS_X11: x11 none
 *
 * The guard is everything before the first space. A guard with nothing after
 * it is EmptyCondition, checked before the guard itself is validated; an
 * unknown guard is BadCondition; errors of the nested directive propagate
 * unchanged.
 */

import { Guard } from './grammar.js';
import { ProfileErrorKind } from './types.js';
import type { Conditional, Result } from './types.js';
import { formatCommand, parseCommand } from './command.js';

const GUARDS: ReadonlyMap<string, Guard> = new Map(Object.values(Guard).map((g) => [g, g]));

export function parseConditional(line: string): Result<Conditional, ProfileErrorKind> {
  const at = line.indexOf(' ');
  if (at === -1 || at === line.length - 1) {
    return { ok: false, error: ProfileErrorKind.EmptyCondition };
  }

  const guard = GUARDS.get(line.slice(0, at));
  if (guard === undefined) {
    return { ok: false, error: ProfileErrorKind.BadCondition };
  }

  const command = parseCommand(line.slice(at + 1));
  if (!command.ok) {
    return command;
  }
  return { ok: true, value: Object.freeze({ guard, command: command.value }) };
}

export function formatConditional(conditional: Conditional): string {
  return `${conditional.guard} ${formatCommand(conditional.command)}`;
}
