/**
 * jailprof Profile DSL — Directive Parser and Formatter
 *
 * parseCommand() and formatCommand() are driven by the tables in grammar.ts.
 *
 * Precedence:
 *   1. Exact forms. The whole line is looked up among the flag keywords and
 *      the bare forms of optional-argument directives. A bare keyword only
 *      matches when nothing follows it.
 *   2. Keyword + argument. The line is split on its first space; the head
 *      must be an argument-bearing keyword. The head is a whole token, so
 *      `private`, `private-lib` and `private-bin` never shadow each other.
 *   3. Anything else is BadCommand.
 *
 * The argument is kept verbatim (including any further spaces), and lists
 * keep their order, so formatCommand(parseCommand(line)) reproduces `line`.
 */

import {
  CAPABILITY_LIST_KEYWORDS,
  DBUS_POLICY_KEYWORDS,
  ENV_SEPARATOR,
  FLAG_KEYWORDS,
  LIST_KEYWORDS,
  LIST_SEPARATOR,
  OPTIONAL_LIST_KEYWORDS,
  OPTIONAL_VALUE_KEYWORDS,
  VALUE_KEYWORDS,
  isKeyOf,
  isOneOf,
} from './grammar.js';
import { ProfileErrorKind } from './types.js';
import type {
  CapabilityCommand,
  Command,
  DBusPolicyCommand,
  FlagCommand,
  ListCommand,
  OptionalListCommand,
  OptionalValueCommand,
  Result,
  ValueCommand,
} from './types.js';
import {
  formatCapability,
  formatDBusPolicy,
  formatList,
  formatProtocol,
  formatSeccompErrorAction,
  parseCapability,
  parseDBusPolicy,
  parseList,
  parseProtocol,
  parseSeccompErrorAction,
} from './vocabulary.js';

type CommandResult = Result<Command, ProfileErrorKind>;
type ArgumentParser = (argument: string) => CommandResult;

const BAD_COMMAND: CommandResult = { ok: false, error: ProfileErrorKind.BadCommand };

function ok(command: Command): CommandResult {
  return { ok: true, value: command };
}

// ---------------------------------------------------------------------------
// Internal: exact forms
// ---------------------------------------------------------------------------

/**
 * Whole-line forms: every flag keyword, plus the bare form of each
 * optional-argument directive.
 */
const EXACT_FORMS: ReadonlyMap<string, Command> = (() => {
  const forms = new Map<string, Command>();
  for (const [kind, keyword] of Object.entries(FLAG_KEYWORDS)) {
    if (isKeyOf(FLAG_KEYWORDS, kind)) {
      forms.set(keyword, Object.freeze({ kind }));
    }
  }
  for (const kind of OPTIONAL_VALUE_KEYWORDS) {
    forms.set(kind, Object.freeze({ kind, value: null }));
  }
  for (const kind of OPTIONAL_LIST_KEYWORDS) {
    forms.set(kind, Object.freeze({ kind, values: null }));
  }
  return forms;
})();

// ---------------------------------------------------------------------------
// Internal: keyword + argument forms
// ---------------------------------------------------------------------------

function splitStrings(argument: string): ReadonlyArray<string> {
  return Object.freeze(argument.split(LIST_SEPARATOR));
}

/**
 * Split `text` once on `separator`. Returns null when the separator is absent.
 */
function splitOnce(text: string, separator: string): readonly [string, string] | null {
  const at = text.indexOf(separator);
  return at === -1 ? null : [text.slice(0, at), text.slice(at + separator.length)];
}

const ARGUMENT_FORMS: ReadonlyMap<string, ArgumentParser> = (() => {
  const forms = new Map<string, ArgumentParser>();

  for (const kind of VALUE_KEYWORDS) {
    forms.set(kind, (value) => ok({ kind, value }));
  }
  for (const kind of OPTIONAL_VALUE_KEYWORDS) {
    forms.set(kind, (value) => ok({ kind, value }));
  }
  for (const kind of LIST_KEYWORDS) {
    forms.set(kind, (argument) => ok({ kind, values: splitStrings(argument) }));
  }
  for (const kind of OPTIONAL_LIST_KEYWORDS) {
    forms.set(kind, (argument) => ok({ kind, values: splitStrings(argument) }));
  }
  for (const kind of CAPABILITY_LIST_KEYWORDS) {
    forms.set(kind, (argument) => {
      const caps = parseList(argument, parseCapability);
      return caps.ok ? ok({ kind, caps: caps.value }) : caps;
    });
  }
  for (const kind of DBUS_POLICY_KEYWORDS) {
    forms.set(kind, (argument) => {
      const policy = parseDBusPolicy(argument);
      return policy.ok ? ok({ kind, policy: policy.value }) : policy;
    });
  }

  forms.set('protocol', (argument) => {
    const protocols = parseList(argument, parseProtocol);
    return protocols.ok ? ok({ kind: 'protocol', protocols: protocols.value }) : protocols;
  });
  forms.set('seccomp-error-action', (argument) => {
    const action = parseSeccompErrorAction(argument);
    return action.ok ? ok({ kind: 'seccomp-error-action', action: action.value }) : action;
  });
  forms.set('bind', (argument) => {
    const pair = splitOnce(argument, LIST_SEPARATOR);
    return pair === null
      ? { ok: false, error: ProfileErrorKind.BadBind }
      : ok({ kind: 'bind', source: pair[0], target: pair[1] });
  });
  forms.set('env', (argument) => {
    const pair = splitOnce(argument, ENV_SEPARATOR);
    return pair === null
      ? { ok: false, error: ProfileErrorKind.BadEnv }
      : ok({ kind: 'env', name: pair[0], value: pair[1] });
  });

  return forms;
})();

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse one directive line (without its conditional guard or newline).
 *
 * @example
 * parseCommand('caps.drop net_admin,sys_admin')
 * // { ok: true, value: { kind: 'caps.drop', caps: [Capability.NetAdmin, Capability.SysAdmin] } }
 * parseCommand('caps.drop net_admin,bogus')
 * // { ok: false, error: ProfileErrorKind.BadCap }
 */
export function parseCommand(line: string): Result<Command, ProfileErrorKind> {
  const exact = EXACT_FORMS.get(line);
  if (exact !== undefined) {
    return ok(exact);
  }

  const split = splitOnce(line, ' ');
  if (split === null) {
    return BAD_COMMAND;
  }
  const [keyword, argument] = split;
  const parseArgument = ARGUMENT_FORMS.get(keyword);
  if (parseArgument === undefined) {
    return BAD_COMMAND;
  }
  return parseArgument(argument);
}

export function isFlagCommand(command: Command): command is FlagCommand {
  return isKeyOf(FLAG_KEYWORDS, command.kind);
}

export function isValueCommand(command: Command): command is ValueCommand {
  return isOneOf(VALUE_KEYWORDS, command.kind);
}

export function isOptionalValueCommand(command: Command): command is OptionalValueCommand {
  return isOneOf(OPTIONAL_VALUE_KEYWORDS, command.kind);
}

export function isListCommand(command: Command): command is ListCommand {
  return isOneOf(LIST_KEYWORDS, command.kind);
}

export function isOptionalListCommand(command: Command): command is OptionalListCommand {
  return isOneOf(OPTIONAL_LIST_KEYWORDS, command.kind);
}

export function isCapabilityCommand(command: Command): command is CapabilityCommand {
  return isOneOf(CAPABILITY_LIST_KEYWORDS, command.kind);
}

export function isDBusPolicyCommand(command: Command): command is DBusPolicyCommand {
  return isOneOf(DBUS_POLICY_KEYWORDS, command.kind);
}

/**
 * Format a directive back to its line (no trailing newline).
 */
export function formatCommand(command: Command): string {
  if (isFlagCommand(command)) {
    return FLAG_KEYWORDS[command.kind];
  }
  if (isValueCommand(command)) {
    return `${command.kind} ${command.value}`;
  }
  if (isOptionalValueCommand(command)) {
    return command.value === null ? command.kind : `${command.kind} ${command.value}`;
  }
  if (isListCommand(command)) {
    return `${command.kind} ${command.values.join(LIST_SEPARATOR)}`;
  }
  if (isOptionalListCommand(command)) {
    return command.values === null
      ? command.kind
      : `${command.kind} ${command.values.join(LIST_SEPARATOR)}`;
  }
  if (isCapabilityCommand(command)) {
    return `${command.kind} ${formatList(command.caps, formatCapability)}`;
  }
  if (isDBusPolicyCommand(command)) {
    return `${command.kind} ${formatDBusPolicy(command.policy)}`;
  }

  switch (command.kind) {
    case 'protocol':
      return `protocol ${formatList(command.protocols, formatProtocol)}`;
    case 'seccomp-error-action':
      return `seccomp-error-action ${formatSeccompErrorAction(command.action)}`;
    case 'bind':
      return `bind ${command.source}${LIST_SEPARATOR}${command.target}`;
    case 'env':
      return `env ${command.name}${ENV_SEPARATOR}${command.value}`;
    default: {
      const exhaustiveCheck: never = command;
      throw new Error(`Unknown command: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}
