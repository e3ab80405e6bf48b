/**
 * jailprof Profile DSL — Core Type Definitions
 *
 * This module defines the typed model of a sandbox profile: the value
 * vocabularies used inside directives, the Command and Conditional unions,
 * the per-line Content classification, and the result and error types.
 *
 * These types are the base layer of jailprof. The host and CLI packages
 * depend on this package; this package has no internal dependencies.
 */

import type {
  CAPABILITY_LIST_KEYWORDS,
  DBUS_POLICY_KEYWORDS,
  FLAG_KEYWORDS,
  Guard,
  LIST_KEYWORDS,
  OPTIONAL_LIST_KEYWORDS,
  OPTIONAL_VALUE_KEYWORDS,
  VALUE_KEYWORDS,
} from './grammar.js';

// ---------------------------------------------------------------------------
// Result Type
// ---------------------------------------------------------------------------

/**
 * Outcome of a classification step.
 *
 * Malformed input is an ordinary outcome in the profile language, so every
 * parser returns this union instead of throwing.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// ---------------------------------------------------------------------------
// Error Taxonomy
// ---------------------------------------------------------------------------

/**
 * Why a line could not be classified.
 *
 * Sub-grammar errors (BadCap, BadProtocol, ...) surface as the error of the
 * whole directive, and from there as the error of the whole line.
 */
export enum ProfileErrorKind {
  /** The line matched no directive keyword or shape. */
  BadCommand = 'bad-command',
  /** The line started with `?` but the guard is unknown. */
  BadCondition = 'bad-condition',
  /** A guard was present but no directive followed it. */
  EmptyCondition = 'empty-condition',
  /** A capability name inside `caps.drop` / `caps.keep` is unknown. */
  BadCap = 'bad-cap',
  /** A protocol name inside `protocol` is unknown. */
  BadProtocol = 'bad-protocol',
  /** The policy of `dbus-user` / `dbus-system` is unknown. */
  BadDBusPolicy = 'bad-dbus-policy',
  /** The action of `seccomp-error-action` is unknown. */
  BadSeccompErrorAction = 'bad-seccomp-error-action',
  /** The argument of `bind` has no `,`. */
  BadBind = 'bad-bind',
  /** The argument of `env` has no `=`. */
  BadEnv = 'bad-env',
}

// ---------------------------------------------------------------------------
// Value Vocabularies
// ---------------------------------------------------------------------------

/** POSIX capabilities accepted by `caps.drop` and `caps.keep`. */
export enum Capability {
  AuditControl = 'audit_control',
  AuditRead = 'audit_read',
  AuditWrite = 'audit_write',
  BlockSuspend = 'block_suspend',
  Chown = 'chown',
  DacOverride = 'dac_override',
  DacReadSearch = 'dac_read_search',
  Fowner = 'fowner',
  Fsetid = 'fsetid',
  IpcLock = 'ipc_lock',
  IpcOwner = 'ipc_owner',
  Kill = 'kill',
  Lease = 'lease',
  LinuxImmutable = 'linux_immutable',
  MacAdmin = 'mac_admin',
  MacOverride = 'mac_override',
  Mknod = 'mknod',
  NetAdmin = 'net_admin',
  NetBindService = 'net_bind_service',
  NetBroadcast = 'net_broadcast',
  NetRaw = 'net_raw',
  Setfcap = 'setfcap',
  Setgid = 'setgid',
  Setpcap = 'setpcap',
  Setuid = 'setuid',
  SysAdmin = 'sys_admin',
  SysBoot = 'sys_boot',
  SysChroot = 'sys_chroot',
  SysModule = 'sys_module',
  SysNice = 'sys_nice',
  SysPacct = 'sys_pacct',
  SysPtrace = 'sys_ptrace',
  SysRawio = 'sys_rawio',
  SysResource = 'sys_resource',
  SysTime = 'sys_time',
  SysTtyConfig = 'sys_tty_config',
  Syslog = 'syslog',
  WakeAlarm = 'wake_alarm',
}

/** Socket families accepted by `protocol`. */
export enum Protocol {
  Unix = 'unix',
  Inet = 'inet',
  Inet6 = 'inet6',
  Netlink = 'netlink',
  Packet = 'packet',
  Bluetooth = 'bluetooth',
}

/** Policy of `dbus-user` / `dbus-system`. */
export enum DBusPolicy {
  Filter = 'filter',
  None = 'none',
}

/**
 * What the seccomp filter does with a blocked syscall: kill the process,
 * log it, or fail it with an errno (`EPERM`, `ENOSYS`, ...).
 */
export type SeccompErrorAction =
  | { readonly kind: 'kill' }
  | { readonly kind: 'log' }
  | { readonly kind: 'errno'; readonly errno: string };

// ---------------------------------------------------------------------------
// Command — one directive
// ---------------------------------------------------------------------------

export type FlagCommandKind = keyof typeof FLAG_KEYWORDS;
export type ValueCommandKind = (typeof VALUE_KEYWORDS)[number];
export type OptionalValueCommandKind = (typeof OPTIONAL_VALUE_KEYWORDS)[number];
export type ListCommandKind = (typeof LIST_KEYWORDS)[number];
export type OptionalListCommandKind = (typeof OPTIONAL_LIST_KEYWORDS)[number];
export type CapabilityCommandKind = (typeof CAPABILITY_LIST_KEYWORDS)[number];
export type DBusPolicyCommandKind = (typeof DBUS_POLICY_KEYWORDS)[number];

/** A directive without argument, e.g. `noroot` or `net none`. */
export interface FlagCommand {
  readonly kind: FlagCommandKind;
}

/** A directive with one verbatim argument, e.g. `blacklist ${HOME}/.ssh`. */
export interface ValueCommand {
  readonly kind: ValueCommandKind;
  readonly value: string;
}

/**
 * A directive that is valid bare or with one argument.
 *
 * `value` is null for the bare form (`private`), and a string, possibly
 * empty, when a space followed the keyword (`private ${HOME}/spam`).
 */
export interface OptionalValueCommand {
  readonly kind: OptionalValueCommandKind;
  readonly value: string | null;
}

/** A directive with a comma-separated list, e.g. `private-bin bash,sh`. */
export interface ListCommand {
  readonly kind: ListCommandKind;
  readonly values: ReadonlyArray<string>;
}

/** A directive valid bare or with a list, e.g. `seccomp` / `seccomp !chroot`. */
export interface OptionalListCommand {
  readonly kind: OptionalListCommandKind;
  readonly values: ReadonlyArray<string> | null;
}

/** `caps.drop` / `caps.keep` with their capability list in source order. */
export interface CapabilityCommand {
  readonly kind: CapabilityCommandKind;
  readonly caps: ReadonlyArray<Capability>;
}

/** `protocol` with its protocol list in source order. */
export interface ProtocolCommand {
  readonly kind: 'protocol';
  readonly protocols: ReadonlyArray<Protocol>;
}

/** `dbus-user <policy>` / `dbus-system <policy>`. */
export interface DBusPolicyCommand {
  readonly kind: DBusPolicyCommandKind;
  readonly policy: DBusPolicy;
}

/** `seccomp-error-action <action>`. */
export interface SeccompErrorActionCommand {
  readonly kind: 'seccomp-error-action';
  readonly action: SeccompErrorAction;
}

/** `bind <source>,<target>`, split on the first `,`. */
export interface BindCommand {
  readonly kind: 'bind';
  readonly source: string;
  readonly target: string;
}

/** `env <name>=<value>`, split on the first `=`. */
export interface EnvCommand {
  readonly kind: 'env';
  readonly name: string;
  readonly value: string;
}

/** Every directive recognized by the profile language. */
export type Command =
  | FlagCommand
  | ValueCommand
  | OptionalValueCommand
  | ListCommand
  | OptionalListCommand
  | CapabilityCommand
  | ProtocolCommand
  | DBusPolicyCommand
  | SeccompErrorActionCommand
  | BindCommand
  | EnvCommand;

export type CommandKind = Command['kind'];

// ---------------------------------------------------------------------------
// Conditional — a guarded directive
// ---------------------------------------------------------------------------

/** A directive that only applies when its guard holds, e.g. `?HAS_X11: x11 none`. */
export interface Conditional {
  readonly guard: Guard;
  readonly command: Command;
}

// ---------------------------------------------------------------------------
// Content and Line
// ---------------------------------------------------------------------------

export interface BlankContent {
  readonly kind: 'blank';
}

/** A comment; `text` excludes the leading `#`. */
export interface CommentContent {
  readonly kind: 'comment';
  readonly text: string;
}

export interface ConditionalContent {
  readonly kind: 'conditional';
  readonly conditional: Conditional;
}

export interface CommandContent {
  readonly kind: 'command';
  readonly command: Command;
}

/**
 * A line that could not be classified.
 *
 * `text` is the verbatim source line; it is what gets formatted back.
 */
export interface InvalidContent {
  readonly kind: 'invalid';
  readonly text: string;
  readonly error: ProfileErrorKind;
}

/** Classification of one profile line. Values are frozen and shared between streams. */
export type Content =
  | BlankContent
  | CommentContent
  | ConditionalContent
  | CommandContent
  | InvalidContent;

/**
 * Result of classifying one line.
 *
 * Both branches carry a Content: a failed classification is itself a
 * Content (`invalid`), so the caller can always keep the line.
 */
export type ContentParseResult =
  | { readonly ok: true; readonly content: Content }
  | { readonly ok: false; readonly content: InvalidContent };

/** One entry of a ProfileStream. */
export interface Line {
  /** 0-based source line number; null once numbering is no longer meaningful. */
  lineno: number | null;
  readonly content: Content;
}
