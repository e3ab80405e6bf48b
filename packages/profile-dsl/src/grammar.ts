/**
 * jailprof Profile DSL — Grammar Tables
 *
 * The static keyword tables of the profile language. Every directive the
 * parser recognizes is listed here exactly once, grouped by the shape of its
 * argument. The Command union in types.ts is derived from these tables, and
 * the parser and formatter in command.ts are driven by them, so a keyword
 * string never appears in more than one place.
 *
 * Shapes:
 *   flag           `noroot`                  — whole line is the keyword
 *   value          `blacklist <path>`        — one verbatim argument
 *   optional value `private [<path>]`        — bare keyword or one argument
 *   list           `private-bin a,b,c`       — comma-separated strings
 *   optional list  `seccomp [a,b,c]`         — bare keyword or a list
 *   typed          `caps.drop`, `protocol`, `dbus-user`, `bind`, `env`, ...
 */

// ---------------------------------------------------------------------------
// Flag directives (no argument)
// ---------------------------------------------------------------------------

/**
 * Flag directive kinds mapped to their exact keyword text.
 *
 * Multi-word keywords (`caps.drop all`, `net none`, ...) are flags too: the
 * whole line must match.
 */
export const FLAG_KEYWORDS = {
  'allow-debuggers': 'allow-debuggers',
  allusers: 'allusers',
  apparmor: 'apparmor',
  caps: 'caps',
  'caps.drop-all': 'caps.drop all',
  'deterministic-exit-code': 'deterministic-exit-code',
  'disable-mnt': 'disable-mnt',
  'ipc-namespace': 'ipc-namespace',
  'keep-config-pulse': 'keep-config-pulse',
  'keep-dev-shm': 'keep-dev-shm',
  'keep-var-tmp': 'keep-var-tmp',
  'machine-id': 'machine-id',
  'memory-deny-write-execute': 'memory-deny-write-execute',
  'net-none': 'net none',
  netfilter: 'netfilter',
  no3d: 'no3d',
  nodbus: 'nodbus',
  nodvd: 'nodvd',
  nogroups: 'nogroups',
  noinput: 'noinput',
  nonewprivs: 'nonewprivs',
  noprinters: 'noprinters',
  noroot: 'noroot',
  nosound: 'nosound',
  notv: 'notv',
  nou2f: 'nou2f',
  novideo: 'novideo',
  'private-cache': 'private-cache',
  'private-dev': 'private-dev',
  'private-tmp': 'private-tmp',
  quiet: 'quiet',
  'seccomp.block-secondary': 'seccomp.block-secondary',
  'shell-none': 'shell none',
  tracelog: 'tracelog',
  'writable-etc': 'writable-etc',
  'writable-run-user': 'writable-run-user',
  'writable-var': 'writable-var',
  'writable-var-log': 'writable-var-log',
  'x11-none': 'x11 none',
  'x11-xorg': 'x11 xorg',
} as const;

// ---------------------------------------------------------------------------
// Argument-bearing directives (kind is the keyword)
// ---------------------------------------------------------------------------

/** Directives taking one verbatim argument (a path, a name, a profile line). */
export const VALUE_KEYWORDS = [
  'blacklist',
  'blacklist-nolog',
  'dbus-system.broadcast',
  'dbus-system.call',
  'dbus-system.own',
  'dbus-system.see',
  'dbus-system.talk',
  'dbus-user.broadcast',
  'dbus-user.call',
  'dbus-user.own',
  'dbus-user.see',
  'dbus-user.talk',
  'hostname',
  'ignore',
  'include',
  'join-or-start',
  'mkdir',
  'mkfile',
  'name',
  'noblacklist',
  'noexec',
  'nowhitelist',
  'read-only',
  'read-write',
  'rmenv',
  'tmpfs',
  'whitelist',
  'whitelist-ro',
] as const;

/** Directives valid both bare and with one verbatim argument. */
export const OPTIONAL_VALUE_KEYWORDS = ['private', 'private-cwd'] as const;

/** Directives taking a comma-separated list of plain strings. */
export const LIST_KEYWORDS = [
  'private-bin',
  'private-etc',
  'private-home',
  'private-opt',
  'private-srv',
  'seccomp.drop',
  'seccomp.keep',
] as const;

/** Directives valid both bare and with a comma-separated list. */
export const OPTIONAL_LIST_KEYWORDS = ['private-lib', 'restrict-namespaces', 'seccomp'] as const;

/** Directives taking a comma-separated list of capability names. */
export const CAPABILITY_LIST_KEYWORDS = ['caps.drop', 'caps.keep'] as const;

/** Directives taking a D-Bus policy. */
export const DBUS_POLICY_KEYWORDS = ['dbus-system', 'dbus-user'] as const;

/** Separator between list items, and between the two halves of `bind`. */
export const LIST_SEPARATOR = ',';

/** Separator between the two halves of `env`. */
export const ENV_SEPARATOR = '=';

// ---------------------------------------------------------------------------
// Conditional guards
// ---------------------------------------------------------------------------

/**
 * Runtime-feature guards that may prefix a directive.
 *
 * Each guard is written with its leading `?` and trailing `:`.
 */
export enum Guard {
  AllowTray = '?ALLOW_TRAY:',
  BrowserAllowDrm = '?BROWSER_ALLOW_DRM:',
  BrowserDisableU2f = '?BROWSER_DISABLE_U2F:',
  HasAppimage = '?HAS_APPIMAGE:',
  HasNet = '?HAS_NET:',
  HasNodbus = '?HAS_NODBUS:',
  HasNosound = '?HAS_NOSOUND:',
  HasPrivate = '?HAS_PRIVATE:',
  HasX11 = '?HAS_X11:',
}

// ---------------------------------------------------------------------------
// Table helpers
// ---------------------------------------------------------------------------

/**
 * Narrow an arbitrary string to a member of a readonly keyword list.
 */
export function isOneOf<K extends string>(list: ReadonlyArray<K>, value: string): value is K {
  return list.some((keyword) => keyword === value);
}

/**
 * Narrow an arbitrary string to a key of a keyword table.
 */
export function isKeyOf<K extends string>(table: Readonly<Record<K, unknown>>, value: string): value is K {
  return Object.prototype.hasOwnProperty.call(table, value);
}
