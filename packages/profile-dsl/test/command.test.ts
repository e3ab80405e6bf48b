/**
 * jailprof Profile DSL — Directive Parser Tests
 *
 * command/round-trip: formatCommand(parseCommand(line)) === line for every shape
 * command/precedence: exact forms win, keyword heads are whole tokens
 * command/errors: sub-grammar errors surface as the directive's error
 *
 * Tests are pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import {
  CAPABILITY_LIST_KEYWORDS,
  Capability,
  DBusPolicy,
  FLAG_KEYWORDS,
  LIST_KEYWORDS,
  OPTIONAL_LIST_KEYWORDS,
  OPTIONAL_VALUE_KEYWORDS,
  ProfileErrorKind,
  Protocol,
  VALUE_KEYWORDS,
  formatCommand,
  isFlagCommand,
  isListCommand,
  isValueCommand,
  parseCommand,
} from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function roundTrip(line: string): string {
  const parsed = parseCommand(line);
  if (!parsed.ok) {
    throw new Error(`${line} did not parse: ${parsed.error}`);
  }
  return formatCommand(parsed.value);
}

// ---------------------------------------------------------------------------
// command/round-trip
// ---------------------------------------------------------------------------

describe('command: round-trip', () => {
  it('every flag keyword parses as its flag and formats back', () => {
    for (const [kind, keyword] of Object.entries(FLAG_KEYWORDS)) {
      expect(parseCommand(keyword)).toEqual({ ok: true, value: { kind } });
      expect(roundTrip(keyword)).toBe(keyword);
    }
  });

  it('every value keyword keeps its argument verbatim', () => {
    for (const keyword of VALUE_KEYWORDS) {
      const line = `${keyword} \${HOME}/My Documents`;
      expect(parseCommand(line)).toEqual({
        ok: true,
        value: { kind: keyword, value: '${HOME}/My Documents' },
      });
      expect(roundTrip(line)).toBe(line);
    }
  });

  it('every list keyword keeps item order', () => {
    for (const keyword of LIST_KEYWORDS) {
      const line = `${keyword} zsh,bash,sh`;
      expect(parseCommand(line)).toEqual({
        ok: true,
        value: { kind: keyword, values: ['zsh', 'bash', 'sh'] },
      });
      expect(roundTrip(line)).toBe(line);
    }
  });

  it('optional-value keywords distinguish bare, empty and present arguments', () => {
    for (const keyword of OPTIONAL_VALUE_KEYWORDS) {
      expect(parseCommand(keyword)).toEqual({ ok: true, value: { kind: keyword, value: null } });
      expect(parseCommand(`${keyword} `)).toEqual({ ok: true, value: { kind: keyword, value: '' } });
      expect(roundTrip(keyword)).toBe(keyword);
      expect(roundTrip(`${keyword} `)).toBe(`${keyword} `);
      expect(roundTrip(`${keyword} \${HOME}/spam`)).toBe(`${keyword} \${HOME}/spam`);
    }
  });

  it('optional-list keywords distinguish bare and listed forms', () => {
    for (const keyword of OPTIONAL_LIST_KEYWORDS) {
      expect(parseCommand(keyword)).toEqual({ ok: true, value: { kind: keyword, values: null } });
      expect(roundTrip(keyword)).toBe(keyword);
      expect(roundTrip(`${keyword} a,b`)).toBe(`${keyword} a,b`);
    }
  });

  it('capability lists keep source order', () => {
    for (const keyword of CAPABILITY_LIST_KEYWORDS) {
      expect(parseCommand(`${keyword} sys_admin,net_admin`)).toEqual({
        ok: true,
        value: { kind: keyword, caps: [Capability.SysAdmin, Capability.NetAdmin] },
      });
      expect(roundTrip(`${keyword} sys_admin,net_admin`)).toBe(`${keyword} sys_admin,net_admin`);
    }
  });

  it('protocol lists keep source order', () => {
    expect(parseCommand('protocol unix,inet,inet6')).toEqual({
      ok: true,
      value: { kind: 'protocol', protocols: [Protocol.Unix, Protocol.Inet, Protocol.Inet6] },
    });
    expect(roundTrip('protocol inet6,unix')).toBe('protocol inet6,unix');
  });

  it('dbus policies, seccomp error actions, bind and env round-trip', () => {
    expect(parseCommand('dbus-user filter')).toEqual({
      ok: true,
      value: { kind: 'dbus-user', policy: DBusPolicy.Filter },
    });
    expect(parseCommand('seccomp-error-action ENOSYS')).toEqual({
      ok: true,
      value: { kind: 'seccomp-error-action', action: { kind: 'errno', errno: 'ENOSYS' } },
    });
    for (const line of [
      'dbus-system none',
      'seccomp-error-action kill',
      'seccomp-error-action log',
      'bind /tmp/a,/tmp/b',
      'env LANG=C.UTF-8',
    ]) {
      expect(roundTrip(line)).toBe(line);
    }
  });

  it('bind and env split on the first separator only', () => {
    expect(parseCommand('bind /a,/b,/c')).toEqual({
      ok: true,
      value: { kind: 'bind', source: '/a', target: '/b,/c' },
    });
    expect(parseCommand('env A=B=C')).toEqual({
      ok: true,
      value: { kind: 'env', name: 'A', value: 'B=C' },
    });
    expect(roundTrip('bind /a,/b,/c')).toBe('bind /a,/b,/c');
  });

  it('an empty list argument is one empty item', () => {
    expect(parseCommand('private-bin ')).toEqual({
      ok: true,
      value: { kind: 'private-bin', values: [''] },
    });
    expect(roundTrip('private-bin ')).toBe('private-bin ');
  });
});

// ---------------------------------------------------------------------------
// command/precedence
// ---------------------------------------------------------------------------

describe('command: precedence', () => {
  it('multi-word flags win over keyword + argument', () => {
    expect(parseCommand('caps.drop all')).toEqual({ ok: true, value: { kind: 'caps.drop-all' } });
    expect(parseCommand('net none')).toEqual({ ok: true, value: { kind: 'net-none' } });
    expect(parseCommand('x11 xorg')).toEqual({ ok: true, value: { kind: 'x11-xorg' } });
  });

  it('keywords sharing a prefix never shadow each other', () => {
    expect(parseCommand('private-lib')).toEqual({
      ok: true,
      value: { kind: 'private-lib', values: null },
    });
    expect(parseCommand('private-bin bash')).toEqual({
      ok: true,
      value: { kind: 'private-bin', values: ['bash'] },
    });
    expect(parseCommand('private-dev')).toEqual({ ok: true, value: { kind: 'private-dev' } });
    expect(parseCommand('dbus-user.own org.example.App')).toEqual({
      ok: true,
      value: { kind: 'dbus-user.own', value: 'org.example.App' },
    });
  });

  it('type guards follow the shape of the parsed directive', () => {
    const noroot = parseCommand('noroot');
    const blacklist = parseCommand('blacklist /boot');
    const privateBin = parseCommand('private-bin sh');
    expect(noroot.ok && isFlagCommand(noroot.value)).toBe(true);
    expect(blacklist.ok && isValueCommand(blacklist.value)).toBe(true);
    expect(blacklist.ok && isFlagCommand(blacklist.value)).toBe(false);
    expect(privateBin.ok && isListCommand(privateBin.value)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// command/errors
// ---------------------------------------------------------------------------

describe('command: errors', () => {
  it.each([
    ['bogus-directive foo', ProfileErrorKind.BadCommand],
    ['bogus', ProfileErrorKind.BadCommand],
    ['noroot extra', ProfileErrorKind.BadCommand],
    ['blacklist', ProfileErrorKind.BadCommand],
    ['net eth0', ProfileErrorKind.BadCommand],
    ['', ProfileErrorKind.BadCommand],
    ['caps.drop net_admin,not_a_cap', ProfileErrorKind.BadCap],
    ['caps.keep ', ProfileErrorKind.BadCap],
    ['caps.drop alll', ProfileErrorKind.BadCap],
    ['protocol unix,ipx', ProfileErrorKind.BadProtocol],
    ['dbus-user allow', ProfileErrorKind.BadDBusPolicy],
    ['seccomp-error-action ENOTANERRNO', ProfileErrorKind.BadSeccompErrorAction],
    ['bind /only-source', ProfileErrorKind.BadBind],
    ['env NOVALUE', ProfileErrorKind.BadEnv],
  ])('%j is %s', (line, error) => {
    expect(parseCommand(line)).toEqual({ ok: false, error });
  });
});
