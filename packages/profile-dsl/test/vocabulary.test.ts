/**
 * jailprof Profile DSL — Value Vocabulary Tests
 *
 * Every recognized token maps to exactly one value and back; unknown tokens
 * yield the vocabulary's error kind.
 */

import { describe, it, expect } from 'vitest';
import {
  Capability,
  DBusPolicy,
  ProfileErrorKind,
  Protocol,
  errnoNames,
  formatCapability,
  formatDBusPolicy,
  formatProtocol,
  formatSeccompErrorAction,
  parseCapability,
  parseDBusPolicy,
  parseProtocol,
  parseSeccompErrorAction,
} from '../src/index.js';

describe('vocabulary: capabilities', () => {
  it('every capability name parses and formats back', () => {
    for (const cap of Object.values(Capability)) {
      const parsed = parseCapability(cap);
      expect(parsed).toEqual({ ok: true, value: cap });
      expect(formatCapability(cap)).toBe(cap);
    }
  });

  it('capability names are lowercase', () => {
    expect(parseCapability('net_admin')).toEqual({ ok: true, value: Capability.NetAdmin });
    expect(parseCapability('NET_ADMIN')).toEqual({ ok: false, error: ProfileErrorKind.BadCap });
  });

  it('unknown and empty names are BadCap', () => {
    expect(parseCapability('not_a_cap')).toEqual({ ok: false, error: ProfileErrorKind.BadCap });
    expect(parseCapability('')).toEqual({ ok: false, error: ProfileErrorKind.BadCap });
  });
});

describe('vocabulary: protocols', () => {
  it('every protocol parses and formats back', () => {
    for (const protocol of Object.values(Protocol)) {
      expect(parseProtocol(protocol)).toEqual({ ok: true, value: protocol });
      expect(formatProtocol(protocol)).toBe(protocol);
    }
  });

  it('unknown protocol is BadProtocol', () => {
    expect(parseProtocol('ipx')).toEqual({ ok: false, error: ProfileErrorKind.BadProtocol });
  });
});

describe('vocabulary: D-Bus policies', () => {
  it('filter and none are recognized', () => {
    expect(parseDBusPolicy('filter')).toEqual({ ok: true, value: DBusPolicy.Filter });
    expect(parseDBusPolicy('none')).toEqual({ ok: true, value: DBusPolicy.None });
    expect(formatDBusPolicy(DBusPolicy.Filter)).toBe('filter');
  });

  it('anything else is BadDBusPolicy', () => {
    expect(parseDBusPolicy('allow')).toEqual({ ok: false, error: ProfileErrorKind.BadDBusPolicy });
  });
});

describe('vocabulary: seccomp error actions', () => {
  it('kill and log are actions of their own', () => {
    expect(parseSeccompErrorAction('kill')).toEqual({ ok: true, value: { kind: 'kill' } });
    expect(parseSeccompErrorAction('log')).toEqual({ ok: true, value: { kind: 'log' } });
  });

  it('errno names are case-sensitive', () => {
    expect(parseSeccompErrorAction('EPERM')).toEqual({
      ok: true,
      value: { kind: 'errno', errno: 'EPERM' },
    });
    expect(parseSeccompErrorAction('eperm')).toEqual({
      ok: false,
      error: ProfileErrorKind.BadSeccompErrorAction,
    });
  });

  it('every errno name formats back to itself', () => {
    const names = errnoNames();
    expect(names[0]).toBe('EPERM');
    expect(names).toContain('ENOSYS');
    for (const name of names) {
      const parsed = parseSeccompErrorAction(name);
      expect(parsed.ok).toBe(true);
      if (parsed.ok) {
        expect(formatSeccompErrorAction(parsed.value)).toBe(name);
      }
    }
  });
});
