import { describe, it, expect } from 'vitest';
import { Guard, ProfileErrorKind, formatConditional, parseConditional } from '../src/index.js';

describe('conditional: parsing', () => {
  it('wraps one directive in its guard', () => {
    expect(parseConditional('?HAS_NET: noroot')).toEqual({
      ok: true,
      value: { guard: Guard.HasNet, command: { kind: 'noroot' } },
    });
  });

  it('every guard is recognized', () => {
    for (const guard of Object.values(Guard)) {
      const parsed = parseConditional(`${guard} nonewprivs`);
      expect(parsed).toEqual({ ok: true, value: { guard, command: { kind: 'nonewprivs' } } });
    }
  });

  it('a guard with nothing after it is EmptyCondition', () => {
    expect(parseConditional('?HAS_NET:')).toEqual({
      ok: false,
      error: ProfileErrorKind.EmptyCondition,
    });
    expect(parseConditional('?HAS_NET: ')).toEqual({
      ok: false,
      error: ProfileErrorKind.EmptyCondition,
    });
  });

  it('EmptyCondition is reported before the guard is checked', () => {
    expect(parseConditional('?NOT_A_GUARD:')).toEqual({
      ok: false,
      error: ProfileErrorKind.EmptyCondition,
    });
  });

  it('an unknown guard is BadCondition', () => {
    expect(parseConditional('?NOT_A_GUARD: noroot')).toEqual({
      ok: false,
      error: ProfileErrorKind.BadCondition,
    });
  });

  it('errors of the guarded directive propagate', () => {
    expect(parseConditional('?HAS_X11: bogus')).toEqual({
      ok: false,
      error: ProfileErrorKind.BadCommand,
    });
    expect(parseConditional('?HAS_NET: caps.drop not_a_cap')).toEqual({
      ok: false,
      error: ProfileErrorKind.BadCap,
    });
  });

  it('conditionals do not nest', () => {
    expect(parseConditional('?HAS_NET: ?HAS_X11: noroot')).toEqual({
      ok: false,
      error: ProfileErrorKind.BadCommand,
    });
  });
});

describe('conditional: formatting', () => {
  it.each([
    '?HAS_NET: noroot',
    '?HAS_X11: x11 none',
    '?BROWSER_DISABLE_U2F: nou2f',
    '?ALLOW_TRAY: dbus-user.talk org.kde.StatusNotifierWatcher',
    '?HAS_APPIMAGE: caps.keep sys_admin,sys_chroot',
  ])('%s round-trips', (line) => {
    const parsed = parseConditional(line);
    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(formatConditional(parsed.value)).toBe(line);
    }
  });
});
