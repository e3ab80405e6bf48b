import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { createLogger, resolveLogLevel } from '../src/index.js';

let savedLevel: string | undefined;

beforeEach(() => {
  savedLevel = process.env['JAILPROF_LOG_LEVEL'];
  delete process.env['JAILPROF_LOG_LEVEL'];
});

afterEach(() => {
  if (savedLevel === undefined) {
    delete process.env['JAILPROF_LOG_LEVEL'];
  } else {
    process.env['JAILPROF_LOG_LEVEL'] = savedLevel;
  }
});

describe('resolveLogLevel', () => {
  it('defaults to warn', () => {
    expect(resolveLogLevel()).toBe('warn');
  });

  it('reads JAILPROF_LOG_LEVEL', () => {
    process.env['JAILPROF_LOG_LEVEL'] = 'debug';
    expect(resolveLogLevel()).toBe('debug');
  });

  it('an explicit level wins over the environment', () => {
    process.env['JAILPROF_LOG_LEVEL'] = 'debug';
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('rejects unknown levels', () => {
    expect(() => resolveLogLevel('verbose')).toThrow(
      "Unknown log level 'verbose', expected one of: fatal, error, warn, info, debug, trace, silent",
    );
  });
});

describe('createLogger', () => {
  it('writes JSON lines at or above its level to the destination', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'info', destination: { write: (msg) => lines.push(msg) } });

    logger.debug('hidden');
    logger.info({ profile: 'firefox.profile' }, 'found profile');

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({
      level: 30,
      name: 'jailprof',
      profile: 'firefox.profile',
      msg: 'found profile',
    });
  });
});
