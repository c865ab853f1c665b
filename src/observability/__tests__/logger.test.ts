import { describe, it, expect } from 'vitest';
import { buildLoggerOptions, getLogLevel } from '../logger';

describe('getLogLevel', () => {
  it.each([
    [{ LOG_LEVEL: 'debug' }, 'debug'],
    [{ LOG_LEVEL: ' WARN ' }, 'warn'],
    [{ LOG_LEVEL: 'silent' }, 'silent'],
    [{ LOG_LEVEL: 'verbose' }, 'info'],
    [{}, 'info'],
  ])('reads %j as %s', (env, expected) => {
    expect(getLogLevel(env)).toBe(expected);
  });
});

describe('buildLoggerOptions', () => {
  it('writes JSON by default', () => {
    const options = buildLoggerOptions({ LOG_LEVEL: 'error', npm_package_version: '1.2.3' });
    expect(options.level).toBe('error');
    expect(options.base).toEqual({ service: 'knowledge-base-backend', version: '1.2.3' });
    expect(options.transport).toBeUndefined();
  });

  it('uses pino-pretty when LOG_PRETTY is true', () => {
    const options = buildLoggerOptions({ LOG_PRETTY: 'true' });
    expect(options.transport).toEqual({
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    });
    expect(options.base).toEqual({ service: 'knowledge-base-backend', version: 'unknown' });
  });
});
