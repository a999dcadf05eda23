/**
 * Tests for logger configuration
 */

import { createLogger, loggingOptionsFromEnv, resolveLogLevel } from '../logger';

describe('resolveLogLevel', () => {
  it.each([
    ['trace', 'trace'],
    ['debug', 'debug'],
    ['info', 'info'],
    ['warn', 'warn'],
    ['warning', 'warn'],
    ['error', 'error'],
    ['fatal', 'fatal'],
    ['panic', 'fatal'],
    ['silent', 'silent'],
  ])('should map %s to %s', (value, level) => {
    expect(resolveLogLevel(value)).toBe(level);
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
    expect(resolveLogLevel('Warning')).toBe('warn');
  });

  it('should default to info for unset or unknown values', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});

describe('loggingOptionsFromEnv', () => {
  it('should read level and format from the given environment', () => {
    expect(loggingOptionsFromEnv({ LOG_LEVEL: 'debug', LOG_FORMAT: 'pretty' })).toEqual({
      level: 'debug',
      pretty: true,
    });
  });

  it('should use JSON output at info when nothing is set', () => {
    expect(loggingOptionsFromEnv({})).toEqual({ level: 'info', pretty: false });
  });
});

describe('createLogger', () => {
  it('should build a logger at the requested level', () => {
    const logger = createLogger({ level: 'warn', pretty: false });

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('should build independent loggers', () => {
    const verbose = createLogger({ level: 'trace', pretty: false });
    const quiet = createLogger({ level: 'fatal', pretty: false });

    expect(verbose.level).toBe('trace');
    expect(quiet.level).toBe('fatal');
  });
});
