import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, getLogLevel, isLevelEnabled, setLogLevel } from './logger.js';

describe('logger', () => {
  const originalLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(originalLevel);
    vi.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('warn');

    createLogger('test').info('hidden');

    expect(out).not.toHaveBeenCalled();
    expect(isLevelEnabled('info')).toBe(false);
    expect(isLevelEnabled('error')).toBe(true);
  });

  it('should write warnings and errors to stderr with the context', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('debug');

    createLogger('auth').warn('careful', { userId: 1 });

    expect(err).toHaveBeenCalledTimes(1);
    expect(err.mock.calls[0][0]).toContain('[WARN]');
    expect(err.mock.calls[0][0]).toContain('auth');
    expect(err.mock.calls[0][0]).toMatch(/careful$/);
    expect(err.mock.calls[0][1]).toEqual({ userId: 1 });
  });

  it('should write nothing when silent', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('silent');

    const log = createLogger('test');
    log.info('a');
    log.error('b');

    expect(out).not.toHaveBeenCalled();
    expect(err).not.toHaveBeenCalled();
  });
});
