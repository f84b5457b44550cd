import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, isLogLevel } from '../logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('suppresses messages below the minimum level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger('Test', 'warn');

    logger.info('hidden');
    logger.debug('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('tags output with level and context and serializes errors', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    new Logger('Scanner', 'debug').child('EURUSD').warn('fetch failed', { error: new Error('timeout') });

    expect(warn).toHaveBeenCalledTimes(1);
    const line = String(warn.mock.calls[0][0]);
    expect(line).toContain('[WARN ] [Scanner:EURUSD]');
    expect(line.endsWith('fetch failed {"error":{"name":"Error","message":"timeout"}}')).toBe(true);
  });

  it('recognizes valid level names', () => {
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
