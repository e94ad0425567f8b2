import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, isLogLevel } from '../../../src/utils/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('drops messages below the threshold', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('prefixes messages with timestamp, level and scope', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('debug', 'run').info('started', 42);

    const [prefix, message, extra] = error.mock.calls[0];
    expect(prefix).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] INFO run:$/);
    expect(message).toBe('started');
    expect(extra).toBe(42);
  });

  it('writes nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('silent');
    logger.error('x');
    logger.warn('y');
    expect(error).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('recognizes the level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
