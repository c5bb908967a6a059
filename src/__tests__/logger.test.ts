import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, silentLogger } from '../logging/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write one JSON line with the given fields', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('info').info('Grant store initialized', { keyFormat: 'opaque' });

    expect(log).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(line).toMatchObject({ level: 'info', message: 'Grant store initialized', keyFormat: 'opaque' });
  });

  it('should route warnings and errors to their console methods', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('warn');

    logger.warn('Updating expiry index options');
    logger.error('Failed to abort transaction');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('should drop events below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger('warn');

    logger.debug('hidden');
    logger.info('hidden');
    silentLogger.info('hidden');

    expect(log).not.toHaveBeenCalled();
  });
});
