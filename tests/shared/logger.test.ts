import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, isLogLevel, silentLogger } from '@shared/logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the tag', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createLogger('RUNNER').info('solved');

    expect(warn).toHaveBeenCalledWith('[RUNNER]', 'solved');
  });

  it('drops messages below the level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = createLogger('HTTP', 'warn');

    logger.debug('GET /api/tasks -> 200');
    logger.info('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[HTTP]', 'shown');
  });

  it('passes the error along', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const cause = new Error('boom');

    createLogger('RUNNER').error('Failed to start:', cause);

    expect(error).toHaveBeenCalledWith('[RUNNER]', 'Failed to start:', cause);
  });

  it('silentLogger writes nothing', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    silentLogger.error('nothing');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('recognizes the known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
