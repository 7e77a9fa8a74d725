import { afterEach, describe, expect, test, vi } from 'vitest';

import { Logger, createConsoleLogger } from './index';

describe('Logger', () => {
  test('should expose the methods it was built with', () => {
    const methods = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = new Logger(methods);

    logger.info('[Test] hello', 1);

    expect(methods.info).toHaveBeenCalledWith('[Test] hello', 1);
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should drop messages below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createConsoleLogger('info');
    logger.debug('hidden');
    logger.info('shown');
    logger.warn('also shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith('shown');
    expect(warn).toHaveBeenCalledWith('also shown');
  });

  test('should only log errors at error level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createConsoleLogger('error');
    logger.warn('hidden');
    logger.error('failed', new Error('x'));

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });
});
