import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isLogLevel, Logger, type LogLevel } from './logger';

describe('Logger', () => {
  let previous: LogLevel;

  beforeEach(() => {
    previous = Logger.getLevel();
  });

  afterEach(() => {
    Logger.setLevel(previous);
    vi.restoreAllMocks();
  });

  it('writes timestamped lines labelled with level and context', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    Logger.setLevel('debug');

    new Logger('SessionPool').warn('Session #1 degraded');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[WARN \] \[SessionPool\] Session #1 degraded$/,
    );
  });

  it('drops messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    Logger.setLevel('warn');

    const logger = new Logger('Test');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('writes the raw error after an error line', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    Logger.setLevel('error');
    const cause = new Error('boom');

    new Logger('Test').error('Hydration gave up', cause);

    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[1][0]).toBe(cause);
  });
});

describe('isLogLevel', () => {
  it('recognizes the four levels', () => {
    expect(['debug', 'info', 'warn', 'error', 'trace'].map(isLogLevel)).toEqual([
      true,
      true,
      true,
      true,
      false,
    ]);
  });
});
