import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, getLogLevel, isLogLevel, setLogLevel } from './logger.js';

describe('Logger', () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('writes one JSON line with component and context', () => {
    process.env.NODE_ENV = 'development';
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new Logger('Scoring').info('Score committed', { categoryId: 'chance', score: 20 });

    expect(log).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(log.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'info',
      component: 'Scoring',
      message: 'Score committed',
      categoryId: 'chance',
      score: 20,
    });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('sends warnings and errors to their console streams', () => {
    process.env.NODE_ENV = 'development';
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger('Server');

    logger.warn('slow');
    logger.error('broken');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('drops events below the level threshold', () => {
    process.env.NODE_ENV = 'development';
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('warn');

    new Logger('Scoring').info('ignored');
    new Logger('Scoring').debug('ignored');

    expect(getLogLevel()).toBe('warn');
    expect(log).not.toHaveBeenCalled();
  });

  it('stays silent under test', () => {
    process.env.NODE_ENV = 'test';
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new Logger('Scoring').info('quiet');

    expect(log).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('accepts the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
