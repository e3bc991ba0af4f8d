/**
 * Logger Unit Tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger, getGlobalLogLevel, isLogLevel, setGlobalLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';

describe('Logger', () => {
  let previous: LogLevel;

  beforeEach(() => {
    previous = getGlobalLogLevel();
  });

  afterEach(() => {
    setGlobalLogLevel(previous);
    vi.restoreAllMocks();
  });

  function plain(prefix: string, level?: LogLevel): Logger {
    return new Logger(prefix, { level, timestamps: false, colors: false });
  }

  it('formats level, prefix, message and data', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    plain('Bus', 'debug').info('Published', { channel: 'MASTER_CH' });

    expect(log).toHaveBeenCalledWith('INFO  [Bus] Published {"channel":"MASTER_CH"}');
  });

  it('prints errors by name and message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    plain('Archive', 'debug').error('Write failed', new TypeError('boom'));

    expect(error).toHaveBeenCalledWith('ERROR [Archive] Write failed TypeError: boom');
  });

  it('drops messages below its own level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = plain('Node', 'warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('WARN  [Node] shown');
  });

  it('follows the global level when it has none of its own', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = plain('Settings');

    setGlobalLogLevel('silent');
    logger.info('hidden');
    setGlobalLogLevel('debug');
    logger.debug('shown');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('DEBUG [Settings] shown');
  });

  it('nests child prefixes', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    plain('Bus', 'info').child('File').info('Rotated');

    expect(log).toHaveBeenCalledWith('INFO  [Bus:File] Rotated');
  });

  it('recognises level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
