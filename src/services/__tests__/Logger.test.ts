import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { Logger, LogLevel, logger } from '../Logger.js';

describe('Logger', () => {
  let consoleError: MockInstance<Parameters<typeof console.error>, void>;

  beforeEach(() => {
    consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  it('prints only messages at or above the configured level', () => {
    const log = Logger.create();
    log.warn('[TEST] careful');
    log.verbose('[TEST] detail');

    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(consoleError).toHaveBeenCalledWith('[TEST] careful');
  });

  it('maps CLI flags to levels', () => {
    const log = Logger.create();

    log.configure({ verbose: true, quiet: true });
    expect(log.getLevel()).toBe(LogLevel.VERBOSE);

    log.configure({ debug: true, verbose: true });
    expect(log.getLevel()).toBe(LogLevel.DEBUG);

    log.configure({ quiet: true });
    expect(log.getLevel()).toBe(LogLevel.ERROR);

    log.configure({});
    expect(log.getLevel()).toBe(LogLevel.WARN);
  });

  it('buffers every message, shown or not', () => {
    const log = Logger.create();
    log.setLevel(LogLevel.ERROR);

    log.debug('[TEST] step', { attempt: 2 });
    log.warn('[TEST] retrying', new Error('connection reset'));
    log.error('[TEST] gave up');

    expect(log.getRecentLogs(10).map(entry => entry.message)).toEqual([
      '[TEST] step {"attempt":2}',
      '[TEST] retrying connection reset',
      '[TEST] gave up',
    ]);
    expect(log.getRecentLogs(10, LogLevel.WARN).map(entry => entry.level)).toEqual([LogLevel.WARN, LogLevel.ERROR]);
    expect(log.getRecentLogs(1).map(entry => entry.message)).toEqual(['[TEST] gave up']);
    expect(log.getRecentLogs(0)).toEqual([]);
  });

  it('drops the oldest entries past the buffer size', () => {
    const log = Logger.create(2);
    log.debug('one');
    log.debug('two');
    log.debug('three');

    expect(log.getRecentLogs(10).map(entry => entry.message)).toEqual(['two', 'three']);

    log.clearLogs();
    expect(log.getRecentLogs(10)).toEqual([]);
  });

  it('survives circular objects', () => {
    const log = Logger.create();
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    log.debug('[TEST]', circular);

    expect(log.getRecentLogs(1)[0]?.message).toBe('[TEST] [Circular]');
  });

  it('formats entries with a timestamp and level', () => {
    expect(Logger.formatEntry({ timestamp: 0, level: LogLevel.WARN, message: 'careful' })).toBe(
      '1970-01-01T00:00:00.000Z WARN careful'
    );
  });

  it('shares one process-wide instance', () => {
    expect(Logger.getInstance()).toBe(logger);
  });
});
