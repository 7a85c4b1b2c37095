import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isValidLogLevel, logger } from './logger.js';

describe('logger', () => {
  const originalLevel = logger.getLevel();
  const originalNodeEnv = process.env.NODE_ENV;

  beforeEach(() => {
    process.env.NODE_ENV = 'development';
  });

  afterEach(() => {
    logger.setLevel(originalLevel);
    process.env.NODE_ENV = originalNodeEnv;
    vi.restoreAllMocks();
  });

  it('suppresses messages below the current level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.setLevel('WARN');

    logger.info('polling report');
    logger.debug('attempt 1');

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('routes warnings and errors to the matching console method', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.setLevel('INFO');

    logger.warn('report queued');
    logger.error('download failed');

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(String(warnSpy.mock.calls[0]?.[0])).toContain('report queued');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('download failed');
  });

  it('prefixes child logger output with its component', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.setLevel('DEBUG');

    logger.child({ component: 'job-poller' }).debug('poll #1');

    expect(logSpy).toHaveBeenCalledWith('\x1b[36m[DEBUG]\x1b[0m (job-poller) poll #1');
  });

  it('lets children created earlier follow later level changes', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.setLevel('WARN');
    const child = logger.child({ component: 'http-client' });

    child.debug('hidden');
    logger.setLevel('DEBUG');
    child.debug('shown');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('\x1b[36m[DEBUG]\x1b[0m (http-client) shown');
  });

  it('writes JSON lines in production', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    process.env.NODE_ENV = 'production';
    logger.setLevel('INFO');

    logger.info('report submitted', { handle: 'crn:1:flexreports/a' });

    const line = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(line.level).toBe('INFO');
    expect(line.message).toBe('report submitted');
    expect(line.handle).toBe('crn:1:flexreports/a');
  });

  it('carries the correlation id of its context into children', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.setLevel('DEBUG');

    logger.child({ correlationId: 'abcdef0123456789' }).child({ component: 'job-runner' }).info('run started');

    expect(logSpy).toHaveBeenCalledWith('\x1b[32m[INFO]\x1b[0m [abcdef01] (job-runner) run started');
  });

  it('validates level names', () => {
    expect(isValidLogLevel('DEBUG')).toBe(true);
    expect(isValidLogLevel('debug')).toBe(false);
    expect(isValidLogLevel('VERBOSE')).toBe(false);
    expect(isValidLogLevel('TRACE')).toBe(false);
  });
});
