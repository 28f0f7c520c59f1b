import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, isLogLevel, resolveLogLevel } from '@/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should use the configured level without an override', () => {
    vi.stubEnv('NODESTAT_LOG_LEVEL', '');

    expect(resolveLogLevel('warn')).toBe('warn');
    expect(resolveLogLevel()).toBe('info');
  });

  it('should let the environment override the configured level', () => {
    vi.stubEnv('NODESTAT_LOG_LEVEL', 'DEBUG');

    expect(resolveLogLevel('warn')).toBe('debug');
    expect(createLogger({ level: 'error' }).level).toBe('debug');
  });

  it('should ignore an unknown environment level', () => {
    vi.stubEnv('NODESTAT_LOG_LEVEL', 'chatty');

    expect(resolveLogLevel('error')).toBe('error');
  });

  it('should build a pino logger with child loggers', () => {
    vi.stubEnv('NODESTAT_LOG_LEVEL', '');

    const logger = createLogger({ level: 'warn' });
    const child = logger.child({ component: 'NodetoolSource' });

    expect(logger.level).toBe('warn');
    expect(child.level).toBe('warn');
    expect(child.bindings()).toMatchObject({ component: 'NodetoolSource' });
  });

  it('should recognise pino level names', () => {
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
