import { describe, it, expect } from 'vitest';
import { createLogger, resolveLogLevel } from '../../utils/logger.js';

describe('resolveLogLevel', () => {
  it('accepts known pino levels in any case', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel(' WARN ')).toBe('warn');
  });

  it('falls back to info for missing or unknown levels', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});

describe('createLogger', () => {
  it('creates child loggers with a valid level', () => {
    const logger = createLogger({ component: 'test' });
    expect(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).toContain(logger.level);
  });
});
