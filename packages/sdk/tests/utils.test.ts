import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, LogLevel, createInstanceLogger } from '../src/utils/logger';
import {
  AffineCipherError,
  InvalidKeyError,
  isAffineCipherError,
  wrapError,
} from '../src/utils/errors';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Logger', () => {
  it('formats messages with prefix and context fields', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = new Logger({ level: LogLevel.DEBUG, prefix: '[Test]', timestamps: false });

    logger.debug('encrypt complete', { length: 3, hasKey: true });

    expect(spy).toHaveBeenCalledWith('[Test] DEBUG: encrypt complete length=3 hasKey=true');
  });

  it('drops messages below its level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger({ level: LogLevel.ERROR, prefix: '[Test]', timestamps: false });

    logger.debug('hidden');
    logger.error('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[Test] ERROR: shown');
  });

  it('prefixes lines with a timestamp by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    new Logger({ level: LogLevel.ERROR, prefix: '[Test]' }).error('boom');

    expect(spy).toHaveBeenCalledWith(
      expect.stringMatching(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[Test\] ERROR: boom$/)
    );
  });

  it('names instance loggers', () => {
    expect(createInstanceLogger(LogLevel.DEBUG, 'vault').prefix).toBe('[Affine97:vault]');
    expect(createInstanceLogger(LogLevel.DEBUG).prefix).toMatch(/^\[Affine97#\d+\]$/);
    expect(createInstanceLogger(LogLevel.NONE).level).toBe(LogLevel.NONE);
  });
});

describe('errors', () => {
  it('carries a code and name', () => {
    const error = new InvalidKeyError();
    expect(error.code).toBe('INVALID_KEY');
    expect(error.name).toBe('InvalidKeyError');
    expect(isAffineCipherError(error)).toBe(true);
    expect(isAffineCipherError(new Error('plain'))).toBe(false);
  });

  it('wraps unknown errors', () => {
    const cause = new Error('boom');
    const wrapped = wrapError(cause, 'fallback');
    expect(wrapped).toBeInstanceOf(AffineCipherError);
    expect(wrapped.code).toBe('UNKNOWN_ERROR');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.stack).toContain('Caused by: Error: boom');

    expect(wrapError('not an error', 'fallback').message).toBe('fallback');
  });

  it('passes cipher errors through unchanged', () => {
    const error = new InvalidKeyError();
    expect(wrapError(error, 'fallback')).toBe(error);
  });
});
