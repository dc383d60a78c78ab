import { LogLevel } from '../src/utils/logger';

/**
 * Run `fn` and return what it threw
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

/**
 * AffineKit config fragment that turns logging off
 */
export const quiet = { logLevel: LogLevel.NONE } as const;
