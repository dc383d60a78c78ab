/**
 * Log levels, lowest first
 */
export enum LogLevel {
  DEBUG = 0,
  ERROR = 1,
  NONE = 2,
}

/**
 * Fields attached to a log line. Lengths and flags only: callers never
 * pass key material or text.
 */
export type LogContext = Record<string, string | number | boolean>;

export interface LoggerConfig {
  level: LogLevel;
  prefix: string;
  timestamps?: boolean;
}

/**
 * Logger for an AffineKit instance
 */
export class Logger {
  readonly level: LogLevel;
  readonly prefix: string;
  private readonly timestamps: boolean;

  constructor(config: LoggerConfig) {
    this.level = config.level;
    this.prefix = config.prefix;
    this.timestamps = config.timestamps ?? true;
  }

  private formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = this.timestamps ? `[${new Date().toISOString()}] ` : '';
    const fields = context
      ? ' ' +
        Object.entries(context)
          .map(([name, value]) => `${name}=${value}`)
          .join(' ')
      : '';
    return `${timestamp}${this.prefix} ${level}: ${message}${fields}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(this.formatMessage('DEBUG', message, context));
    }
  }

  error(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(this.formatMessage('ERROR', message, context));
    }
  }
}

let instanceCount = 0;

/**
 * Logger with a prefix naming one AffineKit instance: `[Affine97:<name>]`,
 * or `[Affine97#<n>]` numbered in creation order when unnamed.
 */
export function createInstanceLogger(level: LogLevel, name?: string): Logger {
  instanceCount++;
  const prefix = name ? `[Affine97:${name}]` : `[Affine97#${instanceCount}]`;
  return new Logger({ level, prefix });
}
