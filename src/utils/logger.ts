/**
 * Logger
 *
 * Leveled logger writing to stderr so completion output on stdout stays clean.
 * Level comes from SMART_CMD_LOG_LEVEL, or from setLevel() once config is loaded.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class Logger {
  private level: LogLevel;
  private readonly write: (line: string) => void;

  constructor(options: { level?: LogLevel; write?: (line: string) => void } = {}) {
    this.level = options.level ?? 'warn';
    this.write = options.write ?? ((line) => process.stderr.write(line + '\n'));
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    let line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}`;
    if (context && Object.keys(context).length > 0) {
      line += ` ${JSON.stringify(context)}`;
    }
    this.write(line);
  }
}

const envLevel = process.env.SMART_CMD_LOG_LEVEL?.toLowerCase();

export const logger = new Logger({ level: isLogLevel(envLevel) ? envLevel : 'warn' });
