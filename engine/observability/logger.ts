export type LogLevel = 'debug' | 'info' | 'notice' | 'warning' | 'error' | 'critical';

export type LogContext = Record<string, unknown>;

/**
 * Logging sink shared by every component. Implementations must never throw.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  notice(message: string, context?: LogContext): void;
  warning(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  critical(message: string, context?: LogContext): void;
}

export const LOG_LEVELS: ReadonlyArray<LogLevel> = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Structured console logger. One object per entry:
 * `{ level, message, ...context, timestamp }`.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    minLevel: LogLevel = 'debug',
    private readonly channel?: string,
  ) {
    this.minLevel = LOG_LEVELS.indexOf(minLevel);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  notice(message: string, context?: LogContext): void {
    this.write('notice', message, context);
  }

  warning(message: string, context?: LogContext): void {
    this.write('warning', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  critical(message: string, context?: LogContext): void {
    this.write('critical', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS.indexOf(level) < this.minLevel) {
      return;
    }

    const entry = {
      level,
      ...(this.channel ? { channel: this.channel } : {}),
      message,
      ...context,
      timestamp: new Date().toISOString(),
    };

    switch (level) {
      case 'debug':
        console.debug(entry);
        break;
      case 'info':
      case 'notice':
        console.info(entry);
        break;
      case 'warning':
        console.warn(entry);
        break;
      default:
        console.error(entry);
    }
  }
}

/**
 * Discards everything. Default for components constructed without a logger.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  notice: () => undefined,
  warning: () => undefined,
  error: () => undefined,
  critical: () => undefined,
};

/**
 * Normalize an unknown thrown value for log context.
 */
export function describeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: typeof error, message: String(error) };
}
