import { LogLevel, Logger } from '../../observability/logger';
import { ErrorConfig, ErrorType } from '../errorConfig';
import { ErrorContext } from '../errorConfigResolver';
import { ErrorHandler } from '../errorDispatcher';

const LEVEL_BY_TYPE: Record<ErrorType, LogLevel> = {
  critical: 'critical',
  error: 'error',
  warning: 'warning',
  notice: 'notice',
};

export class LogHandler implements ErrorHandler {
  readonly name = 'LogHandler';

  constructor(private readonly logger: Logger) {}

  shouldHandle(): boolean {
    return true;
  }

  handle(code: string, config: ErrorConfig, context: ErrorContext, exception?: Error): void {
    const level = LEVEL_BY_TYPE[config.type] ?? 'error';
    const entry: ErrorContext = {
      ...context,
      error_code: code,
      blocking: config.blocking,
    };

    if (exception) {
      entry.exception = { name: exception.name, message: exception.message };
    }

    this.logger[level](`[${code}] ${config.devMessage ?? 'No developer message'}`, entry);
  }
}
