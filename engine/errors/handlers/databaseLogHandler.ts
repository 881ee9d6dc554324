import { describeError, Logger, silentLogger } from '../../observability/logger';
import { DatabaseLogSettings, ErrorConfig, ErrorType } from '../errorConfig';
import { ErrorContext } from '../errorConfigResolver';
import { ErrorHandler, HandlerScope } from '../errorDispatcher';
import { sanitizeContext } from '../sanitizeContext';
import { BlockingLevel } from '../../uploads/errors';

export interface ErrorLogRecord {
  errorCode: string;
  type: ErrorType;
  blocking: BlockingLevel;
  message: string;
  userMessage?: string;
  httpStatusCode: number;
  context: Record<string, unknown>;
  displayMode?: string;
  exceptionName?: string;
  exceptionMessage?: string;
  exceptionTrace?: string;
  requestMethod?: string;
  requestUrl?: string;
  userAgent?: string;
  ipAddress?: string;
  createdAt: string;
}

export interface ErrorLogStore {
  save(record: ErrorLogRecord): Promise<void>;
}

export class InMemoryErrorLogStore implements ErrorLogStore {
  private readonly records: ErrorLogRecord[] = [];

  async save(record: ErrorLogRecord): Promise<void> {
    this.records.push({ ...record });
  }

  all(): ReadonlyArray<ErrorLogRecord> {
    return [...this.records];
  }

  clear(): void {
    this.records.length = 0;
  }
}

export class DatabaseLogHandler implements ErrorHandler {
  readonly name = 'DatabaseLogHandler';

  constructor(
    private readonly store: ErrorLogStore,
    private readonly settings: DatabaseLogSettings,
    private readonly logger: Logger = silentLogger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  shouldHandle(): boolean {
    return this.settings.enabled;
  }

  async handle(
    code: string,
    config: ErrorConfig,
    context: ErrorContext,
    exception?: Error,
    scope?: HandlerScope,
  ): Promise<void> {
    const record: ErrorLogRecord = {
      errorCode: code,
      type: config.type,
      blocking: config.blocking,
      message: config.devMessage ?? 'No developer message',
      userMessage: config.userMessage,
      httpStatusCode: config.httpStatusCode ?? 500,
      context: sanitizeContext(context),
      displayMode: config.displayMode,
      requestMethod: scope?.request?.method,
      requestUrl: scope?.request?.url,
      userAgent: scope?.request?.userAgent,
      ipAddress: scope?.request?.ip,
      createdAt: this.now().toISOString(),
    };

    if (exception) {
      record.exceptionName = exception.name;
      record.exceptionMessage = exception.message;
      if (this.settings.includeTrace && exception.stack) {
        record.exceptionTrace = exception.stack.slice(0, this.settings.maxTraceLength);
      }
    }

    try {
      await this.store.save(record);
      this.logger.debug('Error persisted', { error_code: code });
    } catch (storeError) {
      this.logger.error('Failed to persist error record', {
        error_code: code,
        store_error: describeError(storeError),
      });
    }
  }
}
