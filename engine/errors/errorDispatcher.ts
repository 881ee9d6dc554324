import { describeError, Logger, silentLogger } from '../observability/logger';
import { ErrorConfig } from './errorConfig';
import { ErrorContext } from './errorConfigResolver';

/**
 * Framework-neutral view of the request being served, when there is one.
 */
export interface RequestInfo {
  url: string;
  path: string;
  method: string;
  accept?: string;
  xhr: boolean;
  ip?: string;
  userAgent?: string;
}

/**
 * One-shot message store for the next rendered page.
 */
export interface FlashStore {
  flash(key: string, value: unknown): void;
}

export interface HandlerScope {
  request?: RequestInfo;
  flash?: FlashStore;
}

export interface ErrorHandler {
  readonly name: string;
  shouldHandle(config: ErrorConfig): boolean;
  handle(
    code: string,
    config: ErrorConfig,
    context: ErrorContext,
    exception?: Error,
    scope?: HandlerScope,
  ): void | Promise<void>;
}

/**
 * Runs registered handlers in registration order. A failing handler is
 * logged and skipped.
 */
export class ErrorDispatcher {
  private readonly handlers: ErrorHandler[] = [];

  constructor(private readonly logger: Logger = silentLogger) {}

  register(handler: ErrorHandler): void {
    this.handlers.push(handler);
  }

  getHandlers(): ReadonlyArray<ErrorHandler> {
    return [...this.handlers];
  }

  async dispatch(
    code: string,
    config: ErrorConfig,
    context: ErrorContext,
    exception?: Error,
    scope?: HandlerScope,
  ): Promise<number> {
    let dispatched = 0;

    for (const handler of this.handlers) {
      try {
        if (!handler.shouldHandle(config)) {
          continue;
        }
        dispatched++;
        await handler.handle(code, config, context, exception, scope);
      } catch (handlerError) {
        this.logger.error('Error handler failed', {
          handler: handler.name,
          error_code: code,
          handler_error: describeError(handlerError),
        });
      }
    }

    return dispatched;
  }
}
