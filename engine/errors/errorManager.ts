import { substitute, Translator } from '../i18n/translator';
import { Logger, silentLogger } from '../observability/logger';
import { ErrorConfig, ErrorConfigRegistry, UiSettings } from './errorConfig';
import { ErrorConfigResolver, ErrorContext } from './errorConfigResolver';
import { ErrorDispatcher, ErrorHandler, FlashStore, RequestInfo } from './errorDispatcher';
import { ErrorInfo, ErrorOutcome, ErrorResponseBuilder } from './errorResponseBuilder';

export interface HandleOptions {
  request?: RequestInfo;
  flash?: FlashStore;
}

export interface ErrorManagerDeps {
  registry: ErrorConfigRegistry;
  translator: Translator;
  ui: UiSettings;
  logger?: Logger;
  dispatcher?: ErrorDispatcher;
  responseBuilder?: ErrorResponseBuilder;
  now?: () => Date;
}

type MessageField = 'devMessage' | 'userMessage';
type MessageKeyField = 'devMessageKey' | 'userMessageKey';

/**
 * Entry point of the error engine: resolve the code, prepare localized
 * messages, run the handlers, build the response outcome.
 */
export class ErrorManager {
  private readonly registry: ErrorConfigRegistry;
  private readonly resolver: ErrorConfigResolver;
  private readonly dispatcher: ErrorDispatcher;
  private readonly responseBuilder: ErrorResponseBuilder;
  private readonly translator: Translator;
  private readonly ui: UiSettings;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: ErrorManagerDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.registry = deps.registry;
    this.resolver = new ErrorConfigResolver(deps.registry, this.logger);
    this.dispatcher = deps.dispatcher ?? new ErrorDispatcher(this.logger);
    this.responseBuilder = deps.responseBuilder ?? new ErrorResponseBuilder();
    this.translator = deps.translator;
    this.ui = deps.ui;
    this.now = deps.now ?? (() => new Date());
  }

  registerHandler(handler: ErrorHandler): this {
    this.dispatcher.register(handler);
    return this;
  }

  getHandlers(): ReadonlyArray<ErrorHandler> {
    return this.dispatcher.getHandlers();
  }

  defineError(code: string, config: ErrorConfig): this {
    this.registry.define(code, config);
    this.logger.info('Runtime error code defined', { error_code: code });
    return this;
  }

  getErrorConfig(code: string): ErrorConfig | undefined {
    return this.registry.get(code);
  }

  getErrorCodes(): string[] {
    return this.registry.codes();
  }

  /**
   * @throws FatalFallbackError when nothing in the fallback chain is configured
   */
  async handle(
    code: string,
    context: ErrorContext = {},
    exception?: Error,
    options: HandleOptions = {},
  ): Promise<ErrorOutcome> {
    this.logger.debug('Handling error', { error_code: code });

    const resolved = this.resolver.resolve(code, context);
    const info = this.prepareErrorInfo(resolved.code, resolved.config, resolved.context, exception);

    const prepared: ErrorConfig = {
      ...resolved.config,
      devMessage: info.message,
      userMessage: info.userMessage,
    };

    await this.dispatcher.dispatch(resolved.code, prepared, resolved.context, exception, {
      request: options.request,
      flash: options.flash,
    });

    return this.responseBuilder.build(info, options.request);
  }

  prepareErrorInfo(code: string, config: ErrorConfig, context: ErrorContext, exception?: Error): ErrorInfo {
    const info: ErrorInfo = {
      errorCode: code,
      type: config.type,
      blocking: config.blocking,
      message: this.formatMessage(config, context, 'devMessage', 'devMessageKey', `Dev message missing for ${code}`),
      userMessage: this.formatMessage(
        config,
        context,
        'userMessage',
        'userMessageKey',
        this.translator.get('errors.user.fallback_error'),
      ),
      httpStatusCode: config.httpStatusCode ?? 500,
      context,
      displayMode: config.displayMode ?? this.ui.defaultDisplayMode,
      timestamp: this.now().toISOString(),
    };

    if (typeof context._original_code === 'string') {
      info.originalCode = context._original_code;
    }

    if (exception) {
      info.exception = { name: exception.name, message: exception.message, stack: exception.stack };
    }

    return info;
  }

  /**
   * Translation key first, then the direct message, then `fallback`.
   * `:key` placeholders are filled from scalar context values.
   */
  formatMessage(
    config: ErrorConfig,
    context: ErrorContext,
    directField: MessageField,
    keyField: MessageKeyField,
    fallback: string,
  ): string {
    let message = fallback;
    const key = config[keyField];
    const direct = config[directField];

    if (key) {
      const translated = this.translator.get(key, context);
      if (translated !== key) {
        message = translated;
      } else if (direct) {
        this.logger.warning('Translation key not found, using direct message', { key });
        message = direct;
      } else {
        this.logger.warning('Translation key and direct message missing, using fallback', { key });
      }
    } else if (direct) {
      message = direct;
    }

    return substitute(message, context);
  }
}
