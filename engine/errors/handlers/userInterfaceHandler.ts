import { Translator } from '../../i18n/translator';
import { Logger, silentLogger } from '../../observability/logger';
import { ErrorConfig, UiSettings } from '../errorConfig';
import { ErrorContext } from '../errorConfigResolver';
import { ErrorHandler, HandlerScope } from '../errorDispatcher';

/**
 * Flashes the user-facing message for the next page render.
 */
export class UserInterfaceHandler implements ErrorHandler {
  readonly name = 'UserInterfaceHandler';

  constructor(
    private readonly settings: UiSettings,
    private readonly translator: Translator,
    private readonly logger: Logger = silentLogger,
  ) {}

  shouldHandle(config: ErrorConfig): boolean {
    if (this.displayTarget(config) === 'log-only') {
      return false;
    }
    return Boolean(config.userMessage || config.userMessageKey);
  }

  handle(code: string, config: ErrorConfig, context: ErrorContext, _exception?: Error, scope?: HandlerScope): void {
    if (!scope?.flash) {
      this.logger.debug('No flash store in scope, skipping UI message', { error_code: code });
      return;
    }

    const target = this.displayTarget(config);
    const message = config.userMessage || this.translator.get(this.settings.genericErrorMessage, context);

    scope.flash.flash(`error_${target}`, message);

    if (this.settings.showErrorCodes) {
      scope.flash.flash(`error_code_${target}`, code);
    }

    scope.flash.flash('error_info', {
      error_code: code,
      message,
      type: config.type,
      blocking: config.blocking,
      display_target: target,
    });
  }

  private displayTarget(config: ErrorConfig): string {
    return config.displayMode ?? this.settings.defaultDisplayMode;
  }
}
