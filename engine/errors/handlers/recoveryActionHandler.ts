import { describeError, Logger, silentLogger } from '../../observability/logger';
import { ErrorConfig } from '../errorConfig';
import { ErrorContext } from '../errorConfigResolver';
import { ErrorHandler } from '../errorDispatcher';

/**
 * Returns whether recovery succeeded.
 */
export type RecoveryAction = (code: string, context: ErrorContext, exception?: Error) => boolean | Promise<boolean>;

export class RecoveryActionHandler implements ErrorHandler {
  readonly name = 'RecoveryActionHandler';

  constructor(
    private readonly actions: Readonly<Record<string, RecoveryAction>>,
    private readonly logger: Logger = silentLogger,
  ) {}

  shouldHandle(config: ErrorConfig): boolean {
    return Boolean(config.recoveryAction);
  }

  async handle(code: string, config: ErrorConfig, context: ErrorContext, exception?: Error): Promise<void> {
    const actionName = config.recoveryAction;
    if (!actionName) {
      return;
    }

    const action = Object.prototype.hasOwnProperty.call(this.actions, actionName) ? this.actions[actionName] : undefined;
    if (!action) {
      this.logger.warning('Unknown recovery action', { action: actionName, error_code: code });
      return;
    }

    this.logger.info('Attempting recovery action', { action: actionName, error_code: code });

    try {
      const recovered = await action(code, context, exception);
      if (recovered) {
        this.logger.info('Recovery action succeeded', { action: actionName, error_code: code });
      } else {
        this.logger.warning('Recovery action failed', { action: actionName, error_code: code });
      }
    } catch (recoveryError) {
      this.logger.error('Recovery action threw', {
        action: actionName,
        error_code: code,
        recovery_error: describeError(recoveryError),
      });
    }
  }
}
