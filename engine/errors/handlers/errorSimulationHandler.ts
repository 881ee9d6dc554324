import { Logger } from '../../observability/logger';
import { ErrorConfig } from '../errorConfig';
import { ErrorContext } from '../errorConfigResolver';
import { ErrorHandler } from '../errorDispatcher';
import { TestingConditions } from '../testingConditions';

/**
 * Records which handled errors were produced by an active simulation.
 */
export class ErrorSimulationHandler implements ErrorHandler {
  readonly name = 'ErrorSimulationHandler';

  constructor(
    private readonly conditions: TestingConditions,
    private readonly environment: string,
    private readonly logger: Logger,
  ) {}

  shouldHandle(): boolean {
    return this.environment !== 'production';
  }

  handle(code: string, config: ErrorConfig, context: ErrorContext): void {
    const simulated = this.conditions.isTesting(code) || this.conditions.isTesting(String(context._original_code ?? ''));

    this.logger.info(simulated ? 'Simulated error handled' : 'Error handled outside simulation', {
      error_code: code,
      type: config.type,
      simulated,
      active_simulations: Object.keys(this.conditions.getActiveConditions()),
    });
  }
}
