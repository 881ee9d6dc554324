import { Request, Response, Router } from 'express';
import { isErrorType } from '../../engine/errors/errorConfig';
import { ErrorManager } from '../../engine/errors/errorManager';
import { TestingConditions } from '../../engine/errors/testingConditions';
import { Logger } from '../../engine/observability/logger';
import { requireEnvironment } from '../middleware/environment';

export interface ErrorSimulationDeps {
  errorManager: ErrorManager;
  conditions: TestingConditions;
  environment: string;
  logger: Logger;
}

/**
 * Toggle simulated error conditions. Only mounted outside production and
 * additionally gated on the environment.
 */
export function createErrorSimulationRouter(deps: ErrorSimulationDeps): Router {
  const router = Router();
  router.use(requireEnvironment(deps.environment));

  router.post('/simulate/:errorCode', (req: Request, res: Response) => {
    const { errorCode } = req.params;

    if (!deps.errorManager.getErrorConfig(errorCode)) {
      res.status(404).json({
        success: false,
        message: `Error code '${errorCode}' does not exist in the error configuration.`,
      });
      return;
    }

    deps.conditions.setCondition(errorCode, true);
    deps.logger.info('Error simulation activated', { error_code: errorCode });

    res.status(200).json({
      success: true,
      message: `Error simulation activated for '${errorCode}'.`,
      errorCode,
    });
  });

  router.delete('/simulate/:errorCode', (req: Request, res: Response) => {
    const { errorCode } = req.params;
    deps.conditions.setCondition(errorCode, false);
    deps.logger.info('Error simulation deactivated', { error_code: errorCode });

    res.status(200).json({
      success: true,
      message: `Error simulation deactivated for '${errorCode}'.`,
    });
  });

  router.get('/simulations', (_req: Request, res: Response) => {
    const active = Object.keys(deps.conditions.getActiveConditions());
    res.status(200).json({ success: true, activeSimulations: active, count: active.length });
  });

  router.delete('/simulations', (_req: Request, res: Response) => {
    deps.conditions.resetAllConditions();
    deps.logger.info('All error simulations reset');
    res.status(200).json({ success: true, message: 'All error simulations have been reset.' });
  });

  router.get('/codes', (req: Request, res: Response) => {
    const filterType = isErrorType(req.query.type) ? req.query.type : undefined;
    const codes = deps.errorManager
      .getErrorCodes()
      .filter((code) => !filterType || deps.errorManager.getErrorConfig(code)?.type === filterType);

    res.status(200).json({
      success: true,
      errorCodes: codes,
      count: codes.length,
      filter: filterType ? { type: filterType } : null,
    });
  });

  return router;
}
