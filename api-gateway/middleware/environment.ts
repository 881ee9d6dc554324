import { NextFunction, Request, RequestHandler, Response } from 'express';
import { TestingConditions } from '../../engine/errors/testingConditions';
import { createApiError } from '../errors/apiError';

export const SIMULATION_ENVIRONMENTS: ReadonlyArray<string> = ['local', 'development', 'testing', 'staging'];

/**
 * Rejects the request with 403 unless the service runs in one of `allowed`.
 */
export function requireEnvironment(
  environment: string,
  allowed: ReadonlyArray<string> = SIMULATION_ENVIRONMENTS,
): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!allowed.includes(environment)) {
      next(
        createApiError('AUTHORIZATION_ERROR', 403, {
          reason: 'environment_not_allowed',
          environment,
          request_url: req.originalUrl,
        }),
      );
      return;
    }
    next();
  };
}

/**
 * Fails the request with `errorCode` while that code is being simulated.
 * Without a conditions store it lets everything through.
 */
export function simulatedErrorGate(conditions: TestingConditions | undefined, errorCode: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (conditions?.isTesting(errorCode)) {
      next(createApiError(errorCode, 500, { simulated: true, request_url: req.originalUrl }));
      return;
    }
    next();
  };
}
