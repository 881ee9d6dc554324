import { ErrorContext } from '../../engine/errors/errorConfigResolver';

/**
 * Error carried through Express to the global error handler. `errorCode`
 * is an error-manager code; the handler decides what the client sees.
 */
export interface ApiError extends Error {
  errorCode: string;
  statusCode: number;
  context: ErrorContext;
}

export function createApiError(
  errorCode: string,
  statusCode: number,
  context: ErrorContext = {},
  message: string = errorCode,
): ApiError {
  return Object.assign(new Error(message), {
    name: 'ApiError',
    errorCode,
    statusCode,
    context,
  });
}

/**
 * @throws ApiError
 *
 * Examples:
 * - throwApiError('VALIDATION_ERROR', 422)
 * - throwApiError('AUTHORIZATION_ERROR', 403)
 */
export function throwApiError(errorCode: string, statusCode: number, context: ErrorContext = {}): never {
  throw createApiError(errorCode, statusCode, context);
}

export function isApiError(err: unknown): err is ApiError {
  return (
    err !== null &&
    typeof err === 'object' &&
    'errorCode' in err &&
    'statusCode' in err &&
    typeof err.errorCode === 'string' &&
    typeof err.statusCode === 'number'
  );
}
