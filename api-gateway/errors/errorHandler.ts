import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ErrorContext, isFatalFallbackError } from '../../engine/errors/errorConfigResolver';
import { RequestInfo } from '../../engine/errors/errorDispatcher';
import { ErrorManager } from '../../engine/errors/errorManager';
import { describeError, Logger } from '../../engine/observability/logger';
import { createApiError, isApiError } from './apiError';
import { ResponseFlashStore } from './flash';

export function toRequestInfo(req: Request): RequestInfo {
  return {
    url: req.originalUrl,
    path: req.path,
    method: req.method,
    accept: req.get('accept'),
    xhr: req.xhr,
    ip: req.ip,
    userAgent: req.get('user-agent'),
  };
}

const hasStringProp = <K extends string>(err: unknown, key: K): err is Record<K, string> =>
  typeof err === 'object' && err !== null && key in err && typeof Reflect.get(err, key) === 'string';

const hasNumberProp = <K extends string>(err: unknown, key: K): err is Record<K, number> =>
  typeof err === 'object' && err !== null && key in err && typeof Reflect.get(err, key) === 'number';

/**
 * Map anything thrown inside Express to an error-manager code.
 */
export function mapErrorToCode(err: unknown): { code: string; context: ErrorContext } {
  if (isApiError(err)) {
    return { code: err.errorCode, context: { ...err.context } };
  }
  if (hasStringProp(err, 'type') && err.type === 'entity.parse.failed') {
    return { code: 'JSON_ERROR', context: {} };
  }
  if (hasStringProp(err, 'type') && err.type === 'entity.too.large') {
    return { code: 'MAX_FILE_SIZE', context: {} };
  }
  if (hasNumberProp(err, 'status') && err.status === 404) {
    return { code: 'ROUTE_NOT_FOUND', context: {} };
  }
  return { code: 'UNEXPECTED_ERROR', context: {} };
}

const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (ch) => `&#${ch.charCodeAt(0)};`);

/**
 * Global error handler middleware. Must be registered after every route.
 */
export function createGlobalErrorHandler(errorManager: ErrorManager, logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const { code, context } = mapErrorToCode(err);
    const exception = err instanceof Error ? err : undefined;
    const flash = new ResponseFlashStore(res);

    const requestContext: ErrorContext = {
      ...context,
      request_url: req.originalUrl,
      request_method: req.method,
      ip_address: req.ip,
      user_agent: req.get('user-agent'),
      middleware_caught: true,
    };

    errorManager
      .handle(code, requestContext, exception, { request: toRequestInfo(req), flash })
      .then((outcome) => {
        switch (outcome.kind) {
          case 'json':
            res.status(outcome.status).json(outcome.body);
            return;
          case 'blocking':
            next(createApiError(outcome.errorCode, outcome.status, outcome.context, outcome.userMessage));
            return;
          case 'none':
            res.status(outcome.status).type('html').send(renderFlash(flash.all()));
            return;
        }
      })
      .catch((handleError: unknown) => {
        if (isFatalFallbackError(handleError)) {
          logger.critical('Error manager could not resolve any configuration', {
            original_code: handleError.originalCode,
          });
        } else {
          logger.error('Error manager failed while handling an error', {
            error_code: code,
            failure: describeError(handleError),
          });
        }
        next(handleError);
      });
  };
}

function renderFlash(flash: Record<string, unknown>): string {
  const messages = Object.entries(flash)
    .filter(([key, value]) => key.startsWith('error_') && !key.startsWith('error_code_') && typeof value === 'string')
    .map(([key, value]) => `<div class="${escapeHtml(key)}">${escapeHtml(String(value))}</div>`);
  return `<!doctype html><html><body>${messages.join('')}</body></html>`;
}

/**
 * Renders a blocking error as a minimal HTML page. Registered after the
 * global handler; anything that is not an ApiError goes to Express.
 */
export const blockingErrorPage: ErrorRequestHandler = (err: unknown, _req: Request, res: Response, next: NextFunction) => {
  if (!isApiError(err) || isFatalFallbackError(err) || res.headersSent) {
    next(err);
    return;
  }

  res
    .status(err.statusCode)
    .type('html')
    .send(
      `<!doctype html><html><body><h1>${err.statusCode}</h1><p>${escapeHtml(err.message)}</p>` +
        `<p><small>${escapeHtml(err.errorCode)}</small></p></body></html>`,
    );
};

/**
 * Create a wrapper for route handlers to catch async errors
 *
 * Usage:
 * router.get('/path', asyncHandler(async (req, res) => { ... }))
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Terminal 404 for unmatched routes.
 */
export const routeNotFound: RequestHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(createApiError('ROUTE_NOT_FOUND', 404, { request_url: req.originalUrl }));
};
