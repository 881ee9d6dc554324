import { BlockingLevel } from '../uploads/errors';
import { DisplayMode, ErrorType } from './errorConfig';
import { ErrorContext } from './errorConfigResolver';
import { RequestInfo } from './errorDispatcher';

export interface ExceptionSummary {
  name: string;
  message: string;
  stack?: string;
}

/**
 * Everything the engine knows about one handled error.
 */
export interface ErrorInfo {
  errorCode: string;
  originalCode?: string;
  type: ErrorType;
  blocking: BlockingLevel;
  message: string;
  userMessage: string;
  httpStatusCode: number;
  context: ErrorContext;
  displayMode: DisplayMode;
  timestamp: string;
  exception?: ExceptionSummary;
}

/**
 * The only fields ever sent to a JSON client.
 */
export interface ErrorResponseBody {
  error_code: string;
  user_message: string;
  blocking: BlockingLevel;
  display_mode: DisplayMode;
}

export type ErrorOutcome =
  | { kind: 'json'; status: number; body: ErrorResponseBody }
  | { kind: 'blocking'; status: number; errorCode: string; userMessage: string; context: ErrorContext }
  | { kind: 'none'; status: number };

export function expectsJson(request: RequestInfo): boolean {
  const accept = (request.accept ?? '').toLowerCase();

  if (accept.includes('/json') || accept.includes('+json')) {
    return true;
  }
  if (request.xhr && (accept === '' || accept.includes('*/*'))) {
    return true;
  }
  return request.path === '/api' || request.path.startsWith('/api/');
}

export class ErrorResponseBuilder {
  build(info: ErrorInfo, request?: RequestInfo): ErrorOutcome {
    if (request && expectsJson(request)) {
      return {
        kind: 'json',
        status: info.httpStatusCode,
        body: {
          error_code: info.errorCode,
          user_message: info.userMessage,
          blocking: info.blocking,
          display_mode: info.displayMode,
        },
      };
    }

    if (info.blocking === 'blocking') {
      return {
        kind: 'blocking',
        status: info.httpStatusCode,
        errorCode: info.errorCode,
        userMessage: info.userMessage,
        context: info.context,
      };
    }

    return { kind: 'none', status: info.httpStatusCode };
  }
}
