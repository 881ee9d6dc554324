import { Logger, silentLogger } from '../observability/logger';
import { ErrorConfig, ErrorConfigRegistry } from './errorConfig';

export const UNDEFINED_ERROR_CODE = 'UNDEFINED_ERROR_CODE';
export const FALLBACK_ERROR_CODE = 'FALLBACK_ERROR';
export const FATAL_FALLBACK_FAILURE = 'FATAL_FALLBACK_FAILURE';

export type ErrorContext = Record<string, unknown>;

export interface ResolvedError {
  code: string;
  config: ErrorConfig;
  context: ErrorContext;
}

/**
 * Raised when no configuration exists for a code, for UNDEFINED_ERROR_CODE,
 * or as the global fallback. Carries enough to render a bare 500.
 */
export class FatalFallbackError extends Error {
  readonly errorCode = FATAL_FALLBACK_FAILURE;
  readonly statusCode = 500;

  constructor(
    readonly originalCode: string,
    readonly context: ErrorContext = {},
  ) {
    super(`Fatal error manager failure: no configuration found for code '${originalCode}' and no fallback is defined`);
    this.name = 'FatalFallbackError';
  }
}

export function isFatalFallbackError(error: unknown): error is FatalFallbackError {
  return error instanceof FatalFallbackError;
}

export class ErrorConfigResolver {
  constructor(
    private readonly registry: ErrorConfigRegistry,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Resolve `code` through the fallback chain. Never returns without a config.
   *
   * @throws FatalFallbackError when every level of the chain is missing
   */
  resolve(code: string, context: ErrorContext = {}): ResolvedError {
    const direct = this.registry.get(code);
    if (direct) {
      return { code, config: direct, context: { ...context } };
    }

    this.logger.warning('Undefined error code, using fallback chain', { error_code: code });
    const fallbackContext: ErrorContext = { ...context, _original_code: code };

    const undefinedConfig = this.registry.get(UNDEFINED_ERROR_CODE);
    if (undefinedConfig) {
      return { code: UNDEFINED_ERROR_CODE, config: undefinedConfig, context: fallbackContext };
    }

    const fallback = this.registry.fallback();
    if (fallback) {
      this.logger.warning('UNDEFINED_ERROR_CODE not configured, using global fallback', { error_code: code });
      return { code: FALLBACK_ERROR_CODE, config: fallback, context: fallbackContext };
    }

    this.logger.critical('No fallback error configuration available', { error_code: code });
    throw new FatalFallbackError(code, fallbackContext);
  }
}
