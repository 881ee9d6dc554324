import { Request, Response, Router } from 'express';
import { JsonTranslator } from '../../engine/i18n/translator';
import { LimitCeilings, UploadLimitsNegotiator } from '../../engine/limits/uploadLimits';
import { Logger } from '../../engine/observability/logger';
import { UploadPolicy } from '../../engine/uploads/uploadPolicy';
import { TestingConditions } from '../../engine/errors/testingConditions';
import { ErrorManager } from '../../engine/errors/errorManager';
import { asyncHandler } from '../errors/errorHandler';
import { simulatedErrorGate } from '../middleware/environment';

export interface ConfigRouteDeps {
  policy: UploadPolicy;
  platformLimits: LimitCeilings;
  translator: JsonTranslator;
  environment: string;
  logger: Logger;
  errorManager: ErrorManager;
  testingConditions?: TestingConditions;
}

/**
 * Client bootstrap endpoints: global upload configuration and the
 * negotiated upload limits.
 */
export function createConfigRouter(deps: ConfigRouteDeps): Router {
  const router = Router();
  const gate = simulatedErrorGate(deps.testingConditions, 'GENERIC_SERVER_ERROR');

  router.get('/config', gate, (req: Request, res: Response) => {
    const requested = typeof req.query.lang === 'string' ? req.query.lang : undefined;
    const lang = requested && deps.policy.availableLangs.includes(requested) ? requested : deps.translator.getLocale();

    res.status(200).json({
      currentLang: lang,
      availableLangs: deps.policy.availableLangs,
      translations: deps.translator.bundle('uploadmanager', lang),
      envMode: deps.environment,
      allowedExtensions: deps.policy.allowedExtensions,
      allowedMimeTypes: deps.policy.allowedMimeTypes,
      maxSize: deps.policy.maxSize,
      uploadTypePaths: deps.policy.uploadTypePaths,
      uploadEndpoints: deps.policy.uploadEndpoints,
      defaultUploadType: deps.policy.defaultUploadType,
    });
  });

  router.get(
    '/system/upload-limits',
    gate,
    asyncHandler(async (_req: Request, res: Response) => {
      const negotiator = new UploadLimitsNegotiator(
        deps.platformLimits,
        {
          maxTotalSize: deps.policy.maxTotalSize,
          maxFileSize: deps.policy.maxFileSize,
          maxFiles: deps.policy.maxFiles,
        },
        deps.logger,
        deps.policy.sizeMargin,
      );
      const limits = negotiator.getEffectiveLimits();

      const restrictive = Object.entries(limits.binding)
        .filter(([, source]) => source === 'platform')
        .map(([name]) => name);

      if (restrictive.length > 0) {
        // Surfaces through the error manager so operators get notified.
        await deps.errorManager.handle('SERVER_LIMITS_RESTRICTIVE', { limits: restrictive.join(', ') });
      }

      res.status(200).json({
        max_total_size: limits.max_total_size,
        max_file_size: limits.max_file_size,
        max_files: limits.max_files,
        max_total_size_formatted: limits.max_total_size_formatted,
        max_file_size_formatted: limits.max_file_size_formatted,
        size_margin: limits.size_margin,
      });
    }),
  );

  return router;
}
