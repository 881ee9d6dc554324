/**
 * Upload manager HTTP surface
 *
 * ENVIRONMENT VARIABLES (all optional):
 * - SERVICE_ENV                  (local | development | testing | staging | production, default local)
 * - PORT                         (default 3000)
 * - APP_LOCALE                   (default en)
 * - LOG_LEVEL                    (debug | info | notice | warning | error | critical)
 * - PLATFORM_POST_MAX_SIZE       (default 8M)
 * - PLATFORM_UPLOAD_MAX_FILESIZE (default 2M)
 * - PLATFORM_MAX_FILE_UPLOADS    (default 20)
 * - ERROR_SLACK_WEBHOOK_URL, ERROR_EMAIL_TO
 */

import 'dotenv/config';
import express, { Express, Request, Response } from 'express';
import { Config, getConfig } from '../bootstrap/config';
import { createErrorManager } from '../engine/errors/createErrorManager';
import { ErrorManager } from '../engine/errors/errorManager';
import { ErrorLogStore } from '../engine/errors/handlers/databaseLogHandler';
import { Mailer } from '../engine/errors/handlers/emailNotificationHandler';
import { TestingConditions } from '../engine/errors/testingConditions';
import { JsonTranslator } from '../engine/i18n/translator';
import { ConsoleLogger, Logger } from '../engine/observability/logger';
import { blockingErrorPage, createGlobalErrorHandler, routeNotFound } from './errors/errorHandler';
import { createConfigRouter } from './routes/config';
import { createErrorSimulationRouter } from './routes/errorSimulation';

export interface AppDeps {
  config: Config;
  logger?: Logger;
  errorManager?: ErrorManager;
  errorLogStore?: ErrorLogStore;
  mailer?: Mailer;
  fetchImpl?: typeof fetch;
}

/* -------------------------------------------------------------------------- */
/*                                APP FACTORY                                 */
/* -------------------------------------------------------------------------- */

export function createApp(deps: AppDeps): Express {
  const { config } = deps;
  const logger = deps.logger ?? new ConsoleLogger(config.logLevel, 'upload-manager');
  const translator = new JsonTranslator(config.langDir, config.locale, 'en', logger);

  // Simulation exists only outside production.
  const testingConditions =
    config.serviceEnv === 'production' ? undefined : new TestingConditions(config.serviceEnv);

  const errorManager =
    deps.errorManager ??
    createErrorManager({
      settings: config.errorManager,
      translator,
      logger,
      app: { name: config.appName, environment: config.serviceEnv },
      errorLogStore: deps.errorLogStore,
      mailer: deps.mailer,
      fetchImpl: deps.fetchImpl,
      testingConditions,
    });

  const app = express();

  /* ------------------------------- Body Parsers ------------------------------ */
  app.use(express.json({ limit: '10kb' }));

  /* --------------------------------- Health --------------------------------- */
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok', env: config.serviceEnv });
  });

  /* ---------------------------------- Routes --------------------------------- */
  app.use(
    '/api',
    createConfigRouter({
      policy: config.uploadPolicy,
      platformLimits: config.platformLimits,
      translator,
      environment: config.serviceEnv,
      logger,
      errorManager,
      testingConditions,
    }),
  );

  if (testingConditions) {
    app.use(
      '/api/errors',
      createErrorSimulationRouter({
        errorManager,
        conditions: testingConditions,
        environment: config.serviceEnv,
        logger,
      }),
    );
  }

  /* ----------------------------------- 404 ----------------------------------- */
  app.use(routeNotFound);

  /* ---------------------------- Global Error Handler -------------------------- */
  app.use(createGlobalErrorHandler(errorManager, logger));
  app.use(blockingErrorPage);

  return app;
}

/* -------------------------------------------------------------------------- */
/*                                SERVER START                                */
/* -------------------------------------------------------------------------- */

export function startServer(): void {
  let config: Config;
  try {
    config = getConfig();
  } catch (error) {
    console.error(`FATAL: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const logger = new ConsoleLogger(config.logLevel, 'upload-manager');
  const app = createApp({ config, logger });

  app.listen(config.port, () => {
    logger.info('Upload manager listening', { port: config.port, env: config.serviceEnv });
  });
}

if (require.main === module) {
  startServer();
}
