import { Translator } from '../i18n/translator';
import { Logger } from '../observability/logger';
import { ErrorConfigRegistry, ErrorManagerSettings } from './errorConfig';
import { ErrorManager } from './errorManager';
import { DatabaseLogHandler, ErrorLogStore, InMemoryErrorLogStore } from './handlers/databaseLogHandler';
import { AppIdentity, EmailNotificationHandler, MailMessage, Mailer } from './handlers/emailNotificationHandler';
import { ErrorSimulationHandler } from './handlers/errorSimulationHandler';
import { LogHandler } from './handlers/logHandler';
import { RecoveryAction, RecoveryActionHandler } from './handlers/recoveryActionHandler';
import { SlackNotificationHandler } from './handlers/slackNotificationHandler';
import { UserInterfaceHandler } from './handlers/userInterfaceHandler';
import { TestingConditions } from './testingConditions';

/**
 * Mailer used when the host supplies none: the message goes to the log.
 */
export class LogMailer implements Mailer {
  constructor(private readonly logger: Logger) {}

  async send(message: MailMessage): Promise<void> {
    this.logger.notice('Error notification email', { to: message.to, subject: message.subject });
  }
}

export interface ErrorManagerOptions {
  settings: ErrorManagerSettings;
  translator: Translator;
  logger: Logger;
  app: AppIdentity;
  errorLogStore?: ErrorLogStore;
  mailer?: Mailer;
  fetchImpl?: typeof fetch;
  recoveryActions?: Readonly<Record<string, RecoveryAction>>;
  testingConditions?: TestingConditions;
}

/**
 * Builds an ErrorManager with the standard handler chain, in order:
 * log, UI, database, email, Slack, recovery, simulation.
 */
export function createErrorManager(options: ErrorManagerOptions): ErrorManager {
  const { settings, translator, logger, app } = options;

  const manager = new ErrorManager({
    registry: new ErrorConfigRegistry(settings.errors, settings.fallbackError),
    translator,
    ui: settings.ui,
    logger,
  });

  manager
    .registerHandler(new LogHandler(logger))
    .registerHandler(new UserInterfaceHandler(settings.ui, translator, logger))
    .registerHandler(
      new DatabaseLogHandler(options.errorLogStore ?? new InMemoryErrorLogStore(), settings.database, logger),
    )
    .registerHandler(
      new EmailNotificationHandler(options.mailer ?? new LogMailer(logger), settings.email, app, logger),
    )
    .registerHandler(new SlackNotificationHandler(settings.slack, app, options.fetchImpl ?? fetch, logger))
    .registerHandler(new RecoveryActionHandler(options.recoveryActions ?? {}, logger));

  if (options.testingConditions) {
    manager.registerHandler(new ErrorSimulationHandler(options.testingConditions, app.environment, logger));
  }

  return manager;
}
