import { describeError, Logger, silentLogger } from '../../observability/logger';
import { EmailSettings, ErrorConfig } from '../errorConfig';
import { ErrorContext } from '../errorConfigResolver';
import { ErrorHandler, HandlerScope } from '../errorDispatcher';
import { sanitizeContext } from '../sanitizeContext';

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
}

/**
 * Outbound mail transport supplied by the host.
 */
export interface Mailer {
  send(message: MailMessage): Promise<void>;
}

export interface AppIdentity {
  name: string;
  environment: string;
}

export class EmailNotificationHandler implements ErrorHandler {
  readonly name = 'EmailNotificationHandler';

  constructor(
    private readonly mailer: Mailer,
    private readonly settings: EmailSettings,
    private readonly app: AppIdentity,
    private readonly logger: Logger = silentLogger,
  ) {}

  shouldHandle(config: ErrorConfig): boolean {
    return Boolean(config.notifyEmail) && this.settings.enabled && Boolean(this.settings.to);
  }

  subject(code: string): string {
    return `${this.settings.subjectPrefix}${this.app.name} (${this.app.environment}): ${code}`;
  }

  body(code: string, config: ErrorConfig, context: ErrorContext, exception?: Error, scope?: HandlerScope): string {
    const lines = [
      `Error code: ${code}`,
      `Type: ${config.type}`,
      `Blocking: ${config.blocking}`,
      `Message: ${config.devMessage ?? 'No developer message'}`,
    ];

    if (scope?.request) {
      lines.push(`Request: ${scope.request.method} ${scope.request.url}`);
    }
    if (exception) {
      lines.push(`Exception: ${exception.name}: ${exception.message}`);
      if (this.settings.includeTrace && exception.stack) {
        lines.push('', exception.stack);
      }
    }
    if (this.settings.includeContext) {
      lines.push('', 'Context:', JSON.stringify(sanitizeContext(context), null, 2));
    }

    return lines.join('\n');
  }

  async handle(
    code: string,
    config: ErrorConfig,
    context: ErrorContext,
    exception?: Error,
    scope?: HandlerScope,
  ): Promise<void> {
    const to = this.settings.to;
    if (!to) {
      return;
    }

    try {
      await this.mailer.send({
        to,
        subject: this.subject(code),
        text: this.body(code, config, context, exception, scope),
      });
      this.logger.info('Error notification email sent', { recipient: to, error_code: code });
    } catch (mailError) {
      this.logger.error('Failed to send error notification email', {
        error_code: code,
        recipient: to,
        mail_error: describeError(mailError),
      });
    }
  }
}
