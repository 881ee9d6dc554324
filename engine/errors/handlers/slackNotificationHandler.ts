import { describeError, Logger, silentLogger } from '../../observability/logger';
import { ErrorConfig, SlackSettings } from '../errorConfig';
import { ErrorContext } from '../errorConfigResolver';
import { ErrorHandler, HandlerScope } from '../errorDispatcher';
import { sanitizeContext, sanitizeString } from '../sanitizeContext';
import { AppIdentity } from './emailNotificationHandler';

type FetchLike = typeof fetch;

const COLORS: Record<string, string> = {
  critical: '#FF0000',
  error: '#E01E5A',
  warning: '#ECB22E',
  notice: '#36C5F0',
};

const SLACK_TIMEOUT_MS = 15_000;

export class SlackNotificationHandler implements ErrorHandler {
  readonly name = 'SlackNotificationHandler';

  constructor(
    private readonly settings: SlackSettings,
    private readonly app: AppIdentity,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly logger: Logger = silentLogger,
  ) {}

  shouldHandle(config: ErrorConfig): boolean {
    const wanted = (this.settings.notifyAllCritical && config.type === 'critical') || Boolean(config.notifySlack);
    return wanted && this.settings.enabled && Boolean(this.settings.webhookUrl);
  }

  buildPayload(code: string, config: ErrorConfig, context: ErrorContext, exception?: Error, scope?: HandlerScope) {
    const fields = [
      { type: 'mrkdwn', text: `*Type:*\n\`${config.type}\`` },
      { type: 'mrkdwn', text: `*Blocking:*\n\`${config.blocking}\`` },
    ];
    if (scope?.request) {
      fields.push({ type: 'mrkdwn', text: `*URL:*\n${scope.request.method} ${scope.request.url}` });
    }

    const blocks: Array<Record<string, unknown>> = [
      { type: 'header', text: { type: 'plain_text', text: `${this.app.name} (${this.app.environment}) Error: ${code}` } },
      { type: 'section', fields },
      {
        type: 'section',
        text: { type: 'mrkdwn', text: `*Message:*\n>${sanitizeString(config.devMessage ?? 'No developer message', 1000)}` },
      },
    ];

    if (exception) {
      blocks.push({
        type: 'section',
        text: { type: 'mrkdwn', text: `*Exception:*\n\`\`\`${exception.name}: ${sanitizeString(exception.message)}\`\`\`` },
      });
    }

    if (this.settings.includeContext && Object.keys(context).length > 0) {
      let serialized = JSON.stringify(sanitizeContext(context), null, 2);
      if (serialized.length > this.settings.contextMaxLength) {
        serialized = `${serialized.slice(0, this.settings.contextMaxLength - 20)}\n... [TRUNCATED]`;
      }
      blocks.push({ type: 'section', text: { type: 'mrkdwn', text: `*Context:*\n\`\`\`${serialized}\`\`\`` } });
    }

    return {
      username: this.settings.username,
      icon_emoji: this.settings.iconEmoji,
      attachments: [{ color: COLORS[config.type] ?? COLORS.error, blocks: [...blocks, { type: 'divider' }] }],
    };
  }

  async handle(
    code: string,
    config: ErrorConfig,
    context: ErrorContext,
    exception?: Error,
    scope?: HandlerScope,
  ): Promise<void> {
    const webhookUrl = this.settings.webhookUrl;
    if (!webhookUrl) {
      return;
    }

    try {
      const response = await this.fetchImpl(webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(this.buildPayload(code, config, context, exception, scope)),
        signal: AbortSignal.timeout(SLACK_TIMEOUT_MS),
      });

      if (!response.ok) {
        this.logger.error('Slack notification rejected', {
          error_code: code,
          status: response.status,
          body: sanitizeString(await response.text(), 200),
        });
        return;
      }

      this.logger.info('Slack notification sent', { error_code: code });
    } catch (slackError) {
      this.logger.error('Failed to send Slack notification', {
        error_code: code,
        slack_error: describeError(slackError),
      });
    }
  }
}
