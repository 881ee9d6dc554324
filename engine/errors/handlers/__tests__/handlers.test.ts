import { MapTranslator } from '../../../__tests__/support/mapTranslator';
import { RecordingLogger } from '../../../__tests__/support/recordingLogger';
import { EmailSettings, ErrorConfig, SlackSettings, UiSettings } from '../../errorConfig';
import { FlashStore, HandlerScope } from '../../errorDispatcher';
import { TestingConditions } from '../../testingConditions';
import { DatabaseLogHandler, ErrorLogRecord, InMemoryErrorLogStore } from '../databaseLogHandler';
import { EmailNotificationHandler, MailMessage, Mailer } from '../emailNotificationHandler';
import { ErrorSimulationHandler } from '../errorSimulationHandler';
import { LogHandler } from '../logHandler';
import { RecoveryActionHandler } from '../recoveryActionHandler';
import { SlackNotificationHandler } from '../slackNotificationHandler';
import { UserInterfaceHandler } from '../userInterfaceHandler';

const app = { name: 'upload-manager', environment: 'testing' };

const virusFound: ErrorConfig = {
  type: 'error',
  blocking: 'blocking',
  devMessage: 'Virus detected in file a.pdf.',
  userMessage: 'The file a.pdf is infected and was rejected.',
  httpStatusCode: 422,
  displayMode: 'sweet-alert',
  notifyEmail: true,
  notifySlack: true,
};

class MemoryFlash implements FlashStore {
  readonly entries: Record<string, unknown> = {};

  flash(key: string, value: unknown): void {
    this.entries[key] = value;
  }
}

const scope = (flash?: FlashStore): HandlerScope => ({
  flash,
  request: { url: 'http://localhost/upload', path: '/upload', method: 'POST', xhr: false, ip: '127.0.0.1', userAgent: 'jest' },
});

describe('LogHandler', () => {
  test('logs at the level matching the error type', () => {
    const logger = new RecordingLogger();

    new LogHandler(logger).handle('VIRUS_FOUND', virusFound, { fileName: 'a.pdf' }, new Error('scan hit'));

    expect(logger.records).toEqual([
      {
        level: 'error',
        message: '[VIRUS_FOUND] Virus detected in file a.pdf.',
        context: {
          fileName: 'a.pdf',
          error_code: 'VIRUS_FOUND',
          blocking: 'blocking',
          exception: { name: 'Error', message: 'scan hit' },
        },
      },
    ]);
  });

  test('uses the critical channel for critical errors', () => {
    const logger = new RecordingLogger();

    new LogHandler(logger).handle('BOOM', { type: 'critical', blocking: 'blocking' }, {});

    expect(logger.at('critical').map((record) => record.message)).toEqual(['[BOOM] No developer message']);
  });
});

describe('UserInterfaceHandler', () => {
  const settings: UiSettings = { defaultDisplayMode: 'div', showErrorCodes: true, genericErrorMessage: 'errors.generic_error' };
  const handler = new UserInterfaceHandler(settings, new MapTranslator({ 'errors.generic_error': 'Generic failure.' }));

  test('skips log-only errors and errors without a user message', () => {
    expect(handler.shouldHandle({ ...virusFound, displayMode: 'log-only' })).toBe(false);
    expect(handler.shouldHandle({ type: 'error', blocking: 'not' })).toBe(false);
    expect(handler.shouldHandle(virusFound)).toBe(true);
  });

  test('flashes message, code and info for the display target', () => {
    const flash = new MemoryFlash();

    handler.handle('VIRUS_FOUND', virusFound, {}, undefined, scope(flash));

    expect(flash.entries).toEqual({
      'error_sweet-alert': 'The file a.pdf is infected and was rejected.',
      'error_code_sweet-alert': 'VIRUS_FOUND',
      error_info: {
        error_code: 'VIRUS_FOUND',
        message: 'The file a.pdf is infected and was rejected.',
        type: 'error',
        blocking: 'blocking',
        display_target: 'sweet-alert',
      },
    });
  });

  test('falls back to the generic message', () => {
    const flash = new MemoryFlash();

    handler.handle('X', { type: 'warning', blocking: 'not', userMessageKey: 'errors.user.x' }, {}, undefined, scope(flash));

    expect(flash.entries.error_div).toBe('Generic failure.');
  });
});

describe('DatabaseLogHandler', () => {
  test('stores a sanitized record with request data', async () => {
    const store = new InMemoryErrorLogStore();
    const handler = new DatabaseLogHandler(
      store,
      { enabled: true, includeTrace: false, maxTraceLength: 100 },
      undefined,
      () => new Date('2026-02-02T00:00:00.000Z'),
    );

    await handler.handle('VIRUS_FOUND', virusFound, { fileName: 'a.pdf', api_key: 'test-secret' }, new Error('hit'), scope());

    const expected: ErrorLogRecord = {
      errorCode: 'VIRUS_FOUND',
      type: 'error',
      blocking: 'blocking',
      message: 'Virus detected in file a.pdf.',
      userMessage: 'The file a.pdf is infected and was rejected.',
      httpStatusCode: 422,
      context: { fileName: 'a.pdf', api_key: '[REDACTED]' },
      displayMode: 'sweet-alert',
      requestMethod: 'POST',
      requestUrl: 'http://localhost/upload',
      userAgent: 'jest',
      ipAddress: '127.0.0.1',
      createdAt: '2026-02-02T00:00:00.000Z',
      exceptionName: 'Error',
      exceptionMessage: 'hit',
    };
    expect(store.all()).toEqual([expected]);
  });

  test('is inactive when disabled', () => {
    const handler = new DatabaseLogHandler(new InMemoryErrorLogStore(), {
      enabled: false,
      includeTrace: false,
      maxTraceLength: 100,
    });

    expect(handler.shouldHandle()).toBe(false);
  });

  test('logs a failing store instead of throwing', async () => {
    const logger = new RecordingLogger();
    const handler = new DatabaseLogHandler(
      { save: () => Promise.reject(new Error('disk full')) },
      { enabled: true, includeTrace: false, maxTraceLength: 100 },
      logger,
    );

    await handler.handle('X', virusFound, {});

    expect(logger.at('error')[0].message).toBe('Failed to persist error record');
  });
});

describe('EmailNotificationHandler', () => {
  const settings: EmailSettings = {
    enabled: true,
    to: 'ops@example.test',
    subjectPrefix: '[ERROR] ',
    includeContext: true,
    includeTrace: false,
  };

  class MemoryMailer implements Mailer {
    readonly sent: MailMessage[] = [];

    async send(message: MailMessage): Promise<void> {
      this.sent.push(message);
    }
  }

  test('requires notifyEmail, the enabled flag and a recipient', () => {
    const mailer = new MemoryMailer();

    expect(new EmailNotificationHandler(mailer, settings, app).shouldHandle(virusFound)).toBe(true);
    expect(new EmailNotificationHandler(mailer, settings, app).shouldHandle({ ...virusFound, notifyEmail: false })).toBe(false);
    expect(new EmailNotificationHandler(mailer, { ...settings, to: undefined }, app).shouldHandle(virusFound)).toBe(false);
    expect(new EmailNotificationHandler(mailer, { ...settings, enabled: false }, app).shouldHandle(virusFound)).toBe(false);
  });

  test('sends a redacted report', async () => {
    const mailer = new MemoryMailer();

    await new EmailNotificationHandler(mailer, settings, app).handle(
      'VIRUS_FOUND',
      virusFound,
      { password: 'test-secret' },
      undefined,
      scope(),
    );

    expect(mailer.sent).toEqual([
      {
        to: 'ops@example.test',
        subject: '[ERROR] upload-manager (testing): VIRUS_FOUND',
        text: [
          'Error code: VIRUS_FOUND',
          'Type: error',
          'Blocking: blocking',
          'Message: Virus detected in file a.pdf.',
          'Request: POST http://localhost/upload',
          '',
          'Context:',
          '{\n  "password": "[REDACTED]"\n}',
        ].join('\n'),
      },
    ]);
  });

  test('logs a failing mailer', async () => {
    const logger = new RecordingLogger();
    const failing: Mailer = { send: () => Promise.reject(new Error('smtp down')) };

    await new EmailNotificationHandler(failing, settings, app, logger).handle('X', virusFound, {});

    expect(logger.at('error')[0].context.mail_error).toEqual({ name: 'Error', message: 'smtp down' });
  });
});

describe('SlackNotificationHandler', () => {
  const settings: SlackSettings = {
    enabled: true,
    webhookUrl: 'https://hooks.example.test/services/test',
    notifyAllCritical: true,
    username: 'Error Bot',
    iconEmoji: ':boom:',
    includeContext: false,
    contextMaxLength: 1500,
  };

  test('notifies on critical errors or an explicit flag', () => {
    const handler = new SlackNotificationHandler(settings, app);

    expect(handler.shouldHandle({ type: 'critical', blocking: 'blocking' })).toBe(true);
    expect(handler.shouldHandle({ type: 'error', blocking: 'blocking', notifySlack: true })).toBe(true);
    expect(handler.shouldHandle({ type: 'error', blocking: 'blocking' })).toBe(false);
    expect(
      new SlackNotificationHandler({ ...settings, webhookUrl: undefined }, app).shouldHandle({
        type: 'critical',
        blocking: 'blocking',
      }),
    ).toBe(false);
  });

  test('posts the payload to the webhook', async () => {
    const requests: Array<{ url: string; init?: RequestInit }> = [];
    const fetchImpl: typeof fetch = async (input, init) => {
      requests.push({ url: String(input), init });
      return new Response('ok', { status: 200 });
    };

    await new SlackNotificationHandler(settings, app, fetchImpl).handle('VIRUS_FOUND', virusFound, {});

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://hooks.example.test/services/test');
    const body: unknown = JSON.parse(String(requests[0].init?.body));
    expect(body).toMatchObject({
      username: 'Error Bot',
      icon_emoji: ':boom:',
      attachments: [{ color: '#E01E5A' }],
    });
  });

  test('logs a rejected webhook call', async () => {
    const logger = new RecordingLogger();
    const fetchImpl: typeof fetch = async () => new Response('invalid_payload', { status: 400 });

    await new SlackNotificationHandler(settings, app, fetchImpl, logger).handle('X', virusFound, {});

    expect(logger.at('error')[0].context).toEqual({ error_code: 'X', status: 400, body: 'invalid_payload' });
  });
});

describe('RecoveryActionHandler', () => {
  test('runs the named action', async () => {
    const logger = new RecordingLogger();
    const seen: string[] = [];
    const handler = new RecoveryActionHandler(
      {
        retry_upload: (code) => {
          seen.push(code);
          return true;
        },
      },
      logger,
    );
    const config: ErrorConfig = { type: 'error', blocking: 'blocking', recoveryAction: 'retry_upload' };

    expect(handler.shouldHandle(config)).toBe(true);
    await handler.handle('ERROR_DURING_FILE_UPLOAD', config, {});

    expect(seen).toEqual(['ERROR_DURING_FILE_UPLOAD']);
    expect(logger.at('info').map((record) => record.message)).toEqual([
      'Attempting recovery action',
      'Recovery action succeeded',
    ]);
  });

  test('logs unknown actions', async () => {
    const logger = new RecordingLogger();

    await new RecoveryActionHandler({}, logger).handle('X', { type: 'error', blocking: 'not', recoveryAction: 'retry_scan' }, {});

    expect(logger.at('warning')[0]).toEqual({
      level: 'warning',
      message: 'Unknown recovery action',
      context: { action: 'retry_scan', error_code: 'X' },
    });
  });

  test('logs a throwing action', async () => {
    const logger = new RecordingLogger();
    const handler = new RecoveryActionHandler(
      {
        retry_scan: () => {
          throw new Error('scanner offline');
        },
      },
      logger,
    );

    await handler.handle('SCAN_ERROR', { type: 'warning', blocking: 'semi-blocking', recoveryAction: 'retry_scan' }, {});

    expect(logger.at('error')[0].message).toBe('Recovery action threw');
  });
});

describe('ErrorSimulationHandler', () => {
  test('reports whether the code is simulated', () => {
    const logger = new RecordingLogger();
    const conditions = new TestingConditions('testing').setCondition('VIRUS_FOUND', true);
    const handler = new ErrorSimulationHandler(conditions, 'testing', logger);

    handler.handle('VIRUS_FOUND', virusFound, {});
    handler.handle('OTHER', virusFound, {});

    expect(logger.records.map((record) => [record.message, record.context.simulated])).toEqual([
      ['Simulated error handled', true],
      ['Error handled outside simulation', false],
    ]);
  });

  test('is inactive in production', () => {
    const handler = new ErrorSimulationHandler(new TestingConditions('production'), 'production', new RecordingLogger());

    expect(handler.shouldHandle()).toBe(false);
  });
});
