import { readFileSync } from 'fs';
import { join } from 'path';
import { ErrorManagerSettings, parseErrorManagerSettings } from '../engine/errors/errorConfig';
import { LimitCeilings } from '../engine/limits/uploadLimits';
import { isLogLevel, LogLevel } from '../engine/observability/logger';
import { parseUploadPolicy, UploadPolicy } from '../engine/uploads/uploadPolicy';

export type ServiceEnv = 'local' | 'development' | 'testing' | 'staging' | 'production';

const SERVICE_ENVS: ReadonlyArray<ServiceEnv> = ['local', 'development', 'testing', 'staging', 'production'];

const isServiceEnv = (value: string): value is ServiceEnv => SERVICE_ENVS.some((env) => env === value);

export interface Config {
  appName: string;
  serviceEnv: ServiceEnv;
  port: number;
  locale: string;
  logLevel: LogLevel;
  platformLimits: LimitCeilings;
  uploadPolicy: UploadPolicy;
  errorManager: ErrorManagerSettings;
  langDir: string;
}

export class ConfigLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

const ROOT_DIR = join(__dirname, '..');

type Env = Record<string, string | undefined>;

export class ConfigProvider {
  private config: Config | null = null;

  constructor(
    private readonly env: Env = process.env,
    private readonly rootDir: string = ROOT_DIR,
  ) {}

  load(): Config {
    if (this.config) {
      return this.config;
    }

    const serviceEnv = this.getEnv('SERVICE_ENV', 'local');
    if (!isServiceEnv(serviceEnv)) {
      throw new ConfigLoadError(
        `Invalid SERVICE_ENV: "${serviceEnv}". Supported: ${SERVICE_ENVS.join(', ')}`,
      );
    }

    const logLevel = this.getEnv('LOG_LEVEL', 'debug');
    if (!isLogLevel(logLevel)) {
      throw new ConfigLoadError(`Invalid LOG_LEVEL: "${logLevel}"`);
    }

    const errorManager = this.readJson('config/error-manager.json', parseErrorManagerSettings);
    this.applyNotificationEnv(errorManager);

    this.config = {
      appName: this.getEnv('APP_NAME', 'upload-manager'),
      serviceEnv,
      port: this.getInt('PORT', 3000),
      locale: this.getEnv('APP_LOCALE', 'en'),
      logLevel,
      platformLimits: {
        maxTotalSize: this.getEnv('PLATFORM_POST_MAX_SIZE', '8M'),
        maxFileSize: this.getEnv('PLATFORM_UPLOAD_MAX_FILESIZE', '2M'),
        maxFiles: this.getInt('PLATFORM_MAX_FILE_UPLOADS', 20),
      },
      uploadPolicy: this.readJson('config/upload-manager.json', parseUploadPolicy),
      errorManager,
      langDir: join(this.rootDir, 'resources', 'lang'),
    };

    return this.config;
  }

  private getEnv(key: string, defaultValue?: string): string {
    const value = this.env[key];
    if (!value && !defaultValue) {
      throw new ConfigLoadError(`Missing required environment variable: ${key}`);
    }
    return value || defaultValue || '';
  }

  private getInt(key: string, defaultValue: number): number {
    const raw = this.env[key];
    if (!raw) {
      return defaultValue;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigLoadError(`Invalid ${key}: "${raw}" is not a positive integer`);
    }
    return value;
  }

  private applyNotificationEnv(settings: ErrorManagerSettings): void {
    const slackWebhook = this.env.ERROR_SLACK_WEBHOOK_URL;
    if (slackWebhook) {
      settings.slack.webhookUrl = slackWebhook;
      settings.slack.enabled = this.env.ERROR_SLACK_ENABLED !== 'false';
    }

    const emailTo = this.env.ERROR_EMAIL_TO;
    if (emailTo) {
      settings.email.to = emailTo;
      settings.email.enabled = this.env.ERROR_EMAIL_ENABLED !== 'false';
    }
  }

  private readJson<T>(relativePath: string, parse: (raw: unknown) => T): T {
    const path = join(this.rootDir, relativePath);
    try {
      return parse(JSON.parse(readFileSync(path, 'utf-8')));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigLoadError(`Failed to load ${relativePath}: ${reason}`);
    }
  }
}

export const configProvider = new ConfigProvider();

export function getConfig(): Config {
  return configProvider.load();
}
