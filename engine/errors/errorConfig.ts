import { BlockingLevel, isBlockingLevel } from '../uploads/errors';
import { isRecord } from '../guards';

export type ErrorType = 'critical' | 'error' | 'warning' | 'notice';

export type DisplayMode = 'div' | 'sweet-alert' | 'toast' | 'log-only' | (string & {});

/**
 * Descriptor for one error code.
 */
export interface ErrorConfig {
  type: ErrorType;
  blocking: BlockingLevel;
  devMessageKey?: string;
  userMessageKey?: string;
  devMessage?: string;
  userMessage?: string;
  httpStatusCode?: number;
  displayMode?: DisplayMode;
  notifyEmail?: boolean;
  notifySlack?: boolean;
  recoveryAction?: string;
}

export interface UiSettings {
  defaultDisplayMode: DisplayMode;
  showErrorCodes: boolean;
  genericErrorMessage: string;
}

export interface DatabaseLogSettings {
  enabled: boolean;
  includeTrace: boolean;
  maxTraceLength: number;
}

export interface EmailSettings {
  enabled: boolean;
  to?: string;
  subjectPrefix: string;
  includeContext: boolean;
  includeTrace: boolean;
}

export interface SlackSettings {
  enabled: boolean;
  webhookUrl?: string;
  notifyAllCritical: boolean;
  username: string;
  iconEmoji: string;
  includeContext: boolean;
  contextMaxLength: number;
}

/**
 * Shape of `config/error-manager.json`.
 */
export interface ErrorManagerSettings {
  ui: UiSettings;
  database: DatabaseLogSettings;
  email: EmailSettings;
  slack: SlackSettings;
  fallbackError?: ErrorConfig;
  errors: Record<string, ErrorConfig>;
}

const ERROR_TYPES: ReadonlyArray<ErrorType> = ['critical', 'error', 'warning', 'notice'];

export const isErrorType = (value: unknown): value is ErrorType =>
  ERROR_TYPES.some((type) => type === value);

const optionalString = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
};

/**
 * Validate one catalog entry. Returns an error string instead of throwing so
 * the loader can name the offending code.
 */
export function parseErrorConfig(value: unknown): ErrorConfig | string {
  if (!isRecord(value)) {
    return 'must be an object';
  }

  const record = value;
  const type = record.type ?? 'error';
  const blocking = record.blocking ?? 'blocking';

  if (!isErrorType(type)) {
    return `invalid type '${String(type)}'`;
  }
  if (!isBlockingLevel(blocking)) {
    return `invalid blocking level '${String(blocking)}'`;
  }
  if (record.httpStatusCode !== undefined && typeof record.httpStatusCode !== 'number') {
    return 'httpStatusCode must be a number';
  }

  const config: ErrorConfig = {
    type,
    blocking,
  };

  const devMessageKey = optionalString(record, 'devMessageKey');
  const userMessageKey = optionalString(record, 'userMessageKey');
  const devMessage = optionalString(record, 'devMessage');
  const userMessage = optionalString(record, 'userMessage');
  const displayMode = optionalString(record, 'displayMode');
  const recoveryAction = optionalString(record, 'recoveryAction');

  if (devMessageKey !== undefined) config.devMessageKey = devMessageKey;
  if (userMessageKey !== undefined) config.userMessageKey = userMessageKey;
  if (devMessage !== undefined) config.devMessage = devMessage;
  if (userMessage !== undefined) config.userMessage = userMessage;
  if (displayMode !== undefined) config.displayMode = displayMode;
  if (recoveryAction !== undefined) config.recoveryAction = recoveryAction;
  if (typeof record.httpStatusCode === 'number') config.httpStatusCode = record.httpStatusCode;
  if (typeof record.notifyEmail === 'boolean') config.notifyEmail = record.notifyEmail;
  if (typeof record.notifySlack === 'boolean') config.notifySlack = record.notifySlack;

  return config;
}

/**
 * Static catalog plus runtime definitions. Runtime entries shadow static
 * ones for the same code and are visible to every later lookup.
 */
export class ErrorConfigRegistry {
  private readonly runtime = new Map<string, ErrorConfig>();

  constructor(
    private readonly staticConfigs: Readonly<Record<string, ErrorConfig>>,
    private readonly fallbackConfig?: ErrorConfig,
  ) {}

  get(code: string): ErrorConfig | undefined {
    return this.runtime.get(code) ?? (Object.prototype.hasOwnProperty.call(this.staticConfigs, code)
      ? this.staticConfigs[code]
      : undefined);
  }

  define(code: string, config: ErrorConfig): void {
    this.runtime.set(code, { ...config });
  }

  fallback(): ErrorConfig | undefined {
    return this.fallbackConfig;
  }

  codes(): string[] {
    return Array.from(new Set([...Object.keys(this.staticConfigs), ...this.runtime.keys()])).sort();
  }
}

const bool = (value: unknown, fallback: boolean): boolean => (typeof value === 'boolean' ? value : fallback);
const num = (value: unknown, fallback: number): number => (typeof value === 'number' ? value : fallback);
const str = (value: unknown, fallback: string): string => (typeof value === 'string' ? value : fallback);
const section = (value: unknown): Record<string, unknown> => (isRecord(value) ? value : {});

/**
 * Parse the error-manager settings file. Unknown or malformed catalog
 * entries throw with the offending code in the message.
 */
export function parseErrorManagerSettings(raw: unknown): ErrorManagerSettings {
  if (!isRecord(raw)) {
    throw new Error('Error manager settings must be a JSON object');
  }

  const ui = section(raw.ui);
  const database = section(raw.database);
  const email = section(raw.email);
  const slack = section(raw.slack);

  const errors: Record<string, ErrorConfig> = {};
  for (const [code, entry] of Object.entries(section(raw.errors))) {
    const parsed = parseErrorConfig(entry);
    if (typeof parsed === 'string') {
      throw new Error(`Invalid error config for ${code}: ${parsed}`);
    }
    errors[code] = parsed;
  }

  let fallbackError: ErrorConfig | undefined;
  if (raw.fallbackError !== undefined) {
    const parsed = parseErrorConfig(raw.fallbackError);
    if (typeof parsed === 'string') {
      throw new Error(`Invalid fallbackError config: ${parsed}`);
    }
    fallbackError = parsed;
  }

  return {
    ui: {
      defaultDisplayMode: str(ui.defaultDisplayMode, 'div'),
      showErrorCodes: bool(ui.showErrorCodes, false),
      genericErrorMessage: str(ui.genericErrorMessage, 'errors.generic_error'),
    },
    database: {
      enabled: bool(database.enabled, true),
      includeTrace: bool(database.includeTrace, false),
      maxTraceLength: num(database.maxTraceLength, 10000),
    },
    email: {
      enabled: bool(email.enabled, false),
      to: typeof email.to === 'string' ? email.to : undefined,
      subjectPrefix: str(email.subjectPrefix, '[ERROR] '),
      includeContext: bool(email.includeContext, true),
      includeTrace: bool(email.includeTrace, false),
    },
    slack: {
      enabled: bool(slack.enabled, false),
      webhookUrl: typeof slack.webhookUrl === 'string' ? slack.webhookUrl : undefined,
      notifyAllCritical: bool(slack.notifyAllCritical, true),
      username: str(slack.username, 'Error Bot'),
      iconEmoji: str(slack.iconEmoji, ':boom:'),
      includeContext: bool(slack.includeContext, true),
      contextMaxLength: num(slack.contextMaxLength, 1500),
    },
    fallbackError,
    errors,
  };
}
