import { isRecord } from '../guards';

export const DEFAULT_SENSITIVE_KEYS: ReadonlyArray<string> = [
  'password',
  'secret',
  'token',
  'auth',
  'key',
  'credentials',
  'authorization',
  'credit_card',
  'cvv',
  'api_key',
];

const SENSITIVE_FRAGMENTS: ReadonlyArray<string> = ['password', 'secret', 'token', '_key'];

export const REDACTED = '[REDACTED]';
const TRUNCATION_MARKER = '...[TRUNCATED]';

export interface SanitizeOptions {
  sensitiveKeys?: ReadonlyArray<string>;
  maxStringLength?: number;
}

export function sanitizeString(value: string, maxLength = 500): string {
  let result = value;
  if (result.length > maxLength) {
    result = result.slice(0, Math.max(0, maxLength - 16)) + TRUNCATION_MARKER;
  }
  return result.split('\0').join('');
}

const isSensitiveKey = (key: string, sensitiveKeys: ReadonlyArray<string>): boolean => {
  const lower = key.toLowerCase();
  return sensitiveKeys.includes(lower) || SENSITIVE_FRAGMENTS.some((fragment) => lower.includes(fragment));
};

function sanitizeValue(value: unknown, options: Required<SanitizeOptions>): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value, options.maxStringLength);
  }
  if (value === null || typeof value === 'number' || typeof value === 'boolean' || value === undefined) {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item, options));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return `[Object:${value.name}]`;
  }
  if (isRecord(value) && Object.getPrototypeOf(value) === Object.prototype) {
    return sanitizeRecord(value, options);
  }
  if (typeof value === 'object') {
    return `[Object:${value.constructor?.name ?? 'Object'}]`;
  }
  return `[Unloggable Type:${typeof value}]`;
}

function sanitizeRecord(
  context: Record<string, unknown>,
  options: Required<SanitizeOptions>,
): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(context)) {
    sanitized[key] = isSensitiveKey(key, options.sensitiveKeys) ? REDACTED : sanitizeValue(value, options);
  }

  return sanitized;
}

/**
 * Copy of `context` safe to persist or send to a third party: sensitive keys
 * are redacted at every depth, long strings truncated, NUL bytes dropped.
 */
export function sanitizeContext(
  context: Record<string, unknown>,
  options: SanitizeOptions = {},
): Record<string, unknown> {
  return sanitizeRecord(context, {
    sensitiveKeys: (options.sensitiveKeys ?? DEFAULT_SENSITIVE_KEYS).map((key) => key.toLowerCase()),
    maxStringLength: options.maxStringLength ?? 500,
  });
}
