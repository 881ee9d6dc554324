import { readFileSync } from 'fs';
import { join } from 'path';
import { Logger, silentLogger, describeError } from '../observability/logger';

export type Replacements = Record<string, unknown>;

/**
 * Translation lookup. `key` is `<bundle>.<path.inside.bundle>`; a missing
 * key is returned unchanged so callers can detect it.
 */
export interface Translator {
  get(key: string, replace?: Replacements, locale?: string): string;
  has(key: string, locale?: string): boolean;
  getLocale(): string;
}

type Bundle = { [key: string]: string | Bundle };

const isBundle = (value: unknown): value is Bundle =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Replace `:name` placeholders with scalar values. Longer names go first so
 * `:extensions` is not clobbered by `:extension`.
 */
export function substitute(message: string, replace: Replacements = {}): string {
  const keys = Object.keys(replace).sort((a, b) => b.length - a.length);
  let result = message;

  for (const key of keys) {
    const value = replace[key];
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result = result.split(`:${key}`).join(String(value));
    }
  }

  return result;
}

export class JsonTranslator implements Translator {
  private readonly cache = new Map<string, Bundle | null>();

  constructor(
    private readonly langDir: string,
    private readonly locale: string = 'en',
    private readonly fallbackLocale: string = 'en',
    private readonly logger: Logger = silentLogger,
  ) {}

  getLocale(): string {
    return this.locale;
  }

  get(key: string, replace?: Replacements, locale?: string): string {
    const line = this.lookup(key, locale ?? this.locale) ?? this.lookup(key, this.fallbackLocale);
    if (line === undefined) {
      return key;
    }
    return substitute(line, replace);
  }

  has(key: string, locale?: string): boolean {
    return this.lookup(key, locale ?? this.locale) !== undefined;
  }

  /**
   * Flat `{key: line}` view of one bundle, for shipping to clients.
   */
  bundle(name: string, locale?: string): Record<string, string> {
    const flat: Record<string, string> = {};
    const root = this.load(name, locale ?? this.locale) ?? this.load(name, this.fallbackLocale);
    if (!root) {
      return flat;
    }

    const walk = (node: Bundle, prefix: string): void => {
      for (const [key, value] of Object.entries(node)) {
        const path = prefix ? `${prefix}.${key}` : key;
        if (typeof value === 'string') {
          flat[path] = value;
        } else {
          walk(value, path);
        }
      }
    };
    walk(root, '');

    return flat;
  }

  private lookup(key: string, locale: string): string | undefined {
    const [bundleName, ...path] = key.split('.');
    if (!bundleName || path.length === 0) {
      return undefined;
    }

    let node: string | Bundle | undefined = this.load(bundleName, locale) ?? undefined;
    for (const segment of path) {
      if (!isBundle(node)) {
        return undefined;
      }
      node = node[segment];
    }

    return typeof node === 'string' ? node : undefined;
  }

  private load(bundleName: string, locale: string): Bundle | null {
    const cacheKey = `${locale}/${bundleName}`;
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    let bundle: Bundle | null = null;
    try {
      const parsed: unknown = JSON.parse(readFileSync(join(this.langDir, locale, `${bundleName}.json`), 'utf-8'));
      bundle = isBundle(parsed) ? parsed : null;
    } catch (error) {
      this.logger.debug('Translation bundle not loaded', {
        bundle: bundleName,
        locale,
        error: describeError(error),
      });
    }

    this.cache.set(cacheKey, bundle);
    return bundle;
  }
}
