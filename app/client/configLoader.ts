/**
 * Fetches the upload configuration and negotiated limits from the server.
 */

import { isRecord } from "../../engine/guards";
import { formatSize, UploadLimits } from "../../engine/limits/uploadLimits";
import { describeError, Logger, silentLogger } from "../../engine/observability/logger";
import { isUploadType, UploadType } from "../../engine/uploads/uploadPolicy";
import { FetchLike } from "./upload";

export const CONFIG_PATH = "/api/config";
export const LIMITS_PATH = "/api/system/upload-limits";

const FALLBACK_MAX_FILE_SIZE = 10 * 1024 * 1024;
const FALLBACK_MAX_TOTAL_SIZE = 50 * 1024 * 1024;

/**
 * Used when the limits endpoint is unreachable or answers garbage.
 */
export const FALLBACK_LIMITS: UploadLimits = {
  max_files: 20,
  max_file_size: FALLBACK_MAX_FILE_SIZE,
  max_total_size: FALLBACK_MAX_TOTAL_SIZE,
  max_file_size_formatted: formatSize(FALLBACK_MAX_FILE_SIZE),
  max_total_size_formatted: formatSize(FALLBACK_MAX_TOTAL_SIZE),
  size_margin: 1.1,
};

export interface ClientUploadConfig {
  currentLang: string;
  availableLangs: string[];
  translations: Record<string, string>;
  envMode: string;
  allowedExtensions: string[];
  allowedMimeTypes: string[];
  maxSize: number;
  uploadTypePaths: Record<string, UploadType>;
  uploadEndpoints: Record<UploadType, string>;
  defaultUploadType: UploadType;
}

export class UploadConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UploadConfigError";
  }
}

export interface ConfigLoaderOptions {
  baseUrl?: string;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

const strings = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];

const stringMap = (value: unknown): Record<string, string> => {
  const result: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === "string") {
        result[key] = entry;
      }
    }
  }
  return result;
};

export function parseClientConfig(body: unknown): ClientUploadConfig {
  if (!isRecord(body)) {
    throw new UploadConfigError("Upload configuration must be a JSON object");
  }
  if (typeof body.maxSize !== "number") {
    throw new UploadConfigError("Upload configuration is missing maxSize");
  }
  if (!isUploadType(body.defaultUploadType)) {
    throw new UploadConfigError("Upload configuration has an invalid defaultUploadType");
  }

  const uploadTypePaths: Record<string, UploadType> = {};
  if (isRecord(body.uploadTypePaths)) {
    for (const [path, type] of Object.entries(body.uploadTypePaths)) {
      if (isUploadType(type)) {
        uploadTypePaths[path] = type;
      }
    }
  }

  const endpoints = stringMap(body.uploadEndpoints);
  const endpointFor = (type: UploadType): string => {
    const endpoint = endpoints[type];
    if (endpoint === undefined) {
      throw new UploadConfigError(`Upload configuration has no endpoint for ${type}`);
    }
    return endpoint;
  };

  return {
    currentLang: typeof body.currentLang === "string" ? body.currentLang : "en",
    availableLangs: strings(body.availableLangs),
    translations: stringMap(body.translations),
    envMode: typeof body.envMode === "string" ? body.envMode : "production",
    allowedExtensions: strings(body.allowedExtensions),
    allowedMimeTypes: strings(body.allowedMimeTypes),
    maxSize: body.maxSize,
    uploadTypePaths,
    uploadEndpoints: {
      egi: endpointFor("egi"),
      epp: endpointFor("epp"),
      utility: endpointFor("utility"),
      default: endpointFor("default"),
    },
    defaultUploadType: body.defaultUploadType,
  };
}

export function parseUploadLimits(body: unknown): UploadLimits | null {
  if (
    !isRecord(body) ||
    typeof body.max_files !== "number" ||
    typeof body.max_file_size !== "number" ||
    typeof body.max_total_size !== "number"
  ) {
    return null;
  }

  const limits: UploadLimits = {
    max_files: body.max_files,
    max_file_size: body.max_file_size,
    max_total_size: body.max_total_size,
    max_file_size_formatted:
      typeof body.max_file_size_formatted === "string" ? body.max_file_size_formatted : formatSize(body.max_file_size),
    max_total_size_formatted:
      typeof body.max_total_size_formatted === "string"
        ? body.max_total_size_formatted
        : formatSize(body.max_total_size),
  };
  if (typeof body.size_margin === "number") {
    limits.size_margin = body.size_margin;
  }
  return limits;
}

/**
 * Upload type served by a page: exact path match, else the default.
 */
export function resolveUploadType(config: ClientUploadConfig, pathname: string): UploadType {
  return config.uploadTypePaths[pathname] ?? config.defaultUploadType;
}

export class UploadConfigLoader {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: ConfigLoaderOptions = {}) {
    this.baseUrl = options.baseUrl ?? "";
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws UploadConfigError when the endpoint fails or answers garbage
   */
  async loadConfig(lang?: string): Promise<ClientUploadConfig> {
    const query = lang ? `?lang=${encodeURIComponent(lang)}` : "";
    const response = await this.fetchImpl(`${this.baseUrl}${CONFIG_PATH}${query}`, {
      method: "GET",
      headers: { Accept: "application/json" },
    });

    if (!response.ok) {
      throw new UploadConfigError(`Failed to load upload configuration: HTTP ${response.status}`);
    }

    const config = parseClientConfig(await response.json());
    this.logger.debug("Upload configuration loaded", { lang: config.currentLang, envMode: config.envMode });
    return config;
  }

  /**
   * Never throws; falls back to FALLBACK_LIMITS.
   */
  async loadLimits(): Promise<UploadLimits> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${LIMITS_PATH}`, {
        method: "GET",
        headers: { Accept: "application/json" },
      });
      if (!response.ok) {
        this.logger.warning("Upload limits request failed, using fallback limits", { status: response.status });
        return { ...FALLBACK_LIMITS };
      }

      const limits = parseUploadLimits(await response.json());
      if (!limits) {
        this.logger.warning("Upload limits response malformed, using fallback limits");
        return { ...FALLBACK_LIMITS };
      }
      return limits;
    } catch (error) {
      this.logger.error("Upload limits unavailable, using fallback limits", { error: describeError(error) });
      return { ...FALLBACK_LIMITS };
    }
  }
}
