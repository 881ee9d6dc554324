/**
 * Client-side upload transport: one file, one endpoint, bounded retry with
 * exponential backoff.
 */

import {
  TRANSPORT_ERROR_CODES,
  toUploadErrorPayload,
  UploadErrorPayload,
} from "../../engine/uploads/errors";
import { Logger, silentLogger } from "../../engine/observability/logger";
import { RetryPolicy, TransportFailure } from "../../engine/uploads/retryPolicy";
import { identityTransform, UploadTransform } from "./uploadTransforms";
import { UploadFile, UploadResponse, UploadResult, UploadType } from "./uploadTypes";

export const DEFAULT_UPLOAD_TIMEOUT_MS = 120_000;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface UploadTransportOptions {
  csrfToken: string;
  /** Prefix for relative endpoints */
  baseUrl?: string;
  /** Total attempt ceiling, first attempt included */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  transforms?: Partial<Record<UploadType, UploadTransform>>;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  /** Checked before every attempt */
  isCancelled?: () => boolean;
  logger?: Logger;
}

/**
 * Per-call hooks. `isCancelled` overrides the transport-wide callback.
 */
export interface UploadHooks {
  isCancelled?: () => boolean;
  /** Called once the file is prepared, before the first attempt */
  onTransmit?: () => void;
}

/**
 * Sleep helper for backoff
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class UploadTransport {
  readonly policy: RetryPolicy;
  private readonly csrfToken: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly transforms: Partial<Record<UploadType, UploadTransform>>;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly isCancelled: () => boolean;
  private readonly logger: Logger;

  constructor(options: UploadTransportOptions) {
    this.policy = new RetryPolicy({
      maxRetries: options.maxRetries,
      baseDelayMs: options.baseDelayMs,
      maxDelayMs: options.maxDelayMs,
    });
    this.csrfToken = options.csrfToken;
    this.baseUrl = options.baseUrl ?? "";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS;
    this.transforms = options.transforms ?? {};
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.isCancelled = options.isCancelled ?? (() => false);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Transform, transmit with retries, then verify the accepted response.
   */
  async upload(
    file: UploadFile,
    endpoint: string,
    uploadType: UploadType,
    hooks: UploadHooks = {}
  ): Promise<UploadResult> {
    const transform = this.transformFor(uploadType);

    let prepared: UploadFile;
    try {
      prepared = await transform.prepare(file);
    } catch (transformError) {
      this.logger.error("Upload transform failed", {
        fileName: file.name,
        uploadType,
        reason: describe(transformError),
      });
      return {
        success: false,
        response: null,
        attempts: 0,
        error: {
          message: "Failed to prepare file for upload",
          details: describe(transformError),
          state: "transform",
          errorCode: TRANSPORT_ERROR_CODES.transformFailed,
          blocking: "not",
        },
      };
    }

    hooks.onTransmit?.();
    const result = await this.send(
      endpoint,
      this.buildFormData(prepared, uploadType),
      1,
      hooks.isCancelled ?? this.isCancelled
    );
    if (!result.success || !result.response) {
      return result;
    }

    const verification = transform.verify(result.response);
    if (verification) {
      this.logger.warning("Upload response failed verification", {
        fileName: file.name,
        uploadType,
        errorCode: verification.errorCode,
      });
      return { ...result, success: false, error: verification };
    }

    return result;
  }

  transformFor(uploadType: UploadType): UploadTransform {
    return this.transforms[uploadType] ?? identityTransform;
  }

  buildFormData(file: UploadFile, uploadType: UploadType): FormData {
    const formData = new FormData();
    formData.append("file", new Blob([file.bytes], { type: file.type }), file.name);
    formData.append("_token", this.csrfToken);
    formData.append("uploadType", uploadType);
    return formData;
  }

  /**
   * POST `formData` to `endpoint`, retrying transient failures.
   * `attempt` is 1-indexed.
   */
  async send(
    endpoint: string,
    formData: FormData,
    attempt: number = 1,
    isCancelled: () => boolean = this.isCancelled
  ): Promise<UploadResult> {
    if (isCancelled()) {
      this.logger.info("Upload cancelled before attempt", { endpoint, attempt });
      return {
        success: false,
        response: null,
        attempts: attempt - 1,
        error: {
          message: "Upload cancelled",
          state: "cancelled",
          errorCode: TRANSPORT_ERROR_CODES.cancelled,
          blocking: "not",
        },
      };
    }

    this.logger.debug(`Performing upload to ${endpoint}, attempt ${attempt}/${this.policy.maxRetries}`);

    let response: Response;
    let uploadResponse: UploadResponse;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
        method: "POST",
        headers: {
          "X-CSRF-TOKEN": this.csrfToken,
          Accept: "application/json",
        },
        body: formData,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // A body that breaks mid-read is a network failure too.
      uploadResponse = await readResponse(response);
    } catch (networkError) {
      const retried = await this.retry(endpoint, formData, attempt, isCancelled, {
        kind: "network",
        message: describe(networkError),
      });
      if (retried) {
        return retried;
      }
      return {
        success: false,
        response: null,
        attempts: attempt,
        error: {
          message: "Error during upload request",
          details: describe(networkError),
          state: "network",
          errorCode: TRANSPORT_ERROR_CODES.fetchError,
          blocking: "blocking",
        },
      };
    }

    if (response.ok) {
      return { success: true, error: null, response: uploadResponse, attempts: attempt };
    }

    const retried = await this.retry(endpoint, formData, attempt, isCancelled, {
      kind: "status",
      status: response.status,
    });
    if (retried) {
      return retried;
    }

    return {
      success: false,
      response: uploadResponse,
      attempts: attempt,
      error: toErrorPayload(uploadResponse, response.headers.get("content-type")),
    };
  }

  private async retry(
    endpoint: string,
    formData: FormData,
    attempt: number,
    isCancelled: () => boolean,
    failure: TransportFailure
  ): Promise<UploadResult | null> {
    const decision = this.policy.decide(attempt, failure);
    if (!decision.shouldRetry) {
      this.logger.warning("Upload attempt failed", { endpoint, attempt, reason: decision.reason });
      return null;
    }

    this.logger.info(`Retrying upload, attempt ${attempt + 1}/${this.policy.maxRetries}`, {
      endpoint,
      reason: decision.reason,
      delayMs: decision.delayMs,
    });
    await this.sleep(decision.delayMs);
    return this.send(endpoint, formData, attempt + 1, isCancelled);
  }
}

async function readResponse(response: Response): Promise<UploadResponse> {
  if (response.status === 204) {
    return { status: response.status, body: null };
  }

  const text = await response.text();
  const contentType = response.headers.get("content-type") ?? "";

  if (contentType.includes("application/json")) {
    try {
      return { status: response.status, body: JSON.parse(text) };
    } catch {
      return { status: response.status, body: text };
    }
  }

  return { status: response.status, body: text };
}

function toErrorPayload(response: UploadResponse, contentType: string | null): UploadErrorPayload {
  const isJson = (contentType ?? "").includes("application/json") && typeof response.body !== "string";
  const parsed = isJson ? toUploadErrorPayload(response.body) : null;

  if (parsed) {
    return parsed;
  }

  return {
    message: "Server returned an invalid response",
    details: typeof response.body === "string" ? response.body : JSON.stringify(response.body),
    state: "unknown",
    errorCode: TRANSPORT_ERROR_CODES.unexpectedResponse,
    blocking: "blocking",
  };
}
