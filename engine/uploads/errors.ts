import { isRecord } from '../guards';

export type BlockingLevel = 'blocking' | 'semi-blocking' | 'not';

const BLOCKING_LEVELS: ReadonlyArray<BlockingLevel> = ['blocking', 'semi-blocking', 'not'];

export const isBlockingLevel = (value: unknown): value is BlockingLevel =>
  BLOCKING_LEVELS.some((level) => level === value);

/**
 * Error body returned by an upload endpoint, or synthesized by the client
 * when the server did not answer with one.
 */
export interface UploadErrorPayload {
  message: string;
  userMessage?: string;
  details?: string;
  state?: string;
  errorCode: string;
  blocking?: BlockingLevel;
}

export const TRANSPORT_ERROR_CODES = {
  unexpectedResponse: 'unexpected_response',
  fetchError: 'fetch_error',
  invalidToken: 'invalid_token',
  transformFailed: 'transform_error',
  cancelled: 'cancelled',
  scanInfected: 'virus_found',
  scanError: 'scan_error',
  serverFailed: 'upload_failed',
} as const;

/**
 * Narrow a parsed JSON body into an UploadErrorPayload, or null when it does
 * not carry the expected fields.
 */
export function toUploadErrorPayload(body: unknown): UploadErrorPayload | null {
  if (!isRecord(body)) {
    return null;
  }

  const record = body;
  const message = typeof record.message === 'string' ? record.message : undefined;
  const errorCode =
    typeof record.errorCode === 'string'
      ? record.errorCode
      : typeof record.error_code === 'string'
        ? record.error_code
        : undefined;

  if (message === undefined && errorCode === undefined) {
    return null;
  }

  const payload: UploadErrorPayload = {
    message: message ?? errorCode ?? 'Upload failed',
    errorCode: errorCode ?? 'upload_failed',
  };

  if (typeof record.userMessage === 'string') {
    payload.userMessage = record.userMessage;
  } else if (typeof record.user_message === 'string') {
    payload.userMessage = record.user_message;
  }
  if (typeof record.details === 'string') {
    payload.details = record.details;
  }
  if (typeof record.state === 'string') {
    payload.state = record.state;
  }
  if (isBlockingLevel(record.blocking)) {
    payload.blocking = record.blocking;
  }

  return payload;
}
