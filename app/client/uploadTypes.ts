/**
 * Type definitions for the client upload pipeline
 */

import { UploadErrorPayload } from "../../engine/uploads/errors";
import { UploadTaskState } from "../../engine/uploads/stateMachine";
import type { UploadType } from "../../engine/uploads/uploadPolicy";

export type { UploadType };

/**
 * A file selected for upload. Bytes are held in memory.
 */
export interface UploadFile {
  name: string;
  /** MIME type as reported by the browser */
  type: string;
  size: number;
  bytes: Uint8Array;
}

/**
 * HTTP response as seen by the transport. `body` is parsed JSON when the
 * server sent JSON, otherwise the raw text.
 */
export interface UploadResponse {
  status: number;
  body: unknown;
}

/**
 * Outcome of one transport call, after all retries.
 *
 * Usage:
 *   const result = await transport.upload(file, "/upload/egi", "egi");
 *   if (!result.success) {
 *     console.error(result.error?.errorCode, "after", result.attempts, "attempts");
 *   }
 */
export interface UploadResult {
  success: boolean;
  error: UploadErrorPayload | null;
  response: UploadResponse | null;
  /** Network attempts actually made */
  attempts: number;
}

export interface ValidationResult {
  isValid: boolean;
  message?: string;
}

export type StatusLevel = "info" | "success" | "warning" | "error";

export type ScanOutcome = "clean" | "infected" | "error" | "timeout";

/**
 * Virus-scan policy. There is deliberately no default: the host decides.
 */
export type ScanPolicy =
  | { mode: "disabled" }
  | { mode: "enabled"; continueOnScanError: boolean; timeoutMs?: number };

export interface UploadTask {
  id: string;
  file: UploadFile;
  uploadType: UploadType;
  state: UploadTaskState;
  attempts: number;
  error?: UploadErrorPayload;
  validationMessage?: string;
  scanOutcome?: ScanOutcome;
  userMessage?: string;
}

export interface BatchSummary {
  total: number;
  finalized: number;
  failed: number;
  cancelled: number;
  invalid: number;
  outcome: "success" | "partial" | "failure" | "cancelled";
}

export interface ProgressUpdate {
  completed: number;
  total: number;
  percent: number;
}

/**
 * Message pushed on the real-time upload channel.
 */
export interface RealtimeUploadEvent {
  state: string;
  message: string;
  fileName?: string;
  progress?: number;
}

export type RealtimeUpdateKind =
  | "info"
  | "scanClean"
  | "scanInfected"
  | "scanError"
  | "uploadFailed";

export interface RealtimeUpdate {
  kind: RealtimeUpdateKind;
  message: string;
  fileName?: string;
  progress?: number;
}
