/**
 * Drives a batch of files through validate -> transform -> upload -> scan ->
 * finalize with bounded concurrency, cooperative cancellation and scan
 * results that may arrive out of band.
 */

import { v4 as uuidv4 } from "uuid";
import { isRecord } from "../../engine/guards";
import { TRANSPORT_ERROR_CODES, UploadErrorPayload } from "../../engine/uploads/errors";
import { substitute } from "../../engine/i18n/translator";
import { Logger, silentLogger } from "../../engine/observability/logger";
import { UploadTaskState, uploadTaskStateMachine } from "../../engine/uploads/stateMachine";
import { UploadLimits } from "../../engine/limits/uploadLimits";
import { UploadHooks } from "./upload";
import { FileValidator } from "./validation";
import {
  BatchSummary,
  ProgressUpdate,
  ScanOutcome,
  ScanPolicy,
  StatusLevel,
  UploadFile,
  UploadResult,
  UploadTask,
  UploadType,
} from "./uploadTypes";

export const DEFAULT_CONCURRENCY = 2;

export interface Uploader {
  upload(file: UploadFile, endpoint: string, uploadType: UploadType, hooks?: UploadHooks): Promise<UploadResult>;
}

export const ORCHESTRATOR_MESSAGES = {
  upload_started: "Uploading :fileName...",
  upload_success: "The file :fileName was uploaded.",
  upload_failed: "The file :fileName could not be uploaded: :message",
  upload_cancelled: "The upload was cancelled.",
  scan_in_progress: "Scanning :fileName for viruses...",
  scan_clean: "The file :fileName is clean.",
  scan_infected: "The file :fileName is infected.",
  scan_error_continue: "The virus scan for :fileName failed. The file was kept without a scan.",
  scan_error_stop: "The virus scan for :fileName failed. The file was rejected.",
  scan_timeout: "No scan result arrived for :fileName in time.",
  server_failed: "The server could not process :fileName.",
  batch_success: "All files were uploaded.",
  batch_partial: "Some files could not be uploaded.",
  batch_failure: "No file could be uploaded.",
  batch_cancelled: "The upload was cancelled.",
} as const;

type MessageKey = keyof typeof ORCHESTRATOR_MESSAGES;

export interface UploadOrchestratorOptions {
  uploader: Uploader;
  validator: FileValidator;
  endpoints: Record<UploadType, string>;
  scanPolicy: ScanPolicy;
  limits?: UploadLimits | null;
  concurrency?: number;
  translations?: Record<string, string>;
  onStatus?: (message: string, level: StatusLevel) => void;
  onProgress?: (progress: ProgressUpdate) => void;
  logger?: Logger;
}

type ScanWait = ScanOutcome | "abandoned";

const IN_FLIGHT: ReadonlySet<UploadTaskState> = new Set<UploadTaskState>(["transforming", "uploading", "awaiting_scan"]);

export class UploadOrchestrator {
  private readonly uploader: Uploader;
  private readonly validator: FileValidator;
  private readonly endpoints: Record<UploadType, string>;
  private scanPolicy: ScanPolicy;
  private readonly concurrency: number;
  private readonly translations: Record<string, string>;
  private readonly onStatus: (message: string, level: StatusLevel) => void;
  private readonly onProgress: (progress: ProgressUpdate) => void;
  private readonly logger: Logger;
  private readonly limits: UploadLimits | null;

  private tasks: UploadTask[] = [];
  private batchStart = 0;
  private cancelled = false;
  private halted = false;
  // Keyed by task id.
  private readonly scanResults = new Map<string, ScanOutcome>();
  private readonly scanWaiters = new Map<string, (outcome: ScanWait) => void>();

  constructor(options: UploadOrchestratorOptions) {
    this.uploader = options.uploader;
    this.validator = options.validator;
    this.endpoints = options.endpoints;
    this.scanPolicy = options.scanPolicy;
    this.limits = options.limits ?? null;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
    this.translations = options.translations ?? {};
    this.onStatus = options.onStatus ?? (() => undefined);
    this.onProgress = options.onProgress ?? (() => undefined);
    this.logger = options.logger ?? silentLogger;
  }

  getScanPolicy(): ScanPolicy {
    return this.scanPolicy;
  }

  /**
   * Applies to tasks that reach the scan step from now on.
   */
  setScanPolicy(policy: ScanPolicy): void {
    this.scanPolicy = policy;
  }

  getTasks(): UploadTask[] {
    return this.tasks.map((task) => ({ ...task }));
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Create one task per file. Batch limits apply first; a batch failure
   * marks every new task invalid with the same message.
   */
  enqueue(files: UploadFile[], uploadType: UploadType): UploadTask[] {
    const batch = this.validator.validateAgainstLimits(files, this.limits);

    const created = files.map((file): UploadTask => {
      const task: UploadTask = { id: uuidv4(), file, uploadType, state: "queued", attempts: 0 };
      const result = batch.isValid ? this.validator.validate(file) : batch;

      if (!result.isValid) {
        this.transition(task, "invalid");
        task.validationMessage = result.message;
        this.onStatus(result.message ?? file.name, "error");
      }
      return task;
    });

    this.tasks.push(...created);
    this.logger.info("Files enqueued", {
      uploadType,
      count: created.length,
      invalid: created.filter((task) => task.state === "invalid").length,
    });

    return created.map((task) => ({ ...task }));
  }

  /**
   * Upload every queued task. Resolves once all dispatched tasks are terminal.
   * The summary covers the tasks enqueued since the previous call; a cancel or
   * blocking stop from an earlier batch does not carry over.
   */
  async uploadAll(): Promise<BatchSummary> {
    this.cancelled = false;
    this.halted = false;
    const batch = this.tasks.slice(this.batchStart);
    this.batchStart = this.tasks.length;

    const pending = batch.filter((task) => task.state === "queued");
    const total = pending.length;
    let completed = 0;
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < pending.length && !this.cancelled && !this.halted) {
        const task = pending[next++];
        await this.process(task);
        completed++;
        this.onProgress({ completed, total, percent: Math.round((completed / total) * 100) });
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, total) }, () => worker());
    await Promise.all(workers);

    for (const task of pending) {
      if (task.state === "queued") {
        this.transition(task, "cancelled");
      }
    }

    const summary = this.summarize(batch);
    this.onStatus(this.message(`batch_${summary.outcome}` as const, {}), summary.outcome === "success" ? "success" : "warning");
    this.logger.info("Upload batch finished", { ...summary });
    return summary;
  }

  /**
   * Stop new attempts and dispatches. In-flight tasks become cancelled and
   * their later responses are ignored.
   */
  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;

    for (const task of this.tasks) {
      if (IN_FLIGHT.has(task.state)) {
        this.transition(task, "cancelled");
      }
    }

    this.logger.info("Upload batch cancelled");
    this.onStatus(this.message("upload_cancelled", {}), "warning");
  }

  /**
   * Deliver a scan result to every in-flight task named `fileName`, or to
   * every in-flight task when no name is given. Tasks still uploading keep
   * the result until they reach the scan step.
   */
  reportScanResult(outcome: ScanOutcome, fileName?: string): void {
    const targets = this.inFlight(fileName);
    if (targets.length === 0) {
      this.logger.debug("Scan result matches no task in flight", { outcome, fileName });
      return;
    }

    for (const task of targets) {
      const waiter = this.scanWaiters.get(task.id);
      if (waiter) {
        waiter(outcome);
      } else {
        this.scanResults.set(task.id, outcome);
      }
    }
  }

  /**
   * The server gave up on a file after accepting it. Fails every matching
   * in-flight task; a later HTTP response for it is ignored.
   */
  reportUploadFailure(fileName?: string, message?: string): void {
    for (const task of this.inFlight(fileName)) {
      this.failTask(task, {
        message: message || this.message("server_failed", { fileName: task.file.name }),
        errorCode: TRANSPORT_ERROR_CODES.serverFailed,
        state: "server",
        blocking: "not",
      });
    }
  }

  summarize(tasks: ReadonlyArray<UploadTask> = this.tasks): BatchSummary {
    const count = (state: UploadTaskState): number => tasks.filter((task) => task.state === state).length;
    const summary = {
      total: tasks.length,
      finalized: count("finalized"),
      failed: count("failed"),
      cancelled: count("cancelled"),
      invalid: count("invalid"),
    };

    let outcome: BatchSummary["outcome"];
    if (this.cancelled) {
      outcome = "cancelled";
    } else if (summary.finalized === 0) {
      outcome = "failure";
    } else if (summary.finalized === summary.total) {
      outcome = "success";
    } else {
      outcome = "partial";
    }

    return { ...summary, outcome };
  }

  private async process(task: UploadTask): Promise<void> {
    const fileName = task.file.name;
    this.transition(task, "transforming");
    this.onStatus(this.message("upload_started", { fileName }), "info");

    const result = await this.uploader.upload(task.file, this.endpoints[task.uploadType], task.uploadType, {
      isCancelled: () => this.cancelled,
      onTransmit: () => {
        if (task.state === "transforming") {
          this.transition(task, "uploading");
        }
      },
    });

    task.attempts = result.attempts;

    if (uploadTaskStateMachine.isTerminal(task.state)) {
      this.logger.debug("Ignoring response for finished task", { taskId: task.id, state: task.state });
      return;
    }

    if (!result.success) {
      if (result.error?.errorCode === TRANSPORT_ERROR_CODES.cancelled) {
        this.transition(task, "cancelled");
        return;
      }
      this.failTask(task, result.error ?? { message: "Upload failed", errorCode: TRANSPORT_ERROR_CODES.serverFailed });
      return;
    }

    task.userMessage = serverMessage(result.response?.body);

    if (this.scanPolicy.mode === "disabled") {
      this.finalize(task);
      return;
    }

    this.transition(task, "awaiting_scan");
    this.onStatus(this.message("scan_in_progress", { fileName }), "info");

    const outcome = await this.waitForScan(task);
    if (outcome === "abandoned" || uploadTaskStateMachine.isTerminal(task.state)) {
      return;
    }
    this.applyScanOutcome(task, outcome, this.scanPolicy.continueOnScanError);
  }

  private applyScanOutcome(task: UploadTask, outcome: ScanOutcome, continueOnScanError: boolean): void {
    const fileName = task.file.name;
    task.scanOutcome = outcome;

    switch (outcome) {
      case "clean":
        this.onStatus(this.message("scan_clean", { fileName }), "success");
        this.finalize(task);
        return;
      case "infected":
        this.failTask(task, {
          message: this.message("scan_infected", { fileName }),
          errorCode: TRANSPORT_ERROR_CODES.scanInfected,
          state: "scan",
          blocking: "blocking",
        });
        return;
      case "error":
      case "timeout": {
        const prefix = outcome === "timeout" ? this.message("scan_timeout", { fileName }) + " " : "";
        if (continueOnScanError) {
          this.onStatus(prefix + this.message("scan_error_continue", { fileName }), "warning");
          this.finalize(task);
          return;
        }
        this.failTask(task, {
          message: prefix + this.message("scan_error_stop", { fileName }),
          errorCode: TRANSPORT_ERROR_CODES.scanError,
          state: "scan",
          blocking: "not",
        });
        return;
      }
    }
  }

  private waitForScan(task: UploadTask): Promise<ScanWait> {
    const buffered = this.scanResults.get(task.id);
    if (buffered) {
      this.scanResults.delete(task.id);
      return Promise.resolve(buffered);
    }

    const timeoutMs = this.scanPolicy.mode === "enabled" ? this.scanPolicy.timeoutMs : undefined;

    return new Promise<ScanWait>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const settle = (outcome: ScanWait): void => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        this.scanWaiters.delete(task.id);
        resolve(outcome);
      };

      this.scanWaiters.set(task.id, settle);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => settle("timeout"), timeoutMs);
      }
    });
  }

  private finalize(task: UploadTask): void {
    this.transition(task, "finalized");
    this.onStatus(this.message("upload_success", { fileName: task.file.name }), "success");
  }

  private failTask(task: UploadTask, error: UploadErrorPayload): void {
    task.error = error;
    this.transition(task, "failed");
    this.onStatus(
      this.message("upload_failed", { fileName: task.file.name, message: error.userMessage ?? error.message }),
      "error"
    );

    if (error.blocking === "blocking") {
      this.halted = true;
      this.logger.warning("Blocking upload error, stopping batch", {
        taskId: task.id,
        errorCode: error.errorCode,
      });
    }
  }

  private transition(task: UploadTask, to: UploadTaskState): void {
    uploadTaskStateMachine.assertTransition(task.state, to);
    this.logger.debug("Upload task state change", { taskId: task.id, from: task.state, to });
    task.state = to;

    if (uploadTaskStateMachine.isTerminal(to)) {
      this.scanResults.delete(task.id);
      this.scanWaiters.get(task.id)?.("abandoned");
    }
  }

  private inFlight(fileName?: string): UploadTask[] {
    return this.tasks.filter(
      (task) => IN_FLIGHT.has(task.state) && (fileName === undefined || task.file.name === fileName)
    );
  }

  private message(key: MessageKey, replace: Record<string, string>): string {
    return substitute(this.translations[key] ?? ORCHESTRATOR_MESSAGES[key], replace);
  }
}

function serverMessage(body: unknown): string | undefined {
  if (isRecord(body) && typeof body.userMessage === "string") {
    return body.userMessage;
  }
  return undefined;
}
