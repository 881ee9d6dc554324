/**
 * Composition root for a page that uploads files: loads configuration,
 * then wires validator, transport, orchestrator and real-time listener.
 *
 * Usage:
 *   const client = await UploadClient.create({
 *     csrfToken,
 *     pathname: "/uploading/egi",
 *     scanPolicy: { mode: "enabled", continueOnScanError: false, timeoutMs: 60_000 },
 *     connector: createPusherConnector({ key, cluster }),
 *   });
 *   client.startListening();
 *   client.select(files);
 *   const summary = await client.upload();
 */

import { Logger, silentLogger } from "../../engine/observability/logger";
import { ClientUploadConfig, resolveUploadType, UploadConfigLoader } from "./configLoader";
import { RealtimeConnector, RealtimeEventListener, STATUS_LEVEL_BY_KIND } from "./realtimeListener";
import { FetchLike, UploadTransport } from "./upload";
import { UploadOrchestrator } from "./uploadOrchestrator";
import { defaultTransforms } from "./uploadTransforms";
import {
  BatchSummary,
  ProgressUpdate,
  RealtimeUpdate,
  ScanPolicy,
  StatusLevel,
  UploadFile,
  UploadTask,
  UploadType,
} from "./uploadTypes";
import { FileValidator } from "./validation";

export interface UploadClientOptions {
  csrfToken: string;
  /** Page path, used to pick the upload type */
  pathname: string;
  scanPolicy: ScanPolicy;
  baseUrl?: string;
  lang?: string;
  connector?: RealtimeConnector | null;
  maxRetries?: number;
  concurrency?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  onStatus?: (message: string, level: StatusLevel) => void;
  onProgress?: (progress: ProgressUpdate) => void;
  logger?: Logger;
}

export class UploadClient {
  private constructor(
    readonly config: ClientUploadConfig,
    readonly uploadType: UploadType,
    private readonly orchestrator: UploadOrchestrator,
    private readonly listener: RealtimeEventListener,
    private readonly logger: Logger
  ) {}

  static async create(options: UploadClientOptions): Promise<UploadClient> {
    const logger = options.logger ?? silentLogger;
    const onStatus = options.onStatus ?? (() => undefined);

    const loader = new UploadConfigLoader({ baseUrl: options.baseUrl, fetchImpl: options.fetchImpl, logger });
    const [config, limits] = await Promise.all([loader.loadConfig(options.lang), loader.loadLimits()]);

    const validator = new FileValidator({
      allowedExtensions: config.allowedExtensions,
      allowedMimeTypes: config.allowedMimeTypes,
      maxSize: config.maxSize,
      translations: config.translations,
      logger,
    });

    const transport = new UploadTransport({
      csrfToken: options.csrfToken,
      baseUrl: options.baseUrl,
      maxRetries: options.maxRetries,
      transforms: defaultTransforms(),
      fetchImpl: options.fetchImpl,
      sleep: options.sleep,
      logger,
    });

    const orchestrator = new UploadOrchestrator({
      uploader: transport,
      validator,
      endpoints: config.uploadEndpoints,
      scanPolicy: options.scanPolicy,
      limits,
      concurrency: options.concurrency,
      translations: config.translations,
      onStatus,
      onProgress: options.onProgress,
      logger,
    });

    const listener = new RealtimeEventListener({
      connector: options.connector,
      logger,
      onUpdate: (update) => routeUpdate(update, orchestrator, onStatus),
    });

    const uploadType = resolveUploadType(config, options.pathname);
    logger.info("Upload client ready", { uploadType, envMode: config.envMode });

    return new UploadClient(config, uploadType, orchestrator, listener, logger);
  }

  /**
   * Without live updates no scan result can arrive, so scanning is turned
   * off for this page and uploads finish on the HTTP response alone.
   */
  startListening(): boolean {
    const started = this.listener.start();
    if (!started && this.orchestrator.getScanPolicy().mode === "enabled") {
      this.logger.warning("Realtime updates unavailable, uploads continue without scan results");
      this.orchestrator.setScanPolicy({ mode: "disabled" });
    }
    return started;
  }

  select(files: UploadFile[]): UploadTask[] {
    return this.orchestrator.enqueue(files, this.uploadType);
  }

  upload(): Promise<BatchSummary> {
    if (this.orchestrator.getScanPolicy().mode === "enabled" && !this.listener.isListening()) {
      this.startListening();
    }
    return this.orchestrator.uploadAll();
  }

  cancel(): void {
    this.orchestrator.cancel();
  }

  getTasks(): UploadTask[] {
    return this.orchestrator.getTasks();
  }

  dispose(): void {
    this.listener.stop();
  }
}

function routeUpdate(
  update: RealtimeUpdate,
  orchestrator: UploadOrchestrator,
  onStatus: (message: string, level: StatusLevel) => void
): void {
  if (update.message) {
    onStatus(update.message, STATUS_LEVEL_BY_KIND[update.kind]);
  }

  switch (update.kind) {
    case "scanClean":
      orchestrator.reportScanResult("clean", update.fileName);
      break;
    case "scanInfected":
      orchestrator.reportScanResult("infected", update.fileName);
      break;
    case "scanError":
      orchestrator.reportScanResult("error", update.fileName);
      break;
    case "uploadFailed":
      orchestrator.reportUploadFailure(update.fileName, update.message);
      break;
    default:
      break;
  }
}
