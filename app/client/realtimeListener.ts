/**
 * Listens to server-pushed upload events and turns them into updates the
 * orchestrator and status line understand.
 */

import { isRecord } from "../../engine/guards";
import { describeError, Logger, silentLogger } from "../../engine/observability/logger";
import { RealtimeUpdate, RealtimeUpdateKind, RealtimeUploadEvent, StatusLevel } from "./uploadTypes";

export const UPLOAD_CHANNEL = "upload";
export const DEFAULT_UPLOAD_EVENT = "TestUploadEvent12345";

export type EventCallback = (data: unknown) => void;

export interface RealtimeChannel {
  bind(event: string, callback: EventCallback): unknown;
  unbind(event?: string, callback?: EventCallback): unknown;
}

/**
 * Minimal surface of a pub/sub client.
 */
export interface RealtimeConnector {
  subscribe(channel: string): RealtimeChannel;
  unsubscribe(channel: string): void;
}

export interface RealtimeListenerOptions {
  connector: RealtimeConnector | null | undefined;
  onUpdate: (update: RealtimeUpdate) => void;
  channel?: string;
  eventName?: string;
  logger?: Logger;
}

const KIND_BY_STATE: ReadonlyMap<string, RealtimeUpdateKind> = new Map<string, RealtimeUpdateKind>([
  ["virusScan", "info"],
  ["allFileScannedNotInfected", "scanClean"],
  ["allFileScannedSomeInfected", "scanInfected"],
  ["endVirusScan", "scanError"],
  ["uploadFailed", "uploadFailed"],
]);

export const STATUS_LEVEL_BY_KIND: Record<RealtimeUpdateKind, StatusLevel> = {
  info: "info",
  scanClean: "success",
  scanInfected: "warning",
  scanError: "warning",
  uploadFailed: "error",
};

export function parseUploadEvent(data: unknown): RealtimeUploadEvent | null {
  if (!isRecord(data) || typeof data.state !== "string") {
    return null;
  }

  const event: RealtimeUploadEvent = {
    state: data.state,
    message: typeof data.message === "string" ? data.message : "",
  };
  if (typeof data.fileName === "string") {
    event.fileName = data.fileName;
  }
  if (typeof data.progress === "number") {
    event.progress = data.progress;
  }
  return event;
}

/**
 * Unknown states map to plain info.
 */
export function toRealtimeUpdate(event: RealtimeUploadEvent): RealtimeUpdate {
  const update: RealtimeUpdate = {
    kind: KIND_BY_STATE.get(event.state) ?? "info",
    message: event.message,
  };
  if (event.fileName !== undefined) {
    update.fileName = event.fileName;
  }
  if (event.progress !== undefined) {
    update.progress = event.progress;
  }
  return update;
}

export class RealtimeEventListener {
  private readonly channelName: string;
  private readonly eventName: string;
  private readonly logger: Logger;
  private channel: RealtimeChannel | null = null;

  private readonly handler: EventCallback = (data) => {
    const event = parseUploadEvent(data);
    if (!event) {
      this.logger.warning("Ignoring malformed upload event", { event: this.eventName });
      return;
    }
    this.logger.debug("Upload event received", { state: event.state, fileName: event.fileName });
    this.options.onUpdate(toRealtimeUpdate(event));
  };

  constructor(private readonly options: RealtimeListenerOptions) {
    this.channelName = options.channel ?? UPLOAD_CHANNEL;
    this.eventName = options.eventName ?? DEFAULT_UPLOAD_EVENT;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Returns false when no transport is available; the page keeps working
   * without live updates.
   */
  start(): boolean {
    if (this.channel) {
      return true;
    }

    const connector = this.options.connector;
    if (!connector) {
      this.logger.error("Realtime connector is not initialized");
      return false;
    }

    try {
      const channel = connector.subscribe(this.channelName);
      channel.bind(this.eventName, this.handler);
      this.channel = channel;
    } catch (error) {
      this.logger.error("Realtime subscription failed", {
        channel: this.channelName,
        error: describeError(error),
      });
      return false;
    }

    this.logger.info("Listening for upload events", { channel: this.channelName, event: this.eventName });
    return true;
  }

  stop(): void {
    if (!this.channel || !this.options.connector) {
      return;
    }
    this.channel.unbind(this.eventName, this.handler);
    this.options.connector.unsubscribe(this.channelName);
    this.channel = null;
  }

  isListening(): boolean {
    return this.channel !== null;
  }
}
