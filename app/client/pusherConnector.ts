import Pusher from "pusher-js";
import { describeError, Logger, silentLogger } from "../../engine/observability/logger";
import { RealtimeChannel, RealtimeConnector } from "./realtimeListener";

export interface PusherSettings {
  key: string;
  cluster: string;
  forceTLS?: boolean;
}

interface ConnectionEvents {
  bind(event: string, callback: (data: unknown) => void): unknown;
}

/**
 * The part of a pusher-js client the connector uses.
 */
export interface PusherClient {
  connection: ConnectionEvents;
  subscribe(channel: string): RealtimeChannel;
  unsubscribe(channel: string): void;
  disconnect(): void;
}

export class PusherConnector implements RealtimeConnector {
  constructor(
    private readonly client: PusherClient,
    private readonly logger: Logger = silentLogger
  ) {
    client.connection.bind("connected", () => {
      this.logger.info("Realtime connection established");
    });
    client.connection.bind("error", (error: unknown) => {
      this.logger.error("Realtime connection error", { error: describeError(error) });
    });
  }

  subscribe(channel: string): RealtimeChannel {
    return this.client.subscribe(channel);
  }

  unsubscribe(channel: string): void {
    this.client.unsubscribe(channel);
  }

  disconnect(): void {
    this.client.disconnect();
  }
}

export function createPusherConnector(settings: PusherSettings, logger: Logger = silentLogger): PusherConnector {
  const client = new Pusher(settings.key, {
    cluster: settings.cluster,
    forceTLS: settings.forceTLS ?? true,
  });
  return new PusherConnector(client, logger);
}
