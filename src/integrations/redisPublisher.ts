import { createClient } from "redis";
import type { RealtimePublisher } from "../services/types";

export type PublishClient = {
  isOpen: boolean;
  connect(): Promise<unknown>;
  publish(channel: string, message: string): Promise<number>;
};

function makeClient(url: string): PublishClient {
  const client = createClient({ url });
  client.on("error", (err: unknown) => console.error("[REDIS] Client error:", err));
  return client;
}

/**
 * Connects on first publish and reuses the connection afterwards.
 */
export function createRedisPublisher(url: string, client: PublishClient = makeClient(url)): RealtimePublisher {
  return {
    async publish(channel, payload) {
      if (!client.isOpen) await client.connect();
      await client.publish(channel, JSON.stringify(payload));
    },
  };
}
