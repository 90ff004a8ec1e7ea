// ---------------------------------------------------------------------------
// Redis cache store backed by ioredis.
// ---------------------------------------------------------------------------

import { Redis } from "ioredis";
import type pino from "pino";
import type { CacheConfig, CacheStore } from "../core/types.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";

/**
 * Create an ioredis client that fails commands immediately while the
 * connection is down instead of queueing them, and keeps reconnecting in
 * the background.
 *
 * The client does not connect until {@link RedisCache.connect} is awaited,
 * so the first commands are not rejected while the handshake is in flight.
 * When `metrics` is given, the `cache` connections gauge is 1 while the
 * connection is ready and 0 otherwise.
 */
export function createRedisClient(
  config: CacheConfig,
  logger: pino.Logger,
  metrics?: MetricsCollector,
): Redis {
  const client = new Redis({
    host: config.host,
    port: config.port,
    connectTimeout: config.timeoutMs,
    commandTimeout: config.timeoutMs,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    lazyConnect: true,
  });

  client.on("error", (err: Error) => {
    logger.warn({ err: err.message }, "redis connection error");
  });

  if (metrics) {
    metrics.recordConnections("cache", 0);
    client.on("ready", () => metrics.recordConnections("cache", 1));
    client.on("close", () => metrics.recordConnections("cache", 0));
  }

  return client;
}

export class RedisCache implements CacheStore {
  constructor(private readonly client: Redis) {}

  /** Open the connection and wait until it is ready; no-op once started. */
  async connect(): Promise<void> {
    if (this.client.status === "wait") {
      await this.client.connect();
    }
  }

  get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, "EX", ttlSeconds);
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  /** QUIT when connected; otherwise drop the socket and stop reconnecting. */
  async close(): Promise<void> {
    if (this.client.status !== "ready") {
      this.client.disconnect();
      return;
    }
    await this.client.quit();
  }
}
