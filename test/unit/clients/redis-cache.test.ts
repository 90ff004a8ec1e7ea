// ---------------------------------------------------------------------------
// Tests for the ioredis-backed cache store against a local RESP server.
// ---------------------------------------------------------------------------

import net from "node:net";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Redis } from "ioredis";

import { RedisCache, createRedisClient } from "../../../src/clients/redis-cache.js";
import { MetricsCollector } from "../../../src/metrics/metrics-collector.js";
import { createTestLogger } from "../../support/fakes.js";

/** Answers every RESP command with `+PONG`. */
function startPongServer(sockets: Set<net.Socket>): Promise<net.Server> {
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("data", (chunk) => {
      const commands = chunk
        .toString("utf-8")
        .split("\r\n")
        .filter((line) => /^\*\d+$/.test(line)).length;
      socket.write("+PONG\r\n".repeat(commands));
    });
  });

  return new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve(server));
  });
}

describe("RedisCache", () => {
  let server: net.Server;
  let sockets: Set<net.Socket>;
  let metrics: MetricsCollector;
  let client: Redis;
  let cache: RedisCache;

  beforeEach(async () => {
    sockets = new Set();
    server = await startPongServer(sockets);

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("expected a TCP address");
    }

    metrics = new MetricsCollector({ enabled: true, reportIntervalMs: 0 });
    client = createRedisClient(
      { host: "127.0.0.1", port: address.port, timeoutMs: 1_000, ttlSeconds: 60 },
      createTestLogger(),
      metrics,
    );
    cache = new RedisCache(client);
  });

  afterEach(async () => {
    client.disconnect();
    for (const socket of sockets) socket.destroy();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });

  it("does not connect until asked", () => {
    expect(client.status).toBe("wait");
    expect(metrics.snapshot().connections).toEqual({ cache: 0 });
  });

  it("serves the first command once connect resolves", async () => {
    await cache.connect();

    await expect(cache.ping()).resolves.toBeUndefined();
    expect(client.status).toBe("ready");
    expect(metrics.snapshot().connections).toEqual({ cache: 1 });
  });

  it("treats a second connect as a no-op", async () => {
    await cache.connect();
    await expect(cache.connect()).resolves.toBeUndefined();
    await expect(cache.ping()).resolves.toBeUndefined();
  });

  it("rejects commands at once while no connection is ready", async () => {
    await expect(cache.ping()).rejects.toThrow(
      "Stream isn't writeable and enableOfflineQueue options is false",
    );
  });

  it("drops a client that never connected", async () => {
    await cache.close();
    expect(client.status).toBe("end");
  });
});
