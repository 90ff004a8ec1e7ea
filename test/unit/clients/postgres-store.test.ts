// ---------------------------------------------------------------------------
// Tests for the pg pool factory's connection gauge and error logging.
// No connection is ever opened: pool events are emitted directly.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type pg from "pg";

import { createPool } from "../../../src/clients/postgres-store.js";
import { MetricsCollector } from "../../../src/metrics/metrics-collector.js";
import { createTestLogger } from "../../support/fakes.js";

const storeConfig = {
  host: "127.0.0.1",
  port: 5432,
  database: "resilient_core",
  user: "resilient",
  password: "test-secret",
  poolMin: 0,
  poolMax: 4,
  statementTimeoutMs: 1_000,
};

describe("createPool", () => {
  let metrics: MetricsCollector;
  let pool: pg.Pool;

  beforeEach(() => {
    metrics = new MetricsCollector({ enabled: true, reportIntervalMs: 0 });
  });

  afterEach(async () => {
    await pool.end();
  });

  it("starts the store connections gauge at zero", () => {
    pool = createPool(storeConfig, createTestLogger(), metrics);
    expect(metrics.snapshot().connections).toEqual({ store: 0 });
  });

  it("tracks clients checked out of the pool", () => {
    pool = createPool(storeConfig, createTestLogger(), metrics);

    pool.emit("acquire", {});
    pool.emit("acquire", {});
    expect(metrics.snapshot().connections).toEqual({ store: 2 });

    pool.emit("release", undefined, {});
    expect(metrics.snapshot().connections).toEqual({ store: 1 });
  });

  it("publishes no gauge without a metrics collector", () => {
    pool = createPool(storeConfig, createTestLogger());
    pool.emit("acquire", {});
    expect(metrics.snapshot().connections).toEqual({});
  });

  it("logs background pool errors", () => {
    const logger = createTestLogger();
    const warn = vi.spyOn(logger, "warn");
    pool = createPool(storeConfig, logger, metrics);

    pool.emit("error", new Error("idle client terminated"), {});

    expect(warn).toHaveBeenCalledWith(
      { err: "idle client terminated" },
      "postgres pool background error",
    );
  });
});
