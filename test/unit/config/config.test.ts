// ---------------------------------------------------------------------------
// Tests for the environment configuration loader.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeAll, afterAll } from "vitest";

import { loadConfig } from "../../../src/config/config.js";
import { ConfigurationError } from "../../../src/core/errors.js";

describe("loadConfig", () => {
  let dir: string;
  let missingFile: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "resilient-config-"));
    missingFile = path.join(dir, "absent.yaml");
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("applies defaults to an empty environment", () => {
    const config = loadConfig({ BREAKERS_CONFIG: missingFile });

    expect(config.env).toBe("production");
    expect(config.port).toBe(5000);
    expect(config.logLevel).toBe("info");
    expect(config.version).toBe("1.0.0");
    expect(config.store).toEqual({
      host: "postgres",
      port: 5432,
      database: "resilient_core",
      user: "resilient",
      password: undefined,
      poolMin: 2,
      poolMax: 10,
      statementTimeoutMs: 5000,
    });
    expect(config.cache).toEqual({
      host: "redis",
      port: 6379,
      timeoutMs: 5000,
      ttlSeconds: 60,
    });
    expect(config.breakers).toEqual({
      defaults: { failureThreshold: 5, recoveryTimeoutMs: 30_000 },
      overrides: {},
    });
    expect(config.metrics).toEqual({ enabled: true, reportIntervalMs: 60_000 });
  });

  it("coerces numeric and boolean variables", () => {
    const config = loadConfig({
      BREAKERS_CONFIG: missingFile,
      PORT: "8080",
      BREAKER_FAILURE_THRESHOLD: "3",
      BREAKER_RECOVERY_TIMEOUT_MS: "10000",
      METRICS_ENABLED: "false",
      DB_PASSWORD: "test-secret",
    });

    expect(config.port).toBe(8080);
    expect(config.breakers.defaults).toEqual({ failureThreshold: 3, recoveryTimeoutMs: 10_000 });
    expect(config.metrics.enabled).toBe(false);
    expect(config.store.password).toBe("test-secret");
  });

  it("takes the environment from NODE_ENV only when it is a known one", () => {
    expect(loadConfig({ BREAKERS_CONFIG: missingFile, NODE_ENV: "development" }).env).toBe(
      "development",
    );
    expect(loadConfig({ BREAKERS_CONFIG: missingFile, NODE_ENV: "test" }).env).toBe(
      "production",
    );
    expect(
      loadConfig({ BREAKERS_CONFIG: missingFile, NODE_ENV: "development", ENVIRONMENT: "staging" })
        .env,
    ).toBe("staging");
  });

  it("reports every invalid variable", () => {
    const load = () =>
      loadConfig({ BREAKERS_CONFIG: missingFile, PORT: "abc", BREAKER_FAILURE_THRESHOLD: "0" });

    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow(/^Invalid configuration: PORT: .+; BREAKER_FAILURE_THRESHOLD: /);
  });

  it("rejects a pool minimum above the maximum", () => {
    expect(() =>
      loadConfig({ BREAKERS_CONFIG: missingFile, DB_POOL_MIN: "12", DB_POOL_MAX: "4" }),
    ).toThrow("Invalid configuration: DB_POOL_MIN (12) exceeds DB_POOL_MAX (4)");
  });

  it("loads per-dependency overrides from the breakers file", () => {
    const file = path.join(dir, "breakers.yaml");
    fs.writeFileSync(file, "breakers:\n  cache:\n    recoveryTimeoutMs: 15000\n");

    const config = loadConfig({ BREAKERS_CONFIG: file });
    expect(config.breakers.overrides).toEqual({ cache: { recoveryTimeoutMs: 15000 } });
  });
});
