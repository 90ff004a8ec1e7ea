// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with defaults, validated with Zod.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_BREAKERS_FILE, loadBreakerOverrides } from "./breaker-settings.js";

const flag = z
  .enum(["true", "false"])
  .default("true")
  .transform((v) => v === "true");

const ENVIRONMENTS = ["development", "staging", "production"] as const;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const EnvSchema = z.object({
  ENVIRONMENT: z.enum(ENVIRONMENTS).default("production"),
  PORT: positiveInt(5000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  APP_VERSION: z.string().min(1).default("1.0.0"),

  DB_HOST: z.string().min(1).default("postgres"),
  DB_PORT: positiveInt(5432),
  DB_NAME: z.string().min(1).default("resilient_core"),
  DB_USER: z.string().min(1).default("resilient"),
  DB_PASSWORD: z.string().optional(),
  DB_POOL_MIN: z.coerce.number().int().nonnegative().default(2),
  DB_POOL_MAX: positiveInt(10),
  DB_STATEMENT_TIMEOUT_MS: positiveInt(5_000),

  REDIS_HOST: z.string().min(1).default("redis"),
  REDIS_PORT: positiveInt(6379),
  REDIS_TIMEOUT_MS: positiveInt(5_000),
  CACHE_TTL_SECONDS: positiveInt(60),

  BREAKER_FAILURE_THRESHOLD: positiveInt(5),
  BREAKER_RECOVERY_TIMEOUT_MS: positiveInt(30_000),
  BREAKERS_CONFIG: z.string().min(1).default(DEFAULT_BREAKERS_FILE),

  METRICS_ENABLED: flag,
  METRICS_REPORT_INTERVAL_MS: z.coerce.number().int().nonnegative().default(60_000),
});

/**
 * Load the application configuration from environment variables.
 *
 * Every setting except the database password has a default, so the service
 * starts with zero configuration next to `postgres` and `redis` hosts.
 * `ENVIRONMENT` falls back to `NODE_ENV` when that names an environment.
 * Per-dependency breaker overrides are read from `BREAKERS_CONFIG`
 * (default `config/breakers.yaml`).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = ENVIRONMENTS.find((name) => name === env["NODE_ENV"]);
  const parsed = EnvSchema.safeParse({
    ...env,
    ENVIRONMENT: env["ENVIRONMENT"] ?? nodeEnv,
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`, {
      cause: parsed.error,
    });
  }

  const e = parsed.data;

  if (e.DB_POOL_MIN > e.DB_POOL_MAX) {
    throw new ConfigurationError(
      `Invalid configuration: DB_POOL_MIN (${e.DB_POOL_MIN}) exceeds DB_POOL_MAX (${e.DB_POOL_MAX})`,
    );
  }

  return {
    env: e.ENVIRONMENT,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    version: e.APP_VERSION,

    store: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      poolMin: e.DB_POOL_MIN,
      poolMax: e.DB_POOL_MAX,
      statementTimeoutMs: e.DB_STATEMENT_TIMEOUT_MS,
    },

    cache: {
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      timeoutMs: e.REDIS_TIMEOUT_MS,
      ttlSeconds: e.CACHE_TTL_SECONDS,
    },

    breakers: {
      defaults: {
        failureThreshold: e.BREAKER_FAILURE_THRESHOLD,
        recoveryTimeoutMs: e.BREAKER_RECOVERY_TIMEOUT_MS,
      },
      overrides: loadBreakerOverrides(e.BREAKERS_CONFIG),
    },

    metrics: {
      enabled: e.METRICS_ENABLED,
      reportIntervalMs: e.METRICS_REPORT_INTERVAL_MS,
    },
  };
}
