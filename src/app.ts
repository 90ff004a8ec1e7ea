// ---------------------------------------------------------------------------
// Application bootstrap: wires clients, breakers and the HTTP app.
// ---------------------------------------------------------------------------

import os from "node:os";
import type { Hono } from "hono";
import type pino from "pino";

import type {
  AppConfig,
  BreakerTransition,
  CacheStore,
  DataStore,
} from "./core/types.js";
import { BreakerState, Dependency } from "./core/types.js";
import type { Clock } from "./core/clock.js";
import type { AppEnv } from "./api/env.js";
import { loadConfig } from "./config/config.js";
import { resolveBreakerConfig } from "./config/breaker-settings.js";
import { createLogger } from "./logging/logger.js";
import { MetricsCollector } from "./metrics/metrics-collector.js";
import { BreakerRegistry } from "./resilience/breaker-registry.js";
import { createGuard } from "./resilience/guarded.js";
import { HealthAggregator } from "./health/health-aggregator.js";
import { ResilientDataAccessor } from "./data/resilient-data-accessor.js";
import { PostgresStore, createPool } from "./clients/postgres-store.js";
import { RedisCache, createRedisClient } from "./clients/redis-cache.js";
import { createApp } from "./api/server.js";

const SERVICE_NAME = "resilient-core";

/** Replacements for the collaborators `buildApp` would otherwise create. */
export interface BuildOverrides {
  store?: DataStore;
  cache?: CacheStore;
  clock?: Clock;
  logger?: pino.Logger;
}

export interface Application {
  app: Hono<AppEnv>;
  config: AppConfig;
  logger: pino.Logger;
  /** Stop the metrics timer and close both dependency clients. */
  shutdown(): Promise<void>;
}

// ── Breaker transition reporting ───────────────────────────────────────────

function reportTransition(
  logger: pino.Logger,
  metrics: MetricsCollector,
  transition: BreakerTransition,
): void {
  metrics.recordBreakerState(transition.name, transition.to);

  const fields = {
    dependency: transition.name,
    from: transition.from,
    to: transition.to,
    failureCount: transition.failureCount,
  };

  if (transition.to === BreakerState.OPEN) {
    logger.error(fields, "circuit breaker opened");
  } else if (transition.to === BreakerState.HALF_OPEN) {
    logger.info(fields, "circuit breaker entering half-open state");
  } else {
    logger.info(fields, "circuit breaker closed");
  }
}

// ── Main ───────────────────────────────────────────────────────────────────

export async function buildApp(
  config: AppConfig = loadConfig(),
  overrides: BuildOverrides = {},
): Promise<Application> {
  // 1. Create logger
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logLevel,
      prettyPrint: config.env === "development",
      redactSecrets: true,
      environment: config.env,
      version: config.version,
    });

  // 2. Create metrics
  const metrics = new MetricsCollector(config.metrics, logger.child({ module: "metrics" }));

  // 3. Create dependency clients
  const store =
    overrides.store ??
    new PostgresStore(createPool(config.store, logger.child({ module: "store" }), metrics));
  const cache =
    overrides.cache ??
    new RedisCache(
      createRedisClient(config.cache, logger.child({ module: "cache" }), metrics),
    );

  // 4. Register one breaker per dependency, then seal the registry
  const breakerLogger = logger.child({ module: "breaker" });
  const registry = new BreakerRegistry({
    clock: overrides.clock,
    onStateChange: (transition) => reportTransition(breakerLogger, metrics, transition),
    logger: breakerLogger,
  });

  const dependencies = [Dependency.STORE, Dependency.CACHE];
  for (const name of dependencies) {
    const breakerConfig = resolveBreakerConfig(config.breakers, name);
    registry.register(name, breakerConfig);
    metrics.recordBreakerState(name, BreakerState.CLOSED);
    breakerLogger.debug({ dependency: name, ...breakerConfig }, "circuit breaker registered");
  }
  registry.seal();

  for (const name of Object.keys(config.breakers.overrides)) {
    if (!registry.has(name)) {
      breakerLogger.warn({ dependency: name }, "breaker override for unknown dependency ignored");
    }
  }

  // 5. Create the guarded components
  const guarded = createGuard(registry, { metrics });

  const aggregator = new HealthAggregator({
    registry,
    guarded,
    probes: {
      [Dependency.STORE]: () => store.ping(),
      [Dependency.CACHE]: () => cache.ping(),
    },
    logger: logger.child({ module: "health" }),
    metrics,
  });

  const accessor = new ResilientDataAccessor({
    guarded,
    store,
    cache,
    cacheTtlSeconds: config.cache.ttlSeconds,
    logger: logger.child({ module: "data" }),
    metrics,
  });

  // 6. Open the cache connection, then report initial connectivity without
  //    touching the breakers
  const [storePing, cachePing] = await Promise.allSettled([
    store.ping(),
    cache.connect().then(() => cache.ping()),
  ]);
  for (const [name, outcome] of [
    [Dependency.STORE, storePing],
    [Dependency.CACHE, cachePing],
  ] as const) {
    if (outcome.status === "fulfilled") {
      logger.info({ dependency: name }, "dependency reachable");
    } else {
      logger.error(
        {
          dependency: name,
          err: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        },
        "dependency unreachable at startup",
      );
    }
  }

  // 7. Create Hono app
  const app = createApp({
    aggregator,
    accessor,
    registry,
    metrics,
    logger,
    service: {
      name: SERVICE_NAME,
      version: config.version,
      environment: config.env,
      node: os.hostname(),
    },
  });

  logger.info(
    {
      port: config.port,
      env: config.env,
      breakers: registry.snapshot().map(({ name, failureThreshold, recoveryTimeoutMs }) => ({
        name,
        failureThreshold,
        recoveryTimeoutMs,
      })),
    },
    `${SERVICE_NAME} ready`,
  );

  const shutdown = async (): Promise<void> => {
    metrics.dispose();

    const closed = await Promise.allSettled([store.close(), cache.close()]);
    closed.forEach((outcome, i) => {
      const dependency = dependencies[i];
      if (outcome.status === "fulfilled") {
        logger.info({ dependency }, "connection closed");
      } else {
        logger.error({ dependency, err: outcome.reason }, "failed to close connection");
      }
    });
  };

  return { app, config, logger, shutdown };
}
