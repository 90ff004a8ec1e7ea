// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { AppEnv } from "./env.js";
import type { Environment } from "../core/types.js";
import type { BreakerRegistry } from "../resilience/breaker-registry.js";
import type { HealthAggregator } from "../health/health-aggregator.js";
import type { ResilientDataAccessor } from "../data/resilient-data-accessor.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";

import { correlationIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { trackRequests } from "./middleware/track-requests.js";
import { createErrorHandler } from "./middleware/error-handler.js";

import { healthRoutes } from "./routes/health.js";
import { dataRoutes } from "./routes/data.js";
import { metricsRoutes } from "./routes/metrics.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface ServiceInfo {
  name: string;
  version: string;
  environment: Environment;
  /** Hostname of this instance. */
  node: string;
}

export interface AppDependencies {
  aggregator: HealthAggregator;
  accessor: ResilientDataAccessor;
  registry: BreakerRegistry;
  metrics: MetricsCollector;
  logger: pino.Logger;
  service: ServiceInfo;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Correlation ID (`X-Correlation-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers, each counted under its endpoint name.
 * 4. Global error handler (maps resilience errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { service, metrics } = deps;
  let requestCount = 0;

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", correlationIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", trackRequests(metrics, "index"), (c) => {
    requestCount++;
    return c.json({
      service: service.name,
      version: service.version,
      environment: service.environment,
      node: service.node,
      timestamp: new Date().toISOString(),
      requestCount,
      status: "operational",
    });
  });

  // Readiness never consults the breakers.
  app.get("/ready", trackRequests(metrics, "ready"), (c) => {
    return c.json({ status: "ready", timestamp: new Date().toISOString() });
  });

  app.route(
    "/health",
    healthRoutes({
      aggregator: deps.aggregator,
      registry: deps.registry,
      metrics,
      node: service.node,
    }),
  );

  app.route("/metrics", metricsRoutes({ metrics }));

  app.route(
    "/api/data",
    dataRoutes({
      accessor: deps.accessor,
      metrics,
      node: service.node,
    }),
  );

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(createErrorHandler({ production: service.environment === "production" }));

  return app;
}
