// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";
import type { HealthStatus } from "../../core/types.js";
import type { BreakerRegistry } from "../../resilience/breaker-registry.js";
import type { MetricsCollector } from "../../metrics/metrics-collector.js";
import type { HealthAggregator } from "../../health/health-aggregator.js";
import { toStatusCode } from "../../health/health-aggregator.js";
import { trackRequests } from "../middleware/track-requests.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  aggregator: HealthAggregator;
  registry: BreakerRegistry;
  metrics: MetricsCollector;
  /** Hostname reported in responses. */
  node: string;
}

/**
 * Mounts health-check endpoints:
 *
 * - `GET /health`          -- Composite dependency health; 200 or 503.
 * - `GET /health/breakers` -- Current state of every circuit breaker.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /health
  app.get("/", trackRequests(deps.metrics, "health"), async (c) => {
    const verdict = await deps.aggregator.checkHealth();

    const checks: Record<string, HealthStatus> = { service: "healthy" };
    for (const [name, health] of Object.entries(verdict.checks)) {
      checks[name] = health.status;
    }

    return c.json(
      {
        status: verdict.overall,
        timestamp: new Date().toISOString(),
        node: deps.node,
        checks,
        dependencies: verdict.checks,
      },
      toStatusCode(verdict),
    );
  });

  // GET /health/breakers
  app.get("/breakers", trackRequests(deps.metrics, "breakers"), (c) => {
    return c.json({ breakers: deps.registry.snapshot() });
  });

  return app;
}
