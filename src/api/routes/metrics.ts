// ---------------------------------------------------------------------------
// Metrics snapshot route.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";
import type { MetricsCollector } from "../../metrics/metrics-collector.js";

/** `GET /metrics` -- in-process metrics snapshot as JSON. */
export function metricsRoutes(deps: { metrics: MetricsCollector }): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => {
    if (!deps.metrics.enabled) {
      return c.json({ error: "Metrics are disabled", type: "metrics_disabled" }, 404);
    }
    return c.json(deps.metrics.snapshot());
  });

  return app;
}
