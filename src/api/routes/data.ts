// ---------------------------------------------------------------------------
// Data routes: keyed reads through the resilient accessor.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";
import type { ResilientDataAccessor } from "../../data/resilient-data-accessor.js";
import type { MetricsCollector } from "../../metrics/metrics-collector.js";
import { trackRequests } from "../middleware/track-requests.js";

/** Dependencies required by data routes. */
export interface DataRouteDeps {
  accessor: ResilientDataAccessor;
  metrics: MetricsCollector;
  /** Hostname reported in responses. */
  node: string;
}

const KEY_RE = /^[A-Za-z0-9_.:-]{1,128}$/;

/**
 * Mounts data endpoints:
 *
 * - `GET /api/data/:key` -- Value for `key`, from cache or store.
 *
 * Accessor errors are left to the app's error handler (503 when every path
 * is impaired, 404 when the store has no such key).
 */
export function dataRoutes(deps: DataRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/:key", trackRequests(deps.metrics, "data"), async (c) => {
    const key = c.req.param("key");

    if (!KEY_RE.test(key)) {
      return c.json(
        {
          error: "Keys are 1-128 characters of letters, digits, '_', '.', ':' or '-'",
          type: "invalid_key",
        },
        400,
      );
    }

    const result = await deps.accessor.fetch(key);

    return c.json({
      key: result.key,
      data: result.value,
      source: result.source,
      node: deps.node,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
