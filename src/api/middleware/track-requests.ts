// ---------------------------------------------------------------------------
// Per-endpoint request metrics middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { AppEnv } from "../env.js";
import type { MetricsCollector } from "../../metrics/metrics-collector.js";

/**
 * Count the request and its duration under a fixed `endpoint` label, keyed
 * by method and final status code.  The label is given per route so that
 * path parameters never become metric keys.
 */
export function trackRequests(
  metrics: MetricsCollector,
  endpoint: string,
): (c: Context<AppEnv>, next: Next) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const start = Date.now();

    await next();

    metrics.recordRequest(c.req.method, endpoint, c.res.status, Date.now() - start);
  };
}
