// ---------------------------------------------------------------------------
// Request-scoped logging middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type pino from "pino";
import type { AppEnv } from "../api/env.js";

/**
 * Creates a Hono middleware that attaches a request-scoped child logger
 * to every incoming request context.
 *
 * The child logger carries `correlationId`, `method`, and `path` as bindings
 * so that every log line within a request includes correlation data.
 * Must run after the correlation ID middleware.
 *
 * Downstream handlers access the logger via `c.get("logger")`.
 */
export function createRequestLogger(
  baseLogger: pino.Logger,
): (c: Context<AppEnv>, next: Next) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const childLogger = baseLogger.child({
      correlationId: c.get("correlationId"),
      method: c.req.method,
      path: c.req.path,
    });

    c.set("logger", childLogger);

    const start = Date.now();
    childLogger.debug("request started");

    await next();

    const durationMs = Date.now() - start;
    childLogger.info({ durationMs, status: c.res.status }, "request completed");
  };
}
