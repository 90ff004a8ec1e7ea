// ---------------------------------------------------------------------------
// Correlation ID middleware for Hono.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type { AppEnv } from "../env.js";

/** UUIDs and short alphanumeric ids only; nothing that could inject log lines. */
const SAFE_CORRELATION_ID_RE = /^[a-zA-Z0-9_.-]{1,128}$/;

/**
 * Returns a Hono middleware that assigns a correlation ID to every
 * incoming request.
 *
 * A client-supplied `X-Correlation-ID` (or `X-Request-ID`) is reused when it
 * matches a strict format; otherwise a fresh one is generated with
 * `randomUUID()`.  The ID is:
 *
 * 1. Stored on the Hono context as `"correlationId"` for downstream handlers.
 * 2. Echoed back to the client in the `X-Correlation-ID` response header.
 */
export function correlationIdMiddleware(): (
  c: Context<AppEnv>,
  next: Next,
) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const existing = c.req.header("x-correlation-id") ?? c.req.header("x-request-id");

    const correlationId =
      existing && SAFE_CORRELATION_ID_RE.test(existing)
        ? existing
        : randomUUID();

    c.set("correlationId", correlationId);
    c.header("X-Correlation-ID", correlationId);

    await next();
  };
}
