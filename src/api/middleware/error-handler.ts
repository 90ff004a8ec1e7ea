// ---------------------------------------------------------------------------
// Hono error handler: maps resilience errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import type { AppEnv } from "../env.js";
import {
  CircuitOpenError,
  DependencyUnavailableError,
  RecordNotFoundError,
} from "../../core/errors.js";

export interface ErrorHandlerOptions {
  /** Hide the messages of unexpected errors. */
  production: boolean;
}

/**
 * Create a Hono `onError` handler that inspects the thrown error and returns
 * an appropriate HTTP status code with a JSON body.
 *
 * In production, messages of unexpected errors are replaced with a generic
 * one so that hostnames, SQL and stack details never reach clients.
 *
 * Mapping:
 * - `RecordNotFoundError`         -> 404 Not Found
 * - `DependencyUnavailableError`  -> 503 Service Unavailable
 * - `CircuitOpenError`            -> 503 Service Unavailable + `Retry-After`
 * - Everything else               -> 500 Internal Server Error
 */
export function createErrorHandler(
  options: ErrorHandlerOptions,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err: Error, c: Context<AppEnv>): Response => {
    if (err instanceof RecordNotFoundError) {
      return c.json({ error: err.message, type: "not_found" }, 404);
    }

    if (err instanceof DependencyUnavailableError) {
      return c.json(
        { error: "Service temporarily unavailable", type: "dependency_unavailable" },
        503,
      );
    }

    if (err instanceof CircuitOpenError) {
      const retryAfterSeconds = Math.max(1, Math.ceil(err.retryAfterMs / 1000));
      return c.json(
        { error: "Service temporarily unavailable", type: "circuit_open" },
        { status: 503, headers: { "Retry-After": String(retryAfterSeconds) } },
      );
    }

    c.get("logger")?.error({ err }, "unhandled error");

    const message = options.production ? "Internal server error" : err.message;
    return c.json({ error: message, type: "internal_error" }, 500);
  };
}
