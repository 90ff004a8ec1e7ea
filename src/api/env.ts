// ---------------------------------------------------------------------------
// Hono environment shared by the app, its middleware and its routes.
// ---------------------------------------------------------------------------

import type pino from "pino";

export interface AppEnv {
  Variables: {
    /** Correlation id of the current request. */
    correlationId: string;
    /** Request-scoped child logger. */
    logger: pino.Logger;
  };
}
