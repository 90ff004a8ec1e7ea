// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint (for deployment).
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";
import { buildApp } from "./app.js";

const { app, config, logger, shutdown } = await buildApp();

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
    hostname: "0.0.0.0",
  },
  (info) => {
    logger.info({ port: info.port, env: config.env }, "http server listening");
  },
);

let stopping = false;

function stop(signal: NodeJS.Signals): void {
  if (stopping) return;
  stopping = true;

  logger.info({ signal }, "received signal, shutting down gracefully");

  server.close((err) => {
    if (err) {
      logger.error({ err }, "http server did not close cleanly");
    }
    shutdown().then(
      () => process.exit(0),
      (shutdownErr: unknown) => {
        logger.error({ err: shutdownErr }, "shutdown failed");
        process.exit(1);
      },
    );
  });
}

process.on("SIGTERM", stop);
process.on("SIGINT", stop);
