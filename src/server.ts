// src/server.ts
//
// HTTP entrypoint: builds the runtime from the environment and serves the
// app from http/app.ts until SIGINT/SIGTERM.

import { loadConfig } from "./config";
import { createApp } from "./http/app";
import { createLogger, errorMessage } from "./infra/logger";
import { buildRuntime } from "./runtime";

const log = createLogger("server");

// ----------------- Start server -----------------

if (require.main === module) {
  const config = loadConfig();
  const rt = buildRuntime(config);
  const server = createApp(rt).listen(config.port, () => {
    log.info("server started", { port: config.port, store: config.store.driver });
  });

  const shutdown = (signal: string): void => {
    log.info("shutdown requested", { signal });
    server.close(() => {
      rt.store
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error("shutdown error", { error: errorMessage(err) });
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}
