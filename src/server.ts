/**
 * Application entry point for the chat gateway.
 *
 * Builds the container, starts the Express server, then runs the startup
 * checks (model pre-warm, store ping) in the background so a slow or absent
 * backend never delays accepting requests.
 */
import { runStartupChecks } from "@app/startup/startupChecks";
import { config } from "@config/index";
import { describeError, logger } from "@infra/logging/Logger";
import { createHttpApp } from "@interfaces/http/app";

import { buildContainer } from "./container";

const container = buildContainer(config, logger);

const app = createHttpApp({
  chat: container.chat,
  history: container.history,
  health: container.health,
  corsOrigin: config.cors.origin,
  logger,
});

const server = app.listen(config.port, () => {
  logger.log("info", `Server running on http://localhost:${config.port}`, {
    model: config.ollama.model,
    backend: config.ollama.host,
    persistence: container.store.configured,
  });

  void runStartupChecks({
    llm: container.llm,
    store: container.store,
    logger,
  });
});

function shutdown(signal: string): void {
  logger.log("info", "Server shutting down", { signal });

  server.close(() => {
    container
      .dispose()
      .catch((error: unknown) => {
        logger.log("error", "Failed to close database pool", describeError(error));
      })
      .finally(() => process.exit(0));
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
