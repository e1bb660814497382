import type { Server } from "node:http";
import { parseEnv } from "@docrag/config";
import { createLogger, redactSecrets } from "@docrag/logger";
import { initialize } from "@docrag/core";
import { createApp } from "./app.js";
import { createServices } from "./container.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, env: config.nodeEnv, service: "docrag-api" });
  logger.debug({ config: redactSecrets(config) }, "Configuration loaded");

  const services = createServices(config, logger);
  await initialize({ vectorStore: services.vectorStore, logger });

  const app = createApp(services);
  const server: Server = app.listen(config.port, () => {
    logger.info({ port: config.port, vectorStore: config.vectorStore.type }, "API listening");
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutting down");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info("Server closed");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  createLogger({ service: "docrag-api", env: "production" }).fatal({ err }, "Fatal error during startup");
  process.exit(1);
});
