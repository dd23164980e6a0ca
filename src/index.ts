/**
 * Server Entry Point
 *
 * Loads the environment and serves the extraction pipeline over HTTP.
 */

import "dotenv/config";
import { createApp } from "./app.js";
import { getDefaultConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { FormExtractionPipeline } from "./pipeline.js";

const config = getDefaultConfig();
const logger = createLogger("Server", config.logLevel);
const VERSION = process.env.APP_VERSION || "local-dev";

const app = createApp(
  () =>
    FormExtractionPipeline.fromConfig(
      config,
      createLogger("Pipeline", config.logLevel),
    ),
  logger,
  VERSION,
);

const server = app.listen(config.port, () => {
  logger.info(`Listening on port ${config.port}`);
  logger.info(`Version: ${VERSION}`);
  logger.info(`ocr.endpoint: ${config.ocr.endpoint || "(unset)"}`);
  logger.info(`ocr.apiVersion: ${config.ocr.apiVersion}`);
  logger.info(`llm.endpoint: ${config.llm.endpoint || "(unset)"}`);
  logger.info(`llm.deployment: ${config.llm.deployment}`);
});

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  server.close(() => {
    logger.info("Shutdown complete");
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection:", reason);
});
