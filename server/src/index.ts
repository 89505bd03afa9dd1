/**
 * Device Chat Bridge Server - Main Entry Point
 *
 * Starts the HTTP API for the dashboard and the polling devices.
 */

import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

// Load .env from project root (ESM compatible)
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../.env") });

import { serve } from "@hono/node-server";
import { initServerLogging } from "./logging.js";
import { loadServerConfig } from "./config.js";
import { DeviceRegistry } from "./devices/registry.js";
import { JobQueue } from "./devices/job-queue.js";
import { createApp } from "./app.js";

const logger = initServerLogging();
const serverConfig = loadServerConfig();

if (!serverConfig.llm.apiKey) {
  logger.warn("No LLM API key set; /api/chat will answer 500 until one is configured", {
    provider: serverConfig.llm.provider,
  });
}

const registry = new DeviceRegistry();
const queue = new JobQueue(registry, { assumeSingleDevice: serverConfig.assumeSingleDevice });
const app = createApp({ config: serverConfig, registry, queue });

// ============================================
// STARTUP
// ============================================

const server = serve({ fetch: app.fetch, port: serverConfig.port, hostname: serverConfig.host }, (info) => {
  logger.info("HTTP API listening", {
    host: serverConfig.host,
    port: info.port,
    provider: serverConfig.llm.provider,
    resultTimeoutSec: serverConfig.deviceResultTimeoutSec,
  });
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info("Shutting down", { signal });
  server.close(() => {
    logger
      .flush()
      .catch((error: unknown) => console.error("Failed to flush logs", error))
      .finally(() => process.exit(0));
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
