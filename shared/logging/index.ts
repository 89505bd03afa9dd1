/**
 * Structured Logging
 *
 * ```typescript
 * import { initLogger, ConsoleTransport, FileTransport } from "@devicechat/shared/logging";
 *
 * const logger = initLogger({
 *   minLevel: "debug",
 *   component: "server",
 *   transports: [new ConsoleTransport(), new FileTransport({ logDir: "./logs" })]
 * });
 *
 * const queueLog = logger.child({ component: "server.devices.queue" });
 * queueLog.info("Job enqueued", { jobId });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LogContext,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export { Logger, initLogger, getLogger } from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions
} from "./transports/index.js";
