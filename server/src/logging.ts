/**
 * Logging Setup for the Server
 *
 * Initializes the shared logging system with console + file transports.
 */

import * as path from "path";
import * as os from "os";
import {
  initLogger,
  isLogLevel,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type Logger,
  type LogLevel,
  type LogTransport
} from "@devicechat/shared/logging";

const DEFAULT_LOG_DIR = path.join(os.homedir(), ".devicechat", "server-logs");

export interface LoggingOptions {
  /** Default: LOG_LEVEL, else "debug" in dev and "info" in production */
  minLevel?: LogLevel;
  /** Default: LOG_DIR, else ~/.devicechat/server-logs */
  logDir?: string;
  console?: boolean;
  file?: boolean;
}

let logger: Logger | null = null;

export function initServerLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const envLevel = process.env.LOG_LEVEL;
  const minLevel = options.minLevel ?? (isLogLevel(envLevel) ? envLevel : isDev ? "debug" : "info");

  const transports: LogTransport[] = [];
  if (options.console !== false) {
    transports.push(new ConsoleTransport({ minLevel, prettyPrint: isDev }));
  }
  if (options.file !== false) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir || process.env.LOG_DIR || DEFAULT_LOG_DIR,
      filename: "server",
    }));
  }

  logger = initLogger({ minLevel, component: "server", transports });
  return logger;
}

/**
 * Get the server logger, initializing console-only logging on first use
 * so modules imported before startup still log somewhere.
 */
export function getServerLogger(): Logger {
  if (!logger) {
    logger = initServerLogging({ file: false });
  }
  return logger;
}

/**
 * Create a namespaced logger for a specific component.
 *
 * Modules call this at import time, before index.ts has initialized file
 * logging, so the child is rebuilt whenever the root logger changes.
 */
export function createComponentLogger(component: string): ILogger {
  let root: Logger | null = null;
  let child: ILogger | null = null;
  const current = (): ILogger => {
    const active = getServerLogger();
    if (active !== root || !child) {
      root = active;
      child = active.child({ component: `server.${component}` });
    }
    return child;
  };

  return {
    trace: (message, data) => current().trace(message, data),
    debug: (message, data) => current().debug(message, data),
    info: (message, data) => current().info(message, data),
    warn: (message, data) => current().warn(message, data),
    error: (message, error, data) => current().error(message, error, data),
    fatal: (message, error, data) => current().fatal(message, error, data),
    child: (context) => current().child(context),
    flush: () => current().flush(),
  };
}
