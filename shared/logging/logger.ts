/**
 * Core Logger
 *
 * Structured entries fanned out to every transport whose level admits them.
 * Child loggers share transports and carry extra context.
 */

import {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type ILogger,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
  type LogLevel
} from "./types.js";

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];
  private readonly context: Omit<LogContext, "component">;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.context = { ...config.defaultContext };
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
    };
    if (this.context.correlationId) entry.correlationId = this.context.correlationId;
    if (this.context.deviceId) entry.deviceId = this.context.deviceId;
    if (data) entry.data = this.redact(data);
    if (error !== undefined) entry.error = describeError(error);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        transport.log(entry);
      } catch (e) {
        console.error(`[Logger] Transport ${transport.name} failed:`, e);
      }
    }
  }

  /** Replace sensitive keys at any depth of plain objects. */
  redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some((pattern) => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  child(context: LogContext): ILogger {
    const { component, ...rest } = context;
    return new Logger({
      ...this.config,
      component: component || this.config.component,
      defaultContext: { ...this.context, ...rest },
    });
  }

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map((t) => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map((t) => t.close?.()));
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

function describeError(error: unknown): NonNullable<LogEntry["error"]> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "Unknown", message: String(error) };
}

// ============================================
// GLOBAL LOGGER SINGLETON
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}
