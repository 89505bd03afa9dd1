/**
 * Console Transport
 *
 * One colored line per entry, data and error appended below it.
 */

import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const LEVEL_STYLE: Record<LogLevel, { label: string; color: string }> = {
  trace: { label: "TRC", color: ANSI.gray },
  debug: { label: "DBG", color: ANSI.cyan },
  info: { label: "INF", color: ANSI.blue },
  warn: { label: "WRN", color: ANSI.yellow },
  error: { label: "ERR", color: ANSI.red },
  fatal: { label: "FTL", color: ANSI.bgRed + ANSI.white },
  silent: { label: "   ", color: ANSI.reset },
};

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Default: stdout is a TTY */
  colors?: boolean;
  /** Indented JSON for data instead of a single line */
  prettyPrint?: boolean;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private readonly colors: boolean;
  private readonly prettyPrint: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.prettyPrint = options.prettyPrint ?? true;
  }

  log(entry: LogEntry): void {
    const style = LEVEL_STYLE[entry.level];
    const head = [
      this.paint(entry.timestamp.slice(11, 19), ANSI.dim),
      this.paint(style.label, style.color),
      this.paint(`[${entry.component}]`, ANSI.magenta),
    ];
    if (entry.deviceId) head.push(this.paint(`<${entry.deviceId}>`, ANSI.dim));
    if (entry.correlationId) head.push(this.paint(`(${entry.correlationId.slice(0, 8)})`, ANSI.dim));
    head.push(entry.message);

    let output = head.join(" ");

    if (entry.data && Object.keys(entry.data).length > 0) {
      const json = this.prettyPrint ? JSON.stringify(entry.data, null, 2) : JSON.stringify(entry.data);
      output += (this.prettyPrint ? "\n" : " ") + this.paint(json, ANSI.dim);
    }

    if (entry.error) {
      output += "\n" + this.paint(`${entry.error.name}: ${entry.error.message}`, ANSI.red);
      if (entry.error.stack) {
        output += "\n" + this.paint(entry.error.stack, ANSI.dim);
      }
    }

    switch (entry.level) {
      case "trace":
      case "debug":
        console.debug(output);
        break;
      case "info":
        console.info(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "error":
      case "fatal":
        console.error(output);
        break;
      case "silent":
        break;
    }
  }

  private paint(text: string, color: string): string {
    return this.colors ? `${color}${text}${ANSI.reset}` : text;
  }
}
