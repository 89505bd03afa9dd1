/**
 * File Transport
 *
 * Appends JSON lines to `<logDir>/<filename>.log`, rotating to
 * `.1`, `.2`, ... once the file passes `maxSize`. Node.js only.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogEntry, LogLevel, LogTransport } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename without extension (default: "devicechat") */
  filename?: string;
  /** Bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Rotated files kept besides the live one (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private readonly filePath: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private stream: fs.WriteStream;
  private size = 0;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    fs.mkdirSync(options.logDir, { recursive: true });
    this.filePath = path.join(options.logDir, `${options.filename ?? "devicechat"}.log`);
    this.stream = this.open();
  }

  private open(): fs.WriteStream {
    try {
      this.size = fs.statSync(this.filePath).size;
    } catch {
      // No file yet.
      this.size = 0;
    }
    const stream = fs.createWriteStream(this.filePath, { flags: "a" });
    stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
    return stream;
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    if (this.size + line.length > this.maxSize) {
      this.rotate();
    }
    this.stream.write(line);
    this.size += line.length;
  }

  private rotate(): void {
    this.stream.end();
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.filePath}.${i}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${this.filePath}.${i + 1}`);
      }
    }
    const oldest = `${this.filePath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }
    if (fs.existsSync(this.filePath)) {
      fs.renameSync(this.filePath, `${this.filePath}.1`);
    }
    this.stream = this.open();
  }

  async flush(): Promise<void> {
    if (this.stream.writableLength === 0) return;
    // Writes complete in order, so an empty write's callback marks the tail.
    await new Promise<void>((resolve) => this.stream.write("", () => resolve()));
  }

  async close(): Promise<void> {
    await new Promise<void>((resolve) => this.stream.end(() => resolve()));
  }
}
