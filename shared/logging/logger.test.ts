import { describe, it, expect, vi } from "vitest";
import { Logger } from "./logger.js";
import type { LogEntry, LogTransport } from "./types.js";

function memoryTransport(minLevel: LogTransport["minLevel"] = "trace"): LogTransport & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { name: "memory", minLevel, entries, log: (entry) => { entries.push(entry); } };
}

describe("Logger", () => {
  it("drops entries below the logger level", () => {
    const transport = memoryTransport();
    const logger = new Logger({ minLevel: "info", component: "server", transports: [transport] });

    logger.debug("hidden");
    logger.info("shown");

    expect(transport.entries.map((e) => e.message)).toEqual(["shown"]);
  });

  it("respects each transport's own level", () => {
    const all = memoryTransport("trace");
    const errorsOnly = memoryTransport("error");
    const logger = new Logger({ minLevel: "trace", component: "server", transports: [all, errorsOnly] });

    logger.warn("careful");
    logger.error("broken", new Error("boom"));

    expect(all.entries).toHaveLength(2);
    expect(errorsOnly.entries).toHaveLength(1);
    expect(errorsOnly.entries[0].error).toMatchObject({ name: "Error", message: "boom" });
  });

  it("redacts sensitive keys at any depth", () => {
    const transport = memoryTransport();
    const logger = new Logger({ minLevel: "trace", component: "server", transports: [transport] });

    logger.info("config", { provider: "openai", apiKey: "test-secret", nested: { token: "x", port: 5006 } });

    expect(transport.entries[0].data).toEqual({
      provider: "openai",
      apiKey: "[REDACTED]",
      nested: { token: "[REDACTED]", port: 5006 },
    });
  });

  it("child loggers carry component and device context", () => {
    const transport = memoryTransport();
    const logger = new Logger({ minLevel: "trace", component: "server", transports: [transport] });

    logger.child({ component: "server.devices", deviceId: "pico-1" }).info("touched");

    expect(transport.entries[0]).toMatchObject({ component: "server.devices", deviceId: "pico-1", message: "touched" });
  });

  it("keeps logging when a transport throws", () => {
    const good = memoryTransport();
    const bad: LogTransport = { name: "bad", minLevel: "trace", log: () => { throw new Error("disk full"); } };
    const logger = new Logger({ minLevel: "trace", component: "server", transports: [bad, good] });
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.info("still here");

    expect(good.entries).toHaveLength(1);
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });
});
