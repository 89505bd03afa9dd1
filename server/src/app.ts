/**
 * HTTP App
 *
 * Builds the Hono app around an injected registry and queue so tests can
 * drive it with `app.request()` and no listener.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { ZodError } from "zod";
import { createComponentLogger } from "./logging.js";
import { BridgeError } from "./errors.js";
import { createLLMClient } from "./llm/providers.js";
import { registerApiRoutes } from "./routes/api.js";
import { registerChatRoutes } from "./routes/chat.js";
import { registerDeviceRoutes } from "./routes/devices.js";
import type { ServerConfig } from "./config.js";
import type { DeviceRegistry } from "./devices/registry.js";
import type { JobQueue } from "./devices/job-queue.js";
import type { CommandExecutors } from "./dispatch/sequencer.js";
import type { ILLMClient } from "./llm/types.js";

const log = createComponentLogger("http");

export interface AppDeps {
  config: ServerConfig;
  registry: DeviceRegistry;
  queue: JobQueue;
  /** Default: a client for `config.llm` */
  createLLM?: () => ILLMClient;
  executors?: CommandExecutors;
}

export function createApp(deps: AppDeps): Hono {
  const { config, registry, queue } = deps;
  const createLLM =
    deps.createLLM ??
    (() =>
      createLLMClient({
        provider: config.llm.provider,
        apiKey: config.llm.apiKey,
        model: config.llm.model,
        baseUrl: config.llm.baseUrl,
      }));

  const app = new Hono();

  app.use("*", cors());
  app.use("*", async (c, next) => {
    const started = Date.now();
    await next();
    log.debug("Request handled", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - started,
    });
  });

  registerApiRoutes(app, { registry });
  registerDeviceRoutes(app, { registry, queue });
  registerChatRoutes(app, {
    registry,
    queue,
    createLLM,
    resultTimeoutMs: config.deviceResultTimeoutSec * 1000,
    executors: deps.executors,
  });

  app.notFound((c) => c.json({ error: "not found" }, 404));

  app.onError((err, c) => {
    if (err instanceof BridgeError) {
      if (err.status >= 500) {
        log.error("Request failed", err, { path: c.req.path, ...err.context });
      } else {
        log.warn("Request rejected", { path: c.req.path, code: err.code, error: err.message, ...err.context });
      }
      return c.json(err.toJSON(), err.status);
    }
    if (err instanceof ZodError) {
      const issues = err.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
      log.warn("Invalid request body", { path: c.req.path, issues });
      return c.json({ error: issues[0]?.message ?? "invalid request body", code: "BAD_REQUEST", issues }, 400);
    }
    log.error("Unhandled request error", err, { path: c.req.path });
    return c.json({ error: "internal server error" }, 500);
  });

  return app;
}
