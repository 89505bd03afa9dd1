/**
 * API Routes
 *
 * Service info and health check.
 */

import type { Hono } from "hono";
import type { DeviceRegistry } from "../devices/registry.js";

export const SERVICE_NAME = "Device Chat Bridge";
export const SERVICE_VERSION = "0.1.0";

export function registerApiRoutes(app: Hono, deps: { registry: DeviceRegistry }): void {
  app.get("/", (c) => c.json({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: "running",
  }));

  app.get("/api/health", (c) => c.json({
    status: "ok",
    devices: deps.registry.count(),
  }));
}
