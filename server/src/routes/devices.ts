/**
 * Device Routes
 *
 * Dashboard management of the registry, and the wire the devices poll:
 * self-registration, `GET /jobs/next` and `POST /jobs/result`.
 */

import type { Context, Hono } from "hono";
import { z } from "zod";
import { createComponentLogger } from "../logging.js";
import { BadRequestError } from "../errors.js";
import { AGENT_ROLE_VALUE } from "../devices/capabilities.js";
import type { DeviceRegistry } from "../devices/registry.js";
import type { JobQueue } from "../devices/job-queue.js";

const log = createComponentLogger("routes.devices");

export interface DeviceRouteDeps {
  registry: DeviceRegistry;
  queue: JobQueue;
}

// ============================================
// BODY SCHEMAS
// ============================================

/** true, "true", "yes", "1" and non-zero numbers count as set */
function coerceFlag(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") return ["true", "yes", "1", "ok"].includes(value.trim().toLowerCase());
  return false;
}

/** Strings pass through, null/undefined become null, anything else is JSON-encoded */
function coerceText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  return JSON.stringify(value) ?? null;
}

const flag = z.unknown().transform(coerceFlag);
const text = z.unknown().transform(coerceText);

export const registerBodySchema = z.object({
  device_id: z
    .string({ required_error: "device_id is required", invalid_type_error: "device_id must be a string" })
    .trim()
    .min(1, "device_id is required"),
  capabilities: z.array(z.unknown(), { invalid_type_error: "capabilities must be a list" }).nullish(),
  meta: z.record(z.unknown(), { invalid_type_error: "meta must be an object" }).nullish(),
  approved: flag,
});

export const renameBodySchema = z.object({
  display_name: z.string({ invalid_type_error: "display_name must be a string or null" }).nullish(),
});

export const resultBodySchema = z.object({
  device_id: z.string({ invalid_type_error: "device_id must be a string" }).nullish(),
  job_id: z
    .union([z.string(), z.number()], { invalid_type_error: "job_id must be a string" })
    .nullish()
    .transform((value) => (value === null || value === undefined ? undefined : String(value))),
  ok: flag,
  return_value: z.unknown(),
  stdout: text,
  stderr: text,
  error: text,
  ts: z.unknown(),
});

/** Parse the JSON body; a missing or malformed body reads as `{}`. */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body ?? {};
  } catch {
    return {};
  }
}

/**
 * Collapse the device id given in body, query, X-Device-ID header and path
 * into at most one value.
 */
function collectDeviceId(sources: Record<string, string | null | undefined>): string | undefined {
  const seen = new Map<string, string[]>();
  for (const [source, raw] of Object.entries(sources)) {
    const value = raw?.trim();
    if (!value) continue;
    seen.set(value, [...(seen.get(value) ?? []), source]);
  }
  if (seen.size > 1) {
    throw new BadRequestError("ambiguous device_id: conflicting values supplied", {
      values: Object.fromEntries(seen),
    });
  }
  return seen.keys().next().value;
}

// ============================================
// ROUTES
// ============================================

export function registerDeviceRoutes(app: Hono, deps: DeviceRouteDeps): void {
  const { registry, queue } = deps;

  const register = (forceAgentRole: boolean) => async (c: Context) => {
    const body = registerBodySchema.parse(await readJsonBody(c));
    const meta = { ...(body.meta ?? {}) };
    if (forceAgentRole) {
      meta.role = AGENT_ROLE_VALUE;
    }
    const outcome = registry.register({
      deviceId: body.device_id,
      capabilities: body.capabilities ?? undefined,
      meta,
      approved: body.approved,
    });
    return c.json({
      status: outcome.status,
      device_id: outcome.device.deviceId,
      device: registry.serialize(outcome.device),
    });
  };

  // ============================================
  // DASHBOARD
  // ============================================

  app.post("/api/devices/register", register(false));

  app.get("/api/devices", (c) => c.json({ devices: registry.list() }));

  app.get("/api/devices/:id", (c) => {
    const device = registry.get(c.req.param("id").trim());
    return c.json({ device: registry.serialize(device) });
  });

  app.patch("/api/devices/:id/name", async (c) => {
    const deviceId = c.req.param("id").trim();
    registry.get(deviceId);
    const body = renameBodySchema.parse(await readJsonBody(c));
    const device = registry.rename(deviceId, body.display_name ?? null);
    return c.json({ status: "updated", device: registry.serialize(device) });
  });

  app.delete("/api/devices/:id", (c) => {
    const device = registry.delete(c.req.param("id").trim());
    return c.json({ status: "deleted", device_id: device.deviceId });
  });

  // ============================================
  // DEVICE WIRE
  // ============================================

  app.post("/devices/register", register(false));
  app.post("/agents/register", register(true));

  app.get("/jobs/next", (c) => {
    const deviceId = c.req.query("device_id")?.trim();
    if (!deviceId) {
      throw new BadRequestError("device_id is required");
    }
    const job = queue.dequeueNext(deviceId);
    if (!job) {
      return c.body(null, 204);
    }
    return c.json(job);
  });

  const postResult = async (c: Context) => {
    const body = resultBodySchema.parse(await readJsonBody(c));
    const deviceId = collectDeviceId({
      body: body.device_id,
      query: c.req.query("device_id"),
      header: c.req.header("X-Device-ID"),
      path: c.req.param("deviceId"),
    });

    const outcome = queue.postResult(
      { deviceId, jobId: body.job_id },
      {
        ok: body.ok,
        returnValue: body.return_value,
        stdout: body.stdout,
        stderr: body.stderr,
        error: body.error,
        ts: body.ts,
      },
    );
    log.debug("Result acknowledged", { deviceId: outcome.deviceId, jobId: outcome.jobId });
    return c.json({
      status: "ack",
      device_id: outcome.deviceId,
      ...(outcome.warning ? { warning: outcome.warning } : {}),
    });
  };

  app.post("/jobs/result", postResult);
  app.post("/jobs/result/:deviceId", postResult);
}
