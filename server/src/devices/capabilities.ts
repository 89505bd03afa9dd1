/**
 * Capability Manifests
 *
 * Normalizes the capability lists devices report at registration, builds
 * the action catalog shown to dashboards and the model, and decides a
 * device's role.
 */

import type { ActionCatalogEntry, Capability, DeviceState, DeviceRole, ParamSpec } from "./types.js";

// ============================================
// AGENT CONVENTIONS
// ============================================

/** `meta.role` value that marks a free-text agent device */
export const AGENT_ROLE_VALUE = "llm_agent";
/** Capability name that marks a free-text agent device */
export const AGENT_CAPABILITY_NAME = "agent_instruction";
/** Command name used when dispatching an instruction to an agent */
export const AGENT_COMMAND_NAME = "agent_instruction";

const TRUTHY_REQUIRED = new Set(["yes", "true", "1", "required"]);

// ============================================
// NORMALIZATION
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function trimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed || undefined;
}

function coerceRequired(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") return TRUTHY_REQUIRED.has(value.trim().toLowerCase());
  return undefined;
}

export function normalizeParams(raw: unknown): ParamSpec[] {
  if (!Array.isArray(raw)) return [];
  const params: ParamSpec[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    const name = trimmedString(entry.name);
    if (!name) continue;

    const param: ParamSpec = { name };
    const type = trimmedString(entry.type);
    if (type) param.type = type;
    const required = coerceRequired(entry.required);
    if (required !== undefined) param.required = required;
    if ("default" in entry && entry.default !== undefined) param.default = entry.default;
    const description = trimmedString(entry.description);
    if (description) param.description = description;
    params.push(param);
  }
  return params;
}

/**
 * Drop non-object and nameless entries, trim names, types and
 * descriptions, coerce `required` to a boolean and keep defaults verbatim.
 */
export function normalizeCapabilities(raw: unknown): Capability[] {
  if (!Array.isArray(raw)) return [];
  const capabilities: Capability[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    const name = trimmedString(entry.name);
    if (!name) continue;

    const capability: Capability = { name };
    const description = trimmedString(entry.description);
    if (description) capability.description = description;
    const params = normalizeParams(entry.params);
    if (params.length > 0) capability.params = params;
    capabilities.push(capability);
  }
  return capabilities;
}

// ============================================
// ACTION CATALOG
// ============================================

/**
 * The device-declared `meta.action_catalog` when it is a list, otherwise
 * one entry per capability.
 */
export function buildActionCatalog(device: Pick<DeviceState, "capabilities" | "meta">): ActionCatalogEntry[] {
  const declared = device.meta.action_catalog;
  const source = Array.isArray(declared) ? normalizeCapabilities(declared) : device.capabilities;
  return source.map((capability) => ({
    name: capability.name,
    ...(capability.description ? { description: capability.description } : {}),
    params: capability.params ?? [],
  }));
}

// ============================================
// ROLES
// ============================================

export function resolveDeviceRole(device: Pick<DeviceState, "capabilities" | "meta">): DeviceRole {
  const role = device.meta.role;
  if (typeof role === "string" && role.trim() === AGENT_ROLE_VALUE) {
    return "agent";
  }
  if (device.capabilities.some((capability) => capability.name === AGENT_CAPABILITY_NAME)) {
    return "agent";
  }
  return "peripheral";
}

export function capabilityNames(device: Pick<DeviceState, "capabilities">): string[] {
  return device.capabilities.map((capability) => capability.name);
}
