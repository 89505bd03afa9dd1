/**
 * Device Registry
 *
 * In-memory store of known devices: capability manifests, metadata,
 * approval state and the per-device job queue and result slots that the
 * job queue operates on. Every method is synchronous, so each mutation is
 * atomic on the event loop.
 */

import { createComponentLogger } from "../logging.js";
import { BadRequestError, DeviceNotFoundError, NotApprovedError } from "../errors.js";
import { buildActionCatalog, normalizeCapabilities, resolveDeviceRole } from "./capabilities.js";
import type {
  DeviceMeta,
  DeviceResult,
  DeviceRole,
  DeviceState,
  RegisterDeviceInput,
  RegisterDeviceOutcome,
  SerializedDevice,
  SerializedResult
} from "./types.js";

const log = createComponentLogger("devices.registry");

export type DeviceRemovedListener = (device: DeviceState) => void;

export interface DeviceRegistryOptions {
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export function serializeResult(result: DeviceResult): SerializedResult {
  return {
    job_id: result.jobId,
    ok: result.ok,
    return_value: result.returnValue,
    stdout: result.stdout,
    stderr: result.stderr,
    error: result.error,
    ts: result.ts,
  };
}

/**
 * Merge incoming metadata over the stored copy. A blank or non-string
 * `display_name` never clears a name set from the dashboard; renaming goes
 * through `rename()`.
 */
function mergeMeta(existing: DeviceMeta, incoming: DeviceMeta | undefined): DeviceMeta {
  const merged: DeviceMeta = { ...existing };
  for (const [key, value] of Object.entries(incoming ?? {})) {
    if (key === "display_name") {
      const name = typeof value === "string" ? value.trim() : "";
      if (name) merged.display_name = name;
      continue;
    }
    merged[key] = value;
  }
  return merged;
}

export class DeviceRegistry {
  private readonly devices = new Map<string, DeviceState>();
  private readonly removedListeners = new Set<DeviceRemovedListener>();
  readonly now: () => number;

  constructor(options: DeviceRegistryOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Create or update a device.
   *
   * A new device, or an existing one that was never approved, needs
   * `approved: true` (the dashboard registration signal). Once approved a
   * device may re-register on its own to refresh capabilities and meta.
   */
  register(input: RegisterDeviceInput): RegisterDeviceOutcome {
    const deviceId = input.deviceId.trim();
    if (!deviceId) {
      throw new BadRequestError("device_id is required");
    }

    const approvalFlag = input.approved === true;
    const existing = this.devices.get(deviceId);
    const capabilities = normalizeCapabilities(input.capabilities);
    const now = this.now();

    if (!existing) {
      if (!approvalFlag) {
        log.warn("Rejected registration of unapproved device", { deviceId });
        throw new NotApprovedError(deviceId);
      }
      const device: DeviceState = {
        deviceId,
        capabilities,
        meta: mergeMeta({}, input.meta),
        approved: true,
        jobQueue: [],
        jobResults: new Map(),
        lastResult: null,
        lastSeen: now,
        registeredAt: now,
      };
      this.devices.set(deviceId, device);
      log.info("Device registered", { deviceId, capabilities: capabilities.length });
      return { status: "registered", device };
    }

    if (!existing.approved && !approvalFlag) {
      log.warn("Rejected update of unapproved device", { deviceId });
      throw new NotApprovedError(deviceId);
    }

    existing.approved = true;
    // An empty manifest (e.g. a dashboard re-registration) keeps what the device reported.
    if (capabilities.length > 0) {
      existing.capabilities = capabilities;
    }
    existing.meta = mergeMeta(existing.meta, input.meta);
    existing.lastSeen = now;
    log.info("Device updated", { deviceId, capabilities: existing.capabilities.length });
    return { status: "updated", device: existing };
  }

  get(deviceId: string): DeviceState {
    const device = this.devices.get(deviceId);
    if (!device) {
      throw new DeviceNotFoundError(deviceId);
    }
    return device;
  }

  find(deviceId: string): DeviceState | undefined {
    return this.devices.get(deviceId);
  }

  has(deviceId: string): boolean {
    return this.devices.has(deviceId);
  }

  count(): number {
    return this.devices.size;
  }

  /** The registered device when there is exactly one. */
  only(): DeviceState | undefined {
    if (this.devices.size !== 1) return undefined;
    return this.devices.values().next().value;
  }

  /** Devices ordered by id. */
  all(): DeviceState[] {
    return [...this.devices.values()].sort((a, b) => (a.deviceId < b.deviceId ? -1 : a.deviceId > b.deviceId ? 1 : 0));
  }

  list(): SerializedDevice[] {
    return this.all().map((device) => this.serialize(device));
  }

  serialize(device: DeviceState): SerializedDevice {
    return structuredClone({
      device_id: device.deviceId,
      capabilities: device.capabilities,
      meta: device.meta,
      approved: device.approved,
      role: resolveDeviceRole(device),
      action_catalog: buildActionCatalog(device),
      queue_depth: device.jobQueue.length,
      last_seen: device.lastSeen / 1000,
      registered_at: device.registeredAt / 1000,
      last_result: device.lastResult ? serializeResult(device.lastResult) : null,
    });
  }

  /** Set, or clear with null/blank, the dashboard display name. */
  rename(deviceId: string, displayName: string | null): DeviceState {
    const device = this.get(deviceId);
    const name = displayName?.trim() ?? "";
    const meta = { ...device.meta };
    if (name) {
      meta.display_name = name;
    } else {
      delete meta.display_name;
    }
    device.meta = meta;
    device.lastSeen = this.now();
    log.info("Device renamed", { deviceId, displayName: name || null });
    return device;
  }

  /** Remove a device; listeners purge queue state that points at it. */
  delete(deviceId: string): DeviceState {
    const device = this.get(deviceId);
    this.devices.delete(deviceId);
    for (const listener of this.removedListeners) {
      listener(device);
    }
    log.info("Device deleted", { deviceId, droppedJobs: device.jobQueue.length });
    return device;
  }

  onDeviceRemoved(listener: DeviceRemovedListener): () => void {
    this.removedListeners.add(listener);
    return () => {
      this.removedListeners.delete(listener);
    };
  }

  touch(deviceId: string): void {
    const device = this.devices.get(deviceId);
    if (device) {
      device.lastSeen = this.now();
    }
  }

  resolveRole(device: DeviceState): DeviceRole {
    return resolveDeviceRole(device);
  }

  /** "Friendly name (ID: id)" when a display name is set, else the id. */
  label(deviceId: string): string {
    const device = this.devices.get(deviceId);
    if (!device) return deviceId;
    const name = device.meta.display_name;
    if (typeof name === "string" && name.trim()) {
      return `${name.trim()} (ID: ${device.deviceId})`;
    }
    return device.deviceId;
  }
}
