/**
 * Device, Job and Result Types
 *
 * Internal state is camelCase. The wire shapes sent to dashboards and
 * devices (`SerializedDevice`, `JobEnvelope`) keep the snake_case field
 * names the firmware and dashboard already speak.
 */

// ============================================
// CAPABILITIES
// ============================================

export interface ParamSpec {
  name: string;
  type?: string;
  required?: boolean;
  default?: unknown;
  description?: string;
}

export interface Capability {
  name: string;
  description?: string;
  params?: ParamSpec[];
}

/** One callable action shown to the dashboard and the model */
export interface ActionCatalogEntry {
  name: string;
  description?: string;
  params: ParamSpec[];
}

// ============================================
// DEVICES
// ============================================

export type DeviceMeta = Record<string, unknown>;

/**
 * "agent" devices take free-text instructions; "peripheral" devices only
 * run their declared capabilities.
 */
export type DeviceRole = "agent" | "peripheral";

export interface DeviceState {
  deviceId: string;
  capabilities: Capability[];
  meta: DeviceMeta;
  approved: boolean;
  jobQueue: QueuedJob[];
  /** Posted results not yet consumed by a waiting dispatch, by job id */
  jobResults: Map<string, DeviceResult>;
  lastResult: DeviceResult | null;
  /** Epoch milliseconds */
  lastSeen: number;
  registeredAt: number;
}

export interface SerializedDevice {
  device_id: string;
  capabilities: Capability[];
  meta: DeviceMeta;
  approved: boolean;
  role: DeviceRole;
  action_catalog: ActionCatalogEntry[];
  queue_depth: number;
  /** Epoch seconds */
  last_seen: number;
  registered_at: number;
  last_result: SerializedResult | null;
}

export interface RegisterDeviceInput {
  deviceId: string;
  capabilities?: unknown[];
  meta?: DeviceMeta;
  approved?: boolean;
}

export interface RegisterDeviceOutcome {
  status: "registered" | "updated";
  device: DeviceState;
}

// ============================================
// JOBS & RESULTS
// ============================================

export interface DeviceCommand {
  name: string;
  args: Record<string, unknown>;
}

export interface QueuedJob {
  jobId: string;
  deviceId: string;
  command: DeviceCommand;
  createdAt: number;
}

/** What `GET /jobs/next` hands to a device */
export interface JobEnvelope {
  job_id: string;
  command: DeviceCommand;
}

export interface ResultInput {
  ok: boolean;
  returnValue?: unknown;
  stdout?: string | null;
  stderr?: string | null;
  error?: string | null;
  ts?: unknown;
}

export interface DeviceResult {
  jobId: string | null;
  deviceId: string;
  ok: boolean;
  returnValue: unknown;
  stdout: string | null;
  stderr: string | null;
  error: string | null;
  ts: unknown;
  receivedAt: number;
}

export interface SerializedResult {
  job_id: string | null;
  ok: boolean;
  return_value: unknown;
  stdout: string | null;
  stderr: string | null;
  error: string | null;
  ts: unknown;
}

export interface ResultHints {
  deviceId?: string;
  jobId?: string;
}

export interface PostResultOutcome {
  deviceId: string;
  jobId: string | null;
  /** Set when the device was inferred and disagrees with a supplied id */
  warning?: string;
}
