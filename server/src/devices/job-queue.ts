/**
 * Device Job Queue
 *
 * Per-device FIFO job queues, the pending-job index (job id → device id)
 * and the result wait that bridges a chat turn with a polling device.
 *
 * A dispatch enqueues a job and parks on `awaitResult()`. The device picks
 * the job up with `dequeueNext()` and reports back through `postResult()`,
 * which hands the result straight to the parked waiter. The waiter is
 * removed from the table before it settles, so a result and a timeout can
 * never both win.
 */

import { nanoid } from "nanoid";
import { createComponentLogger } from "../logging.js";
import { BadRequestError, DeviceNotFoundError } from "../errors.js";
import type { DeviceRegistry } from "./registry.js";
import type {
  DeviceCommand,
  DeviceResult,
  DeviceState,
  JobEnvelope,
  PostResultOutcome,
  ResultHints,
  ResultInput
} from "./types.js";

const log = createComponentLogger("devices.queue");

// ============================================
// CONFIGURATION
// ============================================

/** stdout/stderr beyond this many characters are cut */
export const MAX_OUTPUT_CHARS = 4000;

export interface JobQueueOptions {
  /** Attribute id-less results to the only registered device. Default: true */
  assumeSingleDevice?: boolean;
  generateJobId?: () => string;
}

interface ResultWaiter {
  deviceId: string;
  timer: ReturnType<typeof setTimeout>;
  settle: (result: DeviceResult | null) => void;
}

function truncateOutput(value: string | null | undefined): string | null {
  if (typeof value !== "string") return null;
  return value.length > MAX_OUTPUT_CHARS ? value.slice(0, MAX_OUTPUT_CHARS) : value;
}

function cleanHint(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed || undefined;
}

// ============================================
// QUEUE
// ============================================

export class JobQueue {
  private readonly pending = new Map<string, string>();
  private readonly waiters = new Map<string, ResultWaiter>();
  private readonly assumeSingleDevice: boolean;
  private readonly generateJobId: () => string;

  constructor(
    private readonly registry: DeviceRegistry,
    options: JobQueueOptions = {},
  ) {
    this.assumeSingleDevice = options.assumeSingleDevice ?? true;
    this.generateJobId = options.generateJobId ?? (() => nanoid());
    registry.onDeviceRemoved((device) => this.handleDeviceRemoved(device));
  }

  /** Append a job to the device's queue and return its id. */
  enqueue(deviceId: string, command: DeviceCommand): string {
    const device = this.registry.get(deviceId);
    const jobId = this.generateJobId();
    device.jobQueue.push({
      jobId,
      deviceId: device.deviceId,
      command: { name: command.name, args: { ...command.args } },
      createdAt: this.registry.now(),
    });
    this.pending.set(jobId, device.deviceId);
    this.registry.touch(device.deviceId);

    log.info("Job enqueued", {
      deviceId: device.deviceId,
      jobId,
      command: command.name,
      queueDepth: device.jobQueue.length,
    });
    return jobId;
  }

  /** Pop the oldest job, or null when the queue is empty. */
  dequeueNext(deviceId: string): JobEnvelope | null {
    const device = this.registry.get(deviceId);
    this.registry.touch(device.deviceId);

    const job = device.jobQueue.shift();
    if (!job) return null;

    log.info("Job delivered", { deviceId: device.deviceId, jobId: job.jobId, command: job.command.name });
    return { job_id: job.jobId, command: job.command };
  }

  /**
   * Record a device result.
   *
   * The device is resolved from an explicit id that names a registered
   * device, then from the pending index by job id, then (when enabled) as
   * the only registered device. Falling back while an explicit id was given
   * sets `warning` on the outcome.
   */
  postResult(hints: ResultHints, input: ResultInput): PostResultOutcome {
    const explicitId = cleanHint(hints.deviceId);
    const jobId = cleanHint(hints.jobId) ?? null;

    let device: DeviceState | undefined;
    let source: "explicit" | "job" | "single" | undefined;

    if (explicitId) {
      device = this.registry.find(explicitId);
      if (device) source = "explicit";
    }
    if (!device && jobId) {
      const indexed = this.pending.get(jobId);
      device = indexed ? this.registry.find(indexed) : undefined;
      if (device) source = "job";
    }
    if (!device && this.assumeSingleDevice) {
      device = this.registry.only();
      if (device) source = "single";
    }

    if (!device) {
      if (explicitId || jobId) {
        log.warn("Result for unknown device", { deviceId: explicitId, jobId });
        throw new DeviceNotFoundError(explicitId ?? null);
      }
      throw new BadRequestError("device_id is required");
    }

    let warning: string | undefined;
    if (explicitId && source !== "explicit") {
      warning = `device_id '${explicitId}' is not registered; result recorded for '${device.deviceId}'`;
      log.warn("Result attributed to inferred device", { deviceId: device.deviceId, claimed: explicitId, jobId, source });
    }

    const result: DeviceResult = {
      jobId,
      deviceId: device.deviceId,
      ok: input.ok,
      returnValue: input.returnValue ?? null,
      stdout: truncateOutput(input.stdout),
      stderr: truncateOutput(input.stderr),
      error: input.error ?? null,
      ts: input.ts ?? null,
      receivedAt: this.registry.now(),
    };

    device.lastResult = result;
    this.registry.touch(device.deviceId);
    if (jobId) {
      this.pending.delete(jobId);
      device.jobResults.set(jobId, result);
      this.deliver(device, jobId);
    }

    log.info("Result received", { deviceId: device.deviceId, jobId, ok: result.ok });
    return { deviceId: device.deviceId, jobId, ...(warning ? { warning } : {}) };
  }

  /**
   * Wait for the result of `jobId`, consuming it. Resolves null when the
   * timeout passes first or the device is deleted meanwhile; the job
   * itself stays where it is.
   */
  awaitResult(deviceId: string, jobId: string, timeoutMs: number): Promise<DeviceResult | null> {
    const device = this.registry.find(deviceId);
    if (!device) return Promise.resolve(null);

    const ready = device.jobResults.get(jobId);
    if (ready) {
      device.jobResults.delete(jobId);
      this.pending.delete(jobId);
      return Promise.resolve(ready);
    }

    this.waiters.get(jobId)?.settle(null);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        if (this.waiters.get(jobId) !== waiter) return;
        this.waiters.delete(jobId);
        log.warn("Timed out waiting for device result", { deviceId, jobId, timeoutMs });
        resolve(null);
      }, timeoutMs);

      const waiter: ResultWaiter = {
        deviceId,
        timer,
        settle: (result) => {
          clearTimeout(timer);
          this.waiters.delete(jobId);
          resolve(result);
        },
      };
      this.waiters.set(jobId, waiter);
    });
  }

  /** Device a not-yet-answered job belongs to */
  pendingDevice(jobId: string): string | undefined {
    return this.pending.get(jobId);
  }

  queueDepth(deviceId: string): number {
    return this.registry.get(deviceId).jobQueue.length;
  }

  private deliver(device: DeviceState, jobId: string): void {
    const waiter = this.waiters.get(jobId);
    if (!waiter || waiter.deviceId !== device.deviceId) return;
    const result = device.jobResults.get(jobId);
    if (!result) return;
    device.jobResults.delete(jobId);
    waiter.settle(result);
  }

  private handleDeviceRemoved(device: DeviceState): void {
    for (const [jobId, deviceId] of this.pending) {
      if (deviceId === device.deviceId) this.pending.delete(jobId);
    }
    for (const waiter of [...this.waiters.values()]) {
      if (waiter.deviceId === device.deviceId) waiter.settle(null);
    }
  }
}
