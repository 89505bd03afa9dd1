/**
 * Error Types
 *
 * Thrown by the device registry and job queue, mapped to HTTP responses by
 * the app's error handler. Validation failures, dispatch failures and
 * result timeouts are not errors: they travel as values and end up in the
 * chat reply text.
 */

export type BridgeErrorCode = "NOT_FOUND" | "NOT_APPROVED" | "BAD_REQUEST" | "UPSTREAM_FAILURE";

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly status: 400 | 403 | 404 | 500;
  /** Debugging context, logged but never sent to clients */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: BridgeErrorCode,
    status: 400 | 403 | 404 | 500,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
    this.status = status;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code };
  }
}

export class DeviceNotFoundError extends BridgeError {
  readonly deviceId: string | null;

  constructor(deviceId: string | null, message = "device not registered") {
    super(message, "NOT_FOUND", 404, { deviceId });
    this.name = "DeviceNotFoundError";
    this.deviceId = deviceId;
  }
}

export class NotApprovedError extends BridgeError {
  constructor(deviceId: string) {
    super("device not approved", "NOT_APPROVED", 403, { deviceId });
    this.name = "NotApprovedError";
  }
}

export class BadRequestError extends BridgeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "BAD_REQUEST", 400, context);
    this.name = "BadRequestError";
  }
}

/** The LLM collaborator could not be reached or threw. */
export class UpstreamError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, "UPSTREAM_FAILURE", 500, cause instanceof Error ? { cause: cause.message } : {});
    this.name = "UpstreamError";
  }
}
