/**
 * Command Validator
 *
 * Checks the commands a model proposes before anything is enqueued.
 * Failures are returned as user-facing messages, never thrown.
 */

import { createComponentLogger } from "../logging.js";
import { AGENT_COMMAND_NAME, capabilityNames, resolveDeviceRole } from "./capabilities.js";
import type { DeviceRegistry } from "./registry.js";

const log = createComponentLogger("devices.validator");

export interface ValidatedCommand {
  deviceId: string;
  name: string;
  args: Record<string, unknown>;
}

export type ValidationOutcome =
  | { command: ValidatedCommand; error: null }
  | { command: null; error: string };

export interface SequenceValidation {
  commands: ValidatedCommand[];
  errors: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(error: string): ValidationOutcome {
  return { command: null, error };
}

export function validateCommand(registry: DeviceRegistry, raw: unknown): ValidationOutcome {
  if (!isRecord(raw)) {
    return fail("コマンドの形式が正しくありません。オブジェクトで指定してください。");
  }

  let deviceId: string;
  const explicitId = typeof raw.device_id === "string" ? raw.device_id.trim() : "";
  if (explicitId) {
    if (!registry.has(explicitId)) {
      return fail(`デバイス '${explicitId}' は登録されていません。`);
    }
    deviceId = explicitId;
  } else {
    const count = registry.count();
    const only = registry.only();
    if (count === 0 || !only) {
      return fail(
        count === 0
          ? "登録済みのデバイスがないため、コマンドを実行できません。"
          : `複数のデバイス (${count}台) が登録されているため、device_id の指定が必要です。`,
      );
    }
    deviceId = only.deviceId;
  }

  const name = typeof raw.name === "string" ? raw.name.trim() : "";
  if (!name) {
    return fail("コマンド名 (name) が指定されていません。");
  }

  const rawArgs = raw.args ?? {};
  if (!isRecord(rawArgs)) {
    return fail(`コマンド『${name}』の args はオブジェクトで指定してください。`);
  }

  const device = registry.get(deviceId);
  const supported = capabilityNames(device);
  const agentAccepts = resolveDeviceRole(device) === "agent" && name === AGENT_COMMAND_NAME;
  if (supported.length > 0 && !supported.includes(name) && !agentAccepts) {
    log.info("Rejected unsupported command", { deviceId, command: name });
    return fail(
      `${registry.label(deviceId)} はコマンド『${name}』に対応していません。` +
        `対応しているコマンド: ${supported.join(", ")}`,
    );
  }

  return { command: { deviceId, name, args: { ...rawArgs } }, error: null };
}

/**
 * Validate null (no commands), a single command object, or a list. Errors
 * carry a 1-based step prefix.
 */
export function validateCommandSequence(registry: DeviceRegistry, raw: unknown): SequenceValidation {
  if (raw === null || raw === undefined) {
    return { commands: [], errors: [] };
  }
  const steps: unknown[] = Array.isArray(raw) ? raw : [raw];

  const commands: ValidatedCommand[] = [];
  const errors: string[] = [];
  steps.forEach((step, index) => {
    const outcome = validateCommand(registry, step);
    if (outcome.command === null) {
      errors.push(`ステップ${index + 1}: ${outcome.error}`);
    } else {
      commands.push(outcome.command);
    }
  });

  if (errors.length > 0) {
    log.warn("Command validation failed", { steps: steps.length, errors });
  }
  return { commands, errors };
}
