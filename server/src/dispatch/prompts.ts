/**
 * Prompt Construction
 *
 * Device context for the system prompt, plus loaders for the follow-up,
 * agent-instruction and sequence-summary prompts under ./prompts.
 */

import { loadPrompt } from "../prompt-template.js";
import { AGENT_COMMAND_NAME, buildActionCatalog, resolveDeviceRole } from "../devices/capabilities.js";
import type { DeviceRegistry } from "../devices/registry.js";
import type { ActionCatalogEntry, DeviceResult, ParamSpec } from "../devices/types.js";

export const NO_DEVICES_TEXT = "No devices are currently registered.";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as YYYY-MM-DD HH:MM:SS */
export function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

function describeParam(param: ParamSpec): string {
  let text = `${param.name} (${param.type ?? "unknown"})`;
  if (param.required) text += " required";
  if (param.default !== undefined && param.default !== null) text += ` default=${JSON.stringify(param.default)}`;
  if (param.description) text += ` - ${param.description}`;
  return text;
}

function describeAction(action: ActionCatalogEntry): string {
  const params = action.params.length > 0 ? action.params.map(describeParam).join(", ") : "no parameters";
  return `    - ${action.name}: ${action.description ?? ""} | params: ${params}`;
}

export function buildDeviceContext(registry: DeviceRegistry): string {
  const devices = registry.all();
  if (devices.length === 0) return NO_DEVICES_TEXT;

  const lines: string[] = [];
  for (const device of devices) {
    lines.push(`Device ID: ${device.deviceId}`);
    const displayName = device.meta.display_name;
    if (typeof displayName === "string" && displayName.trim()) {
      lines.push(`  Friendly name: ${displayName.trim()}`);
    }
    lines.push(`  Role: ${resolveDeviceRole(device)}`);
    if (Object.keys(device.meta).length > 0) {
      lines.push(`  Meta: ${JSON.stringify(device.meta)}`);
    }
    lines.push(`  Registered at: ${formatTimestamp(device.registeredAt)}`);
    lines.push(`  Last seen: ${formatTimestamp(device.lastSeen)}`);
    lines.push(`  Queue depth: ${device.jobQueue.length}`);
    lines.push("  Capabilities:");
    for (const action of buildActionCatalog(device)) {
      lines.push(describeAction(action));
    }
    if (device.lastResult) {
      const { jobId, ok, returnValue } = device.lastResult;
      lines.push(`  Most recent result: ${JSON.stringify({ job_id: jobId, ok, return_value: returnValue })}`);
    }
    lines.push("");
  }
  return lines.join("\n").trim();
}

export function buildChatSystemPrompt(registry: DeviceRegistry): Promise<string> {
  return loadPrompt("dispatch/prompts/chat-system.md", {
    "Agent Command": AGENT_COMMAND_NAME,
    "Device Context": buildDeviceContext(registry),
  });
}

/** Result as the model sees it in follow-up prompts */
export function resultForPrompt(result: DeviceResult): string {
  return JSON.stringify({
    job_id: result.jobId,
    ok: result.ok,
    return_value: result.returnValue,
    stdout: result.stdout,
    stderr: result.stderr,
    error: result.error,
    ts: result.ts,
  });
}

export function buildResultFollowupPrompt(fields: {
  deviceLabel: string;
  commandName: string;
  args: Record<string, unknown>;
  result: DeviceResult;
}): Promise<string> {
  return loadPrompt("dispatch/prompts/result-followup.md", {
    Device: fields.deviceLabel,
    Command: fields.commandName,
    Arguments: JSON.stringify(fields.args),
    Result: resultForPrompt(fields.result),
  });
}

export function buildAgentInstructionPrompt(fields: {
  deviceLabel: string;
  actions: ActionCatalogEntry[];
  initialReply: string;
  args: Record<string, unknown>;
}): Promise<string> {
  const actions = fields.actions.map((action) => action.name).join(", ") || "none declared";
  return loadPrompt("dispatch/prompts/agent-instruction.md", {
    Device: fields.deviceLabel,
    Actions: actions,
    Reply: fields.initialReply || "(none)",
    Arguments: JSON.stringify(fields.args),
  });
}

export interface SequenceStepDigest {
  deviceLabel: string;
  /** Instruction for agent steps, command name otherwise */
  task: string;
  args: Record<string, unknown>;
  /** Result JSON, or the manual text when the step produced no result */
  outcome: string;
}

export function buildSequenceSummaryPrompt(steps: SequenceStepDigest[]): Promise<string> {
  const described = steps
    .map((step, index) =>
      [
        `Step ${index + 1}`,
        `Device: ${step.deviceLabel}`,
        `Instruction/command: ${step.task}`,
        `Arguments: ${JSON.stringify(step.args)}`,
        `Result: ${step.outcome}`,
      ].join("\n"),
    )
    .join("\n\n");
  return loadPrompt("dispatch/prompts/sequence-summary.md", { Steps: described });
}
