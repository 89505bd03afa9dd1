/**
 * Dispatch-and-Wait
 *
 * Runs one validated command against its device: enqueue, wait for the
 * device to report back, and turn the outcome into reply text. Agent
 * devices first get their command rewritten into a free-text instruction.
 *
 * Nothing here throws for device-side trouble. An enqueue failure, a
 * timeout or an `ok: false` result all come back as a summary with status
 * 200; only a failure to build an agent instruction is a hard failure.
 */

import { createComponentLogger } from "../logging.js";
import { DeviceNotFoundError, UpstreamError } from "../errors.js";
import { AGENT_COMMAND_NAME, buildActionCatalog } from "../devices/capabilities.js";
import { parseModelOutput, stripCodeFences } from "./model-output.js";
import { buildAgentInstructionPrompt, buildResultFollowupPrompt } from "./prompts.js";
import { ENQUEUE_FAILURE_NOTICE, appendNotice, manualResultReply, timeoutReply } from "./summary.js";
import type { DeviceRegistry } from "../devices/registry.js";
import type { JobQueue } from "../devices/job-queue.js";
import type { ValidatedCommand } from "../devices/validator.js";
import type { DeviceCommand, DeviceResult, DeviceState } from "../devices/types.js";
import type { ILLMClient, LLMMessage } from "../llm/types.js";

const log = createComponentLogger("dispatch");

// ============================================
// TYPES
// ============================================

export interface DispatchContext {
  registry: DeviceRegistry;
  queue: JobQueue;
  /** Null disables follow-up enrichment and instruction translation */
  llm: ILLMClient | null;
  resultTimeoutMs: number;
  /** Conversation so far, forwarded to follow-up calls */
  messages: LLMMessage[];
}

/** 200, or 500 when the dispatch itself failed */
export type ExecutionStatus = 200 | 500;

export interface CommandExecutionSummary {
  deviceId: string;
  commandName: string;
  args: Record<string, unknown>;
  /** What the user reads for this step */
  summary: string;
  instruction?: string;
  isAgent: boolean;
  status: ExecutionStatus;
  errorText?: string;
  result: DeviceResult | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================
// SHARED STEPS
// ============================================

/**
 * Enqueue a job, treating a vanished device as a non-fatal notice. Returns
 * the job id, or null when the job could not be queued.
 */
function enqueueOrNull(ctx: DispatchContext, deviceId: string, command: DeviceCommand): string | null {
  try {
    return ctx.queue.enqueue(deviceId, command);
  } catch (error) {
    if (error instanceof DeviceNotFoundError) {
      log.warn("Device vanished before enqueue", { deviceId, command: command.name });
      return null;
    }
    throw error;
  }
}

/**
 * Phrase a result for the user. The model's follow-up reply replaces the
 * manual summary only when it is non-empty; any LLM error keeps the
 * manual one.
 */
export async function finalizeReplyWithResult(
  ctx: DispatchContext,
  params: {
    deviceLabel: string;
    task: string;
    args: Record<string, unknown>;
    result: DeviceResult;
    initialReply: string;
  },
): Promise<string> {
  const manual = manualResultReply(params.deviceLabel, params.task, params.result);
  if (!ctx.llm) return manual;

  try {
    const prompt = await buildResultFollowupPrompt({
      deviceLabel: params.deviceLabel,
      commandName: params.task,
      args: params.args,
      result: params.result,
    });
    const messages: LLMMessage[] = [...ctx.messages];
    if (params.initialReply) {
      messages.push({ role: "assistant", content: params.initialReply });
    }
    messages.push({ role: "system", content: prompt });

    const response = await ctx.llm.chat(messages, { responseFormat: "json_object" });
    const reply = parseModelOutput(response.content).reply.trim();
    return reply || manual;
  } catch (error) {
    log.warn("Result follow-up failed, using manual summary", { error: errorMessage(error) });
    return manual;
  }
}

async function waitAndSummarize(
  ctx: DispatchContext,
  deviceId: string,
  jobId: string,
  task: string,
  args: Record<string, unknown>,
  initialReply: string,
): Promise<{ summary: string; result: DeviceResult | null }> {
  const deviceLabel = ctx.registry.label(deviceId);
  const result = await ctx.queue.awaitResult(deviceId, jobId, ctx.resultTimeoutMs);
  if (!result) {
    return { summary: timeoutReply(deviceLabel, task, ctx.resultTimeoutMs / 1000), result: null };
  }
  const summary = await finalizeReplyWithResult(ctx, { deviceLabel, task, args, result, initialReply });
  return { summary, result };
}

// ============================================
// STANDARD DEVICES
// ============================================

export async function executeStandardCommand(
  ctx: DispatchContext,
  command: ValidatedCommand,
  initialReply: string,
): Promise<CommandExecutionSummary> {
  const base = {
    deviceId: command.deviceId,
    commandName: command.name,
    args: command.args,
    isAgent: false,
  };

  const jobId = enqueueOrNull(ctx, command.deviceId, { name: command.name, args: command.args });
  if (!jobId) {
    return { ...base, summary: appendNotice(initialReply, ENQUEUE_FAILURE_NOTICE), status: 200, result: null };
  }

  const { summary, result } = await waitAndSummarize(ctx, command.deviceId, jobId, command.name, command.args, initialReply);
  return { ...base, summary, status: 200, result };
}

// ============================================
// AGENT DEVICES
// ============================================

function cleanInstruction(text: string): string {
  const firstLine = stripCodeFences(text)
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (!firstLine) return "";
  return firstLine.replace(/^["'「“]+|["'」”]+$/g, "").trim();
}

/**
 * Ask the model for one imperative sentence the agent device can act on.
 * Returns "" when the model gave nothing usable.
 */
export async function buildAgentInstruction(
  ctx: DispatchContext,
  device: DeviceState,
  initialReply: string,
  args: Record<string, unknown>,
): Promise<string> {
  if (!ctx.llm) {
    throw new UpstreamError("LLM client is not available");
  }
  const prompt = await buildAgentInstructionPrompt({
    deviceLabel: ctx.registry.label(device.deviceId),
    actions: buildActionCatalog(device),
    initialReply,
    args,
  });
  const response = await ctx.llm.chat([...ctx.messages, { role: "system", content: prompt }], { temperature: 0.2 });
  return cleanInstruction(response.content);
}

export async function executeAgentCommand(
  ctx: DispatchContext,
  device: DeviceState,
  command: ValidatedCommand,
  initialReply: string,
): Promise<CommandExecutionSummary> {
  const deviceLabel = ctx.registry.label(device.deviceId);
  const base = {
    deviceId: device.deviceId,
    commandName: AGENT_COMMAND_NAME,
    args: command.args,
    isAgent: true,
  };

  let instruction = typeof command.args.instruction === "string" ? command.args.instruction.trim() : "";
  if (!instruction) {
    try {
      instruction = await buildAgentInstruction(ctx, device, initialReply, command.args);
    } catch (error) {
      const errorText = `${deviceLabel} への指示を作成できませんでした: ${errorMessage(error)}`;
      log.error("Agent instruction translation failed", error, { deviceId: device.deviceId });
      return { ...base, summary: errorText, status: 500, errorText, result: null };
    }
    if (!instruction) {
      const errorText = `${deviceLabel} への指示を作成できませんでした。`;
      log.warn("Agent instruction translation returned nothing", { deviceId: device.deviceId });
      return { ...base, summary: errorText, status: 500, errorText, result: null };
    }
  }

  const args = { ...command.args, instruction };
  const jobId = enqueueOrNull(ctx, device.deviceId, { name: AGENT_COMMAND_NAME, args });
  if (!jobId) {
    return { ...base, args, instruction, summary: appendNotice(initialReply, ENQUEUE_FAILURE_NOTICE), status: 200, result: null };
  }

  const { summary, result } = await waitAndSummarize(ctx, device.deviceId, jobId, instruction, args, initialReply);
  return { ...base, args, instruction, summary, status: 200, result };
}
