/**
 * Chat Turn
 *
 * One user message in, one reply out: ask the model, validate the device
 * commands it proposes, run them in order and answer with the combined
 * summary.
 */

import { createComponentLogger } from "../logging.js";
import { BadRequestError, UpstreamError } from "../errors.js";
import { validateCommandSequence } from "../devices/validator.js";
import { parseModelOutput } from "./model-output.js";
import { buildChatSystemPrompt } from "./prompts.js";
import { appendNotice } from "./summary.js";
import { executeCommandSequence, type CommandExecutors } from "./sequencer.js";
import type { ExecutionStatus } from "./dispatcher.js";
import type { DeviceRegistry } from "../devices/registry.js";
import type { JobQueue } from "../devices/job-queue.js";
import type { ILLMClient, LLMMessage } from "../llm/types.js";

const log = createComponentLogger("dispatch.chat");

const CHAT_ROLES = new Set<string>(["system", "user", "assistant"]);

export interface ChatDeps {
  registry: DeviceRegistry;
  queue: JobQueue;
  /** Throws when no client can be built (e.g. missing API key) */
  createLLM: () => ILLMClient;
  resultTimeoutMs: number;
  executors?: CommandExecutors;
}

export interface ChatTurnOutcome {
  status: ExecutionStatus;
  reply: string;
}

function isChatMessage(value: unknown): value is LLMMessage {
  if (typeof value !== "object" || value === null) return false;
  const role: unknown = Reflect.get(value, "role");
  const content: unknown = Reflect.get(value, "content");
  return typeof role === "string" && CHAT_ROLES.has(role) && typeof content === "string";
}

/**
 * Keep well-formed {role, content} entries. The conversation must end
 * with a user message.
 */
export function normalizeChatMessages(raw: unknown): LLMMessage[] {
  if (!Array.isArray(raw)) {
    throw new BadRequestError("messages must be a list");
  }
  const messages = raw.filter(isChatMessage).map((m) => ({ role: m.role, content: m.content }));
  if (messages.length === 0 || messages[messages.length - 1].role !== "user") {
    throw new BadRequestError("last message must be from user");
  }
  return messages;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function runChatTurn(deps: ChatDeps, rawMessages: unknown): Promise<ChatTurnOutcome> {
  const messages = normalizeChatMessages(rawMessages);

  let llm: ILLMClient;
  try {
    llm = deps.createLLM();
  } catch (error) {
    log.error("LLM client unavailable", error);
    throw new UpstreamError(describeError(error), error);
  }

  const systemPrompt = await buildChatSystemPrompt(deps.registry);
  let content: string;
  try {
    const response = await llm.chat([{ role: "system", content: systemPrompt }, ...messages], {
      responseFormat: "json_object",
    });
    content = response.content;
  } catch (error) {
    log.error("Chat completion failed", error, { provider: llm.provider });
    throw new UpstreamError(describeError(error), error);
  }

  const parsed = parseModelOutput(content);
  const proposed = parsed.deviceCommands.length > 0 ? parsed.deviceCommands : null;
  const { commands, errors } = validateCommandSequence(deps.registry, proposed);

  if (errors.length > 0) {
    const notice = errors.map((error) => `(注意: ${error})`).join("\n");
    return { status: 200, reply: appendNotice(parsed.reply, notice) };
  }
  if (commands.length === 0) {
    return { status: 200, reply: parsed.reply };
  }

  log.info("Executing device commands", { count: commands.length });
  const outcome = await executeCommandSequence(
    {
      registry: deps.registry,
      queue: deps.queue,
      llm,
      resultTimeoutMs: deps.resultTimeoutMs,
      messages,
    },
    commands,
    parsed.reply,
    deps.executors,
  );
  return { status: outcome.status, reply: outcome.reply };
}
