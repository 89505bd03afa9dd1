/**
 * Multi-Step Sequencer
 *
 * Runs validated commands one after another. Each step sees the previous
 * step's summary as its initial reply. A hard failure stops the run; a
 * device answering `ok: false` does not.
 */

import { createComponentLogger } from "../logging.js";
import { resolveDeviceRole } from "../devices/capabilities.js";
import { executeAgentCommand, executeStandardCommand } from "./dispatcher.js";
import { parseModelOutput } from "./model-output.js";
import { buildSequenceSummaryPrompt, resultForPrompt, type SequenceStepDigest } from "./prompts.js";
import type { CommandExecutionSummary, DispatchContext, ExecutionStatus } from "./dispatcher.js";
import type { ValidatedCommand } from "../devices/validator.js";
import type { DeviceState } from "../devices/types.js";

const log = createComponentLogger("dispatch.sequencer");

export interface CommandExecutors {
  standard(ctx: DispatchContext, command: ValidatedCommand, initialReply: string): Promise<CommandExecutionSummary>;
  agent(
    ctx: DispatchContext,
    device: DeviceState,
    command: ValidatedCommand,
    initialReply: string,
  ): Promise<CommandExecutionSummary>;
}

export const DEFAULT_EXECUTORS: CommandExecutors = {
  standard: executeStandardCommand,
  agent: executeAgentCommand,
};

export interface SequenceOutcome {
  reply: string;
  status: ExecutionStatus;
  steps: CommandExecutionSummary[];
}

const STEP_SEPARATOR = "\n\n";

function joinSummaries(steps: CommandExecutionSummary[]): string {
  return steps.map((step) => step.summary).join(STEP_SEPARATOR);
}

async function aggregateSummaries(ctx: DispatchContext, steps: CommandExecutionSummary[]): Promise<string> {
  const fallback = joinSummaries(steps);
  if (!ctx.llm) return fallback;

  const digests: SequenceStepDigest[] = steps.map((step) => ({
    deviceLabel: ctx.registry.label(step.deviceId),
    task: step.instruction ?? step.commandName,
    args: step.args,
    outcome: step.result ? resultForPrompt(step.result) : step.summary,
  }));

  try {
    const prompt = await buildSequenceSummaryPrompt(digests);
    const response = await ctx.llm.chat([...ctx.messages, { role: "system", content: prompt }], {
      responseFormat: "json_object",
    });
    const reply = parseModelOutput(response.content).reply.trim();
    return reply || fallback;
  } catch (error) {
    log.warn("Sequence summary failed, joining step summaries", {
      steps: steps.length,
      error: error instanceof Error ? error.message : String(error),
    });
    return fallback;
  }
}

export async function executeCommandSequence(
  ctx: DispatchContext,
  commands: ValidatedCommand[],
  initialReply: string,
  executors: CommandExecutors = DEFAULT_EXECUTORS,
): Promise<SequenceOutcome> {
  const steps: CommandExecutionSummary[] = [];
  let previousReply = initialReply;

  for (const [index, command] of commands.entries()) {
    const device = ctx.registry.find(command.deviceId);
    const step =
      device && resolveDeviceRole(device) === "agent"
        ? await executors.agent(ctx, device, command, previousReply)
        : await executors.standard(ctx, command, previousReply);

    if (step.status >= 400) {
      log.warn("Command sequence aborted", { step: index + 1, of: commands.length, status: step.status });
      const failure = step.errorText ?? step.summary;
      return {
        reply: [...steps.map((done) => done.summary), failure].join(STEP_SEPARATOR),
        status: step.status,
        steps: [...steps, step],
      };
    }

    steps.push(step);
    previousReply = step.summary;
  }

  if (steps.length === 0) {
    return { reply: initialReply, status: 200, steps };
  }
  if (steps.length === 1) {
    return { reply: steps[0].summary, status: 200, steps };
  }
  return { reply: await aggregateSummaries(ctx, steps), status: 200, steps };
}
