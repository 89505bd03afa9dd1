/**
 * Dispatch-and-Wait Tests
 *
 * A real registry and queue; the test plays the device by dequeuing the
 * job and posting its result.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { DeviceRegistry } from "../devices/registry.js";
import { JobQueue } from "../devices/job-queue.js";
import { executeAgentCommand, executeStandardCommand, type DispatchContext } from "./dispatcher.js";
import type { ILLMClient } from "../llm/types.js";

vi.mock("../logging.js", () => ({
  createComponentLogger: () => ({ trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() }),
}));

let registry: DeviceRegistry;
let queue: JobQueue;

function fakeLLM(...replies: Array<string | Error>) {
  const chat = vi.fn<ILLMClient["chat"]>();
  for (const reply of replies) {
    if (reply instanceof Error) {
      chat.mockRejectedValueOnce(reply);
    } else {
      chat.mockResolvedValueOnce({ content: reply, model: "test-model", provider: "openai" });
    }
  }
  const client: ILLMClient = { provider: "openai", chat };
  return { client, chat };
}

function context(llm: ILLMClient | null, resultTimeoutMs = 5_000): DispatchContext {
  return {
    registry,
    queue,
    llm,
    resultTimeoutMs,
    messages: [{ role: "user", content: "温度を測って" }],
  };
}

beforeEach(() => {
  let n = 0;
  registry = new DeviceRegistry();
  queue = new JobQueue(registry, { generateJobId: () => `job-${++n}` });
  registry.register({
    deviceId: "d1",
    capabilities: [{ name: "measure" }],
    meta: { display_name: "Kitchen" },
    approved: true,
  });
  registry.register({
    deviceId: "a1",
    capabilities: [{ name: "agent_instruction" }],
    meta: { role: "llm_agent" },
    approved: true,
  });
});

afterEach(() => {
  vi.useRealTimers();
});

// ============================================
// STANDARD DEVICES
// ============================================

describe("executeStandardCommand", () => {
  it("summarizes the device result without a model", async () => {
    const pending = executeStandardCommand(context(null), { deviceId: "d1", name: "measure", args: {} }, "測定します");

    expect(queue.dequeueNext("d1")).toEqual({ job_id: "job-1", command: { name: "measure", args: {} } });
    queue.postResult({ deviceId: "d1", jobId: "job-1" }, { ok: true, returnValue: 21.5 });

    const summary = await pending;
    expect(summary).toMatchObject({
      deviceId: "d1",
      commandName: "measure",
      isAgent: false,
      status: 200,
      summary: "Kitchen (ID: d1) でコマンド『measure』を実行しました。\n結果: 成功\nジョブID: job-1\n戻り値: 21.5",
    });
    expect(summary.result?.returnValue).toBe(21.5);
  });

  it("uses the model's follow-up reply when it has one", async () => {
    const { client, chat } = fakeLLM('{"reply": "キッチンは21.5度です。", "device_commands": null}');
    const pending = executeStandardCommand(context(client), { deviceId: "d1", name: "measure", args: {} }, "測定します");
    queue.postResult({ deviceId: "d1", jobId: "job-1" }, { ok: true, returnValue: 21.5 });

    const summary = await pending;
    expect(summary.summary).toBe("キッチンは21.5度です。");

    const messages = chat.mock.calls[0][0];
    expect(messages[0]).toEqual({ role: "user", content: "温度を測って" });
    expect(messages[1]).toEqual({ role: "assistant", content: "測定します" });
    expect(messages[2].role).toBe("system");
    expect(messages[2].content).toContain("Device: Kitchen (ID: d1)\nCommand: measure\nArguments: {}");
  });

  it("falls back to the manual summary when the follow-up fails", async () => {
    const { client } = fakeLLM(new Error("rate limited"));
    const pending = executeStandardCommand(context(client), { deviceId: "d1", name: "measure", args: {} }, "");
    queue.postResult({ deviceId: "d1", jobId: "job-1" }, { ok: false, error: "sensor offline" });

    const summary = await pending;
    expect(summary.summary).toBe(
      "Kitchen (ID: d1) でコマンド『measure』を実行しました。\n結果: 失敗\nジョブID: job-1\n戻り値: 値は返されませんでした。\nエラー: sensor offline",
    );
    expect(summary.status).toBe(200);
  });

  it("falls back to the manual summary when the follow-up is blank", async () => {
    const { client } = fakeLLM('{"reply": "   "}');
    const pending = executeStandardCommand(context(client), { deviceId: "d1", name: "measure", args: {} }, "");
    queue.postResult({ deviceId: "d1", jobId: "job-1" }, { ok: true });

    expect((await pending).summary).toContain("結果: 成功");
  });

  it("reports a timeout", async () => {
    vi.useFakeTimers();
    const pending = executeStandardCommand(context(null, 500), { deviceId: "d1", name: "measure", args: {} }, "");

    await vi.advanceTimersByTimeAsync(500);

    const summary = await pending;
    expect(summary.summary).toBe(
      "Kitchen (ID: d1) にコマンド『measure』を送信しましたが、0.5秒以内に結果を受信できませんでした。\n" +
        "デバイスの状態を確認してから、もう一度お試しください。",
    );
    expect(summary.status).toBe(200);
    expect(summary.result).toBeNull();
  });

  it("appends a notice when the device has vanished", async () => {
    const summary = await executeStandardCommand(context(null), { deviceId: "gone", name: "measure", args: {} }, "了解");

    expect(summary.summary).toBe("了解\n(注意: デバイスにコマンドを送信できませんでした。)");
    expect(summary.status).toBe(200);
  });
});

// ============================================
// AGENT DEVICES
// ============================================

describe("executeAgentCommand", () => {
  it("sends a given instruction as the agent command", async () => {
    const device = registry.get("a1");
    const pending = executeAgentCommand(
      context(null),
      device,
      { deviceId: "a1", name: "agent_instruction", args: { instruction: " Take a photo " } },
      "",
    );

    expect(queue.dequeueNext("a1")).toEqual({
      job_id: "job-1",
      command: { name: "agent_instruction", args: { instruction: "Take a photo" } },
    });
    queue.postResult({ deviceId: "a1", jobId: "job-1" }, { ok: true });

    const summary = await pending;
    expect(summary).toMatchObject({
      deviceId: "a1",
      commandName: "agent_instruction",
      instruction: "Take a photo",
      isAgent: true,
      status: 200,
      summary: "a1 でコマンド『Take a photo』を実行しました。\n結果: 成功\nジョブID: job-1\n戻り値: 値は返されませんでした。",
    });
  });

  it("builds the instruction with the model when none is given", async () => {
    const { client, chat } = fakeLLM('```\n"Water the plants."\nextra line\n```', '{"reply": "水やりを終えました。"}');
    const device = registry.get("a1");
    const pending = executeAgentCommand(
      context(client),
      device,
      { deviceId: "a1", name: "agent_instruction", args: { ml: 200 } },
      "水やりをします",
    );

    await vi.waitFor(() => expect(queue.queueDepth("a1")).toBe(1));
    expect(queue.dequeueNext("a1")?.command).toEqual({
      name: "agent_instruction",
      args: { ml: 200, instruction: "Water the plants." },
    });
    queue.postResult({ deviceId: "a1", jobId: "job-1" }, { ok: true });

    const summary = await pending;
    expect(summary.instruction).toBe("Water the plants.");
    expect(summary.summary).toBe("水やりを終えました。");
    expect(chat).toHaveBeenCalledTimes(2);
    expect(chat.mock.calls[0][0][1].content).toContain("Assistant's planned reply: 水やりをします");
  });

  it("fails hard when the model gives no instruction", async () => {
    const { client } = fakeLLM("   ");
    const summary = await executeAgentCommand(
      context(client),
      registry.get("a1"),
      { deviceId: "a1", name: "agent_instruction", args: {} },
      "",
    );

    expect(summary.status).toBe(500);
    expect(summary.errorText).toBe("a1 への指示を作成できませんでした。");
    expect(queue.queueDepth("a1")).toBe(0);
  });

  it("fails hard with the error when the model call throws", async () => {
    const { client } = fakeLLM(new Error("rate limited"));
    const summary = await executeAgentCommand(
      context(client),
      registry.get("a1"),
      { deviceId: "a1", name: "agent_instruction", args: {} },
      "",
    );

    expect(summary.status).toBe(500);
    expect(summary.summary).toBe("a1 への指示を作成できませんでした: rate limited");
  });

  it("fails hard without a model to translate", async () => {
    const summary = await executeAgentCommand(
      context(null),
      registry.get("a1"),
      { deviceId: "a1", name: "agent_instruction", args: {} },
      "",
    );

    expect(summary.errorText).toBe("a1 への指示を作成できませんでした: LLM client is not available");
  });
});
