import { describe, it, expect, beforeEach, vi } from "vitest";
import { DeviceRegistry } from "../devices/registry.js";
import {
  NO_DEVICES_TEXT,
  buildAgentInstructionPrompt,
  buildChatSystemPrompt,
  buildDeviceContext,
  formatTimestamp,
  resultForPrompt,
} from "./prompts.js";

vi.mock("../logging.js", () => ({
  createComponentLogger: () => ({ trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() }),
}));

const REGISTERED_AT = new Date(2024, 0, 2, 3, 4, 5).getTime();

let registry: DeviceRegistry;

beforeEach(() => {
  registry = new DeviceRegistry({ now: () => REGISTERED_AT });
});

describe("formatTimestamp", () => {
  it("formats local time", () => {
    expect(formatTimestamp(REGISTERED_AT)).toBe("2024-01-02 03:04:05");
  });
});

describe("buildDeviceContext", () => {
  it("says when nothing is registered", () => {
    expect(buildDeviceContext(registry)).toBe(NO_DEVICES_TEXT);
  });

  it("describes every device in id order", () => {
    registry.register({
      deviceId: "d1",
      capabilities: [
        {
          name: "led",
          description: "Blink the LED",
          params: [{ name: "times", type: "int", required: true, default: 3, description: "How many blinks" }],
        },
      ],
      meta: { display_name: "Kitchen" },
      approved: true,
    });
    registry.register({ deviceId: "a2", approved: true });

    expect(buildDeviceContext(registry)).toBe(
      [
        "Device ID: a2",
        "  Role: peripheral",
        "  Registered at: 2024-01-02 03:04:05",
        "  Last seen: 2024-01-02 03:04:05",
        "  Queue depth: 0",
        "  Capabilities:",
        "",
        "Device ID: d1",
        "  Friendly name: Kitchen",
        "  Role: peripheral",
        '  Meta: {"display_name":"Kitchen"}',
        "  Registered at: 2024-01-02 03:04:05",
        "  Last seen: 2024-01-02 03:04:05",
        "  Queue depth: 0",
        "  Capabilities:",
        "    - led: Blink the LED | params: times (int) required default=3 - How many blinks",
      ].join("\n"),
    );
  });

  it("includes the most recent result", () => {
    registry.register({ deviceId: "d1", capabilities: [{ name: "measure" }], approved: true });
    registry.get("d1").lastResult = {
      jobId: "job-1",
      deviceId: "d1",
      ok: true,
      returnValue: 21.5,
      stdout: null,
      stderr: null,
      error: null,
      ts: null,
      receivedAt: REGISTERED_AT,
    };

    const context = buildDeviceContext(registry);
    expect(context).toContain("    - measure:  | params: no parameters");
    expect(context).toContain('  Most recent result: {"job_id":"job-1","ok":true,"return_value":21.5}');
  });
});

describe("prompt builders", () => {
  it("puts the device context and agent command into the system prompt", async () => {
    const prompt = await buildChatSystemPrompt(registry);

    expect(prompt).toContain('send the command name "agent_instruction"');
    expect(prompt.endsWith(`Available device information:\n${NO_DEVICES_TEXT}`)).toBe(true);
  });

  it("shows the whole result to the model", () => {
    const text = resultForPrompt({
      jobId: "job-2",
      deviceId: "d1",
      ok: false,
      returnValue: null,
      stdout: "",
      stderr: null,
      error: "boom",
      ts: 1700000000,
      receivedAt: 0,
    });

    expect(JSON.parse(text)).toEqual({
      job_id: "job-2",
      ok: false,
      return_value: null,
      stdout: "",
      stderr: null,
      error: "boom",
      ts: 1700000000,
    });
  });

  it("writes (none) for an empty planned reply", async () => {
    const prompt = await buildAgentInstructionPrompt({
      deviceLabel: "a1",
      actions: [],
      initialReply: "",
      args: {},
    });

    expect(prompt).toContain("Assistant's planned reply: (none)");
  });
});
