import { describe, it, expect } from "vitest";
import {
  ENQUEUE_FAILURE_NOTICE,
  appendNotice,
  formatReturnValueForUser,
  manualResultReply,
  timeoutReply,
} from "./summary.js";
import type { DeviceResult } from "../devices/types.js";

function result(overrides: Partial<DeviceResult> = {}): DeviceResult {
  return {
    jobId: "job-1",
    deviceId: "d1",
    ok: true,
    returnValue: null,
    stdout: null,
    stderr: null,
    error: null,
    ts: null,
    receivedAt: 0,
    ...overrides,
  };
}

describe("formatReturnValueForUser", () => {
  it("says so when nothing was returned", () => {
    expect(formatReturnValueForUser(null)).toBe("値は返されませんでした。");
    expect(formatReturnValueForUser(undefined)).toBe("値は返されませんでした。");
  });

  it("prints primitives as-is", () => {
    expect(formatReturnValueForUser(21.5)).toBe("21.5");
    expect(formatReturnValueForUser(false)).toBe("false");
    expect(formatReturnValueForUser("hello")).toBe("hello");
  });

  it("prints other values as JSON", () => {
    expect(formatReturnValueForUser({ temp: 21.5 })).toBe('{"temp":21.5}');
    expect(formatReturnValueForUser([1, 2])).toBe("[1,2]");
  });

  it("puts an agent message first", () => {
    expect(formatReturnValueForUser({ message: "done", count: 2 })).toBe('done\n{"count":2}');
    expect(formatReturnValueForUser({ message: "only" })).toBe("only");
  });

  it("lists the steps of a multi-action payload", () => {
    const payload = {
      action: "multi_action_sequence",
      message: "read_sensor: 成功 / send_report: 失敗",
      result: {
        summary: { total_steps: 2, successful_steps: 1 },
        steps: [
          { step: 1, action: "read_sensor", ok: true, result: { value: 42 } },
          { step: 2, action: "send_report", ok: false, error: "ネットワークエラー" },
        ],
      },
    };

    expect(formatReturnValueForUser(payload)).toBe(
      [
        "複数ステップの実行結果:",
        "1. read_sensor: 成功",
        "2. send_report: 失敗 (エラー: ネットワークエラー)",
        "メッセージ: read_sensor: 成功 / send_report: 失敗",
      ].join("\n"),
    );
  });

  it("numbers steps by position when they carry no number", () => {
    const payload = { result: { steps: [{ action: "wave", ok: true }, { ok: false }] } };

    expect(formatReturnValueForUser(payload)).toBe(
      ["複数ステップの実行結果:", "1. wave: 成功", "2. 不明なアクション: 失敗"].join("\n"),
    );
  });
});

describe("manualResultReply", () => {
  it("summarizes a successful result", () => {
    const text = manualResultReply("Kitchen (ID: d1)", "led", result({ returnValue: { blinked: 3 }, stdout: " done \n" }));

    expect(text).toBe(
      [
        "Kitchen (ID: d1) でコマンド『led』を実行しました。",
        "結果: 成功",
        "ジョブID: job-1",
        '戻り値: {"blinked":3}',
        "標準出力: done",
      ].join("\n"),
    );
  });

  it("summarizes a failed result without a job id", () => {
    const text = manualResultReply("d1", "reboot", result({ jobId: null, ok: false, stderr: "  ", error: " boom " }));

    expect(text).toBe(
      ["d1 でコマンド『reboot』を実行しました。", "結果: 失敗", "戻り値: 値は返されませんでした。", "エラー: boom"].join("\n"),
    );
  });
});

describe("timeoutReply", () => {
  it("names the device, the command and whole seconds", () => {
    expect(timeoutReply("d1", "led", 90.7)).toBe(
      "d1 にコマンド『led』を送信しましたが、90秒以内に結果を受信できませんでした。\n" +
        "デバイスの状態を確認してから、もう一度お試しください。",
    );
  });

  it("keeps sub-second timeouts as fractions", () => {
    expect(timeoutReply("d1", "led", 0.5)).toContain("0.5秒以内に");
  });
});

describe("appendNotice", () => {
  it("appends on a new line", () => {
    expect(appendNotice("了解", ENQUEUE_FAILURE_NOTICE)).toBe("了解\n(注意: デバイスにコマンドを送信できませんでした。)");
    expect(appendNotice("", ENQUEUE_FAILURE_NOTICE)).toBe(ENQUEUE_FAILURE_NOTICE);
  });
});
