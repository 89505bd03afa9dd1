/**
 * Deterministic, user-facing result texts. These never need the model,
 * so every dispatch outcome has something to say even when the LLM is
 * unreachable.
 */

import { isJsonObject } from "./json-extract.js";
import type { DeviceResult } from "../devices/types.js";

export const NO_RETURN_VALUE_TEXT = "値は返されませんでした。";
export const ENQUEUE_FAILURE_NOTICE = "(注意: デバイスにコマンドを送信できませんでした。)";

function isMultiStepPayload(value: Record<string, unknown>): boolean {
  if (value.action === "multi_action_sequence") return true;
  return isJsonObject(value.result) && Array.isArray(value.result.steps);
}

function multiStepLines(value: Record<string, unknown>): string[] {
  const nested = isJsonObject(value.result) ? value.result.steps : undefined;
  const steps = Array.isArray(nested) ? nested : Array.isArray(value.steps) ? value.steps : [];

  const lines = ["複数ステップの実行結果:"];
  steps.forEach((step: unknown, index: number) => {
    if (!isJsonObject(step)) return;
    const number = typeof step.step === "number" ? step.step : index + 1;
    const action = typeof step.action === "string" && step.action.trim() ? step.action.trim() : "不明なアクション";
    if (step.ok === true) {
      lines.push(`${number}. ${action}: 成功`);
      return;
    }
    const error = typeof step.error === "string" && step.error.trim() ? ` (エラー: ${step.error.trim()})` : "";
    lines.push(`${number}. ${action}: 失敗${error}`);
  });

  if (typeof value.message === "string" && value.message.trim()) {
    lines.push(`メッセージ: ${value.message.trim()}`);
  }
  return lines;
}

export function formatReturnValueForUser(value: unknown): string {
  if (value === null || value === undefined) return NO_RETURN_VALUE_TEXT;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }

  if (isJsonObject(value)) {
    if (isMultiStepPayload(value)) {
      return multiStepLines(value).join("\n");
    }
    if (typeof value.message === "string") {
      const { message, ...rest } = value;
      return Object.keys(rest).length > 0 ? `${message}\n${JSON.stringify(rest)}` : message;
    }
  }
  return JSON.stringify(value) ?? String(value);
}

/** Result summary in the form "{label} でコマンド『{name}』を実行しました。" plus detail lines */
export function manualResultReply(deviceLabel: string, commandName: string, result: DeviceResult): string {
  const lines = [
    `${deviceLabel} でコマンド『${commandName}』を実行しました。`,
    `結果: ${result.ok ? "成功" : "失敗"}`,
  ];

  if (result.jobId) {
    lines.push(`ジョブID: ${result.jobId}`);
  }
  lines.push(`戻り値: ${formatReturnValueForUser(result.returnValue)}`);

  const stdout = result.stdout?.trim();
  if (stdout) lines.push(`標準出力: ${stdout}`);
  const stderr = result.stderr?.trim();
  if (stderr) lines.push(`標準エラー: ${stderr}`);
  const error = result.error?.trim();
  if (error) lines.push(`エラー: ${error}`);

  return lines.join("\n");
}

export function timeoutReply(deviceLabel: string, commandName: string, timeoutSec: number): string {
  const seconds = timeoutSec >= 1 ? Math.trunc(timeoutSec) : timeoutSec;
  return (
    `${deviceLabel} にコマンド『${commandName}』を送信しましたが、` +
    `${seconds}秒以内に結果を受信できませんでした。\n` +
    "デバイスの状態を確認してから、もう一度お試しください。"
  );
}

export function appendNotice(reply: string, notice: string): string {
  return reply ? `${reply}\n${notice}` : notice;
}
