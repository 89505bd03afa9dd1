/**
 * Model Output Parsing
 *
 * Turns the raw text of a chat completion into a reply and a list of
 * proposed device commands. Accepts bare JSON, fenced JSON, JSON embedded
 * in prose, and plain text (which becomes the reply with no commands).
 */

import { extractJsonObject, isJsonObject, type JsonObject } from "./json-extract.js";

export interface ParsedModelOutput {
  reply: string;
  /** Unvalidated command objects in the order the model listed them */
  deviceCommands: unknown[];
  raw: string;
}

const FENCE_PATTERN = /^```[a-zA-Z0-9_-]*\s*\n?([\s\S]*?)\n?```$/;

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(FENCE_PATTERN);
  return match ? match[1].trim() : trimmed;
}

function parseDirect(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * `device_commands` (a list or a single object) wins over the older
 * single-command `device_command` key; a null or missing value falls
 * through to the other key.
 */
function collectCommands(parsed: JsonObject): unknown[] {
  const source = parsed.device_commands ?? parsed.device_command;
  if (Array.isArray(source)) return [...source];
  if (isJsonObject(source)) return [source];
  return [];
}

export function parseModelOutput(text: string): ParsedModelOutput {
  const parsed = parseDirect(stripCodeFences(text)) ?? extractJsonObject(text);
  if (!parsed) {
    return { reply: text.trim(), deviceCommands: [], raw: text };
  }

  const reply = typeof parsed.reply === "string" ? parsed.reply : text.trim();
  return { reply, deviceCommands: collectCommands(parsed), raw: text };
}
