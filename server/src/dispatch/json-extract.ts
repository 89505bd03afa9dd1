/**
 * JSON-in-prose extraction.
 *
 * Models often wrap their JSON answer in chatter ("Sure! {...} Hope that
 * helps"). `extractJsonObject` finds the first balanced `{...}` span that
 * parses as a JSON object, tracking string literals and escapes so braces
 * inside strings do not count.
 */

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Index of the brace closing the object opened at `start`, or -1. */
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }
    if (ch === "\"") {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function tryParseObject(candidate: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function extractJsonObject(text: string): JsonObject | null {
  let start = text.indexOf("{");
  while (start !== -1) {
    const end = findClosingBrace(text, start);
    if (end !== -1) {
      const parsed = tryParseObject(text.slice(start, end + 1));
      if (parsed) return parsed;
    }
    start = text.indexOf("{", start + 1);
  }
  return null;
}
