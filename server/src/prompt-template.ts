/**
 * Prompt Template Helper
 *
 * Reads .md prompt files and injects values into |* Field *| placeholders.
 *
 * Usage:
 *   const prompt = await loadPrompt("dispatch/prompts/chat-system.md", {
 *     "Device Context": buildDeviceContext(registry),
 *   });
 */

import { readFile } from "fs/promises";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { createComponentLogger } from "./logging.js";

const log = createComponentLogger("prompt-template");

const __dirname = dirname(fileURLToPath(import.meta.url));

const templateCache = new Map<string, string>();

/**
 * Replace |* FieldName *| placeholders. Field names match
 * case-insensitively; an unknown field renders as `[MISSING: name]`.
 */
export function renderTemplate(template: string, fields: Record<string, string>, name = "inline"): string {
  return template.replace(/\|\*\s*([^*]+?)\s*\*\|/g, (_match, fieldName: string) => {
    const key = fieldName.trim().toLowerCase();
    const entry = Object.entries(fields).find(([k]) => k.toLowerCase() === key);
    if (entry) {
      return entry[1];
    }
    log.warn("Unresolved prompt placeholder", { field: fieldName.trim(), template: name });
    return `[MISSING: ${fieldName.trim()}]`;
  });
}

/**
 * Load a prompt template from a .md file relative to src/ and inject field
 * values. Files are read once per process.
 */
export async function loadPrompt(relativePath: string, fields: Record<string, string>): Promise<string> {
  const fullPath = resolve(__dirname, relativePath);

  let template = templateCache.get(fullPath);
  if (template === undefined) {
    try {
      template = await readFile(fullPath, "utf-8");
    } catch (e) {
      log.error("Failed to read prompt template", e, { path: fullPath });
      throw new Error(`Prompt template not found: ${fullPath}`);
    }
    templateCache.set(fullPath, template);
  }

  return renderTemplate(template, fields, relativePath).trim();
}
