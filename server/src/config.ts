/**
 * Server Configuration
 *
 * Environment variables for the HTTP listener, the device result wait and
 * LLM provider selection. `.env` at the repository root is loaded by
 * index.ts before this is read.
 */

import { PROVIDER_CONFIGS } from "./llm/providers.js";
import type { LLMProvider } from "./llm/types.js";

export interface ServerConfig {
  port: number;
  host: string;
  /** Seconds a chat turn waits for a device result */
  deviceResultTimeoutSec: number;
  /** Accept results without a device id when exactly one device is registered */
  assumeSingleDevice: boolean;
  llm: {
    provider: LLMProvider;
    apiKey: string;
    model?: string;
    baseUrl?: string;
  };
}

export const DEFAULT_PORT = 5006;
export const DEFAULT_DEVICE_RESULT_TIMEOUT_SEC = 90;

const PROVIDER_ORDER: LLMProvider[] = ["openai", "deepseek", "xai"];

function isProvider(value: string): value is LLMProvider {
  return Object.prototype.hasOwnProperty.call(PROVIDER_CONFIGS, value);
}

function parsePositiveNumber(raw: string | undefined, fallback: number): number {
  if (!raw?.trim()) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (!raw?.trim()) return fallback;
  return !["0", "false", "no", "off"].includes(raw.trim().toLowerCase());
}

/**
 * Provider priority: explicit LLM_PROVIDER, then the first provider with a
 * key (OpenAI, DeepSeek, xAI), then OpenAI without a key. A missing key is
 * not fatal here; the chat route reports it per request.
 */
function selectProvider(env: NodeJS.ProcessEnv): LLMProvider {
  const explicit = env.LLM_PROVIDER?.trim().toLowerCase();
  if (explicit && isProvider(explicit)) return explicit;
  const withKey = PROVIDER_ORDER.find((provider) => env[PROVIDER_CONFIGS[provider].apiKeyEnv]?.trim());
  if (withKey) return withKey;
  return "openai";
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const provider = selectProvider(env);
  return {
    port: Math.trunc(parsePositiveNumber(env.PORT, DEFAULT_PORT)),
    host: env.HOST?.trim() || "0.0.0.0",
    deviceResultTimeoutSec: parsePositiveNumber(env.DEVICE_RESULT_TIMEOUT, DEFAULT_DEVICE_RESULT_TIMEOUT_SEC),
    assumeSingleDevice: parseBoolean(env.ASSUME_SINGLE_DEVICE, true),
    llm: {
      provider,
      apiKey: env[PROVIDER_CONFIGS[provider].apiKeyEnv]?.trim() || "",
      model: env.LLM_MODEL?.trim() || undefined,
      baseUrl: env.LLM_BASE_URL?.trim() || undefined,
    },
  };
}
