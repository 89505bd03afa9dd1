/**
 * LLM Client Factory
 *
 * All supported providers speak the OpenAI chat completions API, so one
 * client class covers them; only base URL and default model differ.
 */

import { OpenAICompatibleClient } from "./openai-compatible.js";
import type { ILLMClient, LLMClientOptions, LLMProvider, LLMProviderConfig } from "./types.js";

export const PROVIDER_CONFIGS: Record<LLMProvider, LLMProviderConfig> = {
  openai: {
    provider: "openai",
    baseUrl: "https://api.openai.com/v1",
    defaultModel: "gpt-4o-mini",
    apiKeyEnv: "OPENAI_API_KEY",
  },
  deepseek: {
    provider: "deepseek",
    baseUrl: "https://api.deepseek.com/v1",
    defaultModel: "deepseek-chat",
    apiKeyEnv: "DEEPSEEK_API_KEY",
  },
  xai: {
    provider: "xai",
    baseUrl: "https://api.x.ai/v1",
    defaultModel: "grok-3-mini",
    apiKeyEnv: "XAI_API_KEY",
  },
};

/**
 * Create an LLM client for the specified provider.
 * Throws when the API key is missing; callers surface that as a 500.
 */
export function createLLMClient(options: LLMClientOptions): ILLMClient {
  const { provider, apiKey, baseUrl, model } = options;
  const config = PROVIDER_CONFIGS[provider];
  if (!apiKey) {
    throw new Error(`${config.apiKeyEnv} is not set`);
  }
  return new OpenAICompatibleClient(provider, apiKey, baseUrl || config.baseUrl, model || config.defaultModel);
}
