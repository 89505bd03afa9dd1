/**
 * LLM Type Definitions
 *
 * The chat flow only needs text in, text out. Providers are reached through
 * the OpenAI chat completions wire format.
 */

export type LLMProvider = "openai" | "deepseek" | "xai";

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LLMRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a bare JSON object */
  responseFormat?: "json_object" | "text";
}

export interface LLMResponse {
  content: string;
  model: string;
  provider: LLMProvider;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface ILLMClient {
  provider: LLMProvider;
  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;
}

export interface LLMClientOptions {
  provider: LLMProvider;
  apiKey?: string;
  baseUrl?: string;
  model?: string;
}

export interface LLMProviderConfig {
  provider: LLMProvider;
  baseUrl: string;
  defaultModel: string;
  /** Environment variable holding the API key */
  apiKeyEnv: string;
}
