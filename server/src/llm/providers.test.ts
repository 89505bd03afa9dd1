import { describe, it, expect, afterEach, vi } from "vitest";
import { createLLMClient } from "./providers.js";
import { OpenAICompatibleClient } from "./openai-compatible.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("createLLMClient", () => {
  it("names the missing key variable", () => {
    expect(() => createLLMClient({ provider: "openai" })).toThrow("OPENAI_API_KEY is not set");
    expect(() => createLLMClient({ provider: "deepseek", apiKey: "" })).toThrow("DEEPSEEK_API_KEY is not set");
  });

  it("uses the provider defaults", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ choices: [{ message: { content: "hi" } }] }));
    vi.stubGlobal("fetch", fetchMock);

    const client = createLLMClient({ provider: "xai", apiKey: "test-secret" });
    const response = await client.chat([{ role: "user", content: "hello" }]);

    expect(client.provider).toBe("xai");
    expect(response.model).toBe("grok-3-mini");
    expect(fetchMock.mock.calls[0][0]).toBe("https://api.x.ai/v1/chat/completions");
  });
});

describe("OpenAICompatibleClient", () => {
  it("posts a chat completion and reads the reply", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({
        choices: [{ message: { content: '{"reply": "ok"}' } }],
        usage: { prompt_tokens: 12, completion_tokens: 3 },
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new OpenAICompatibleClient("openai", "test-secret", "http://localhost:1234/v1/", "test-model");
    const response = await client.chat([{ role: "user", content: "hello" }], { responseFormat: "json_object" });

    expect(response).toEqual({
      content: '{"reply": "ok"}',
      model: "test-model",
      provider: "openai",
      usage: { inputTokens: 12, outputTokens: 3 },
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:1234/v1/chat/completions");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "hello" }],
      temperature: 0.3,
      max_tokens: 2048,
      stream: false,
      response_format: { type: "json_object" },
    });
  });

  it("treats a null message content as empty", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ choices: [{ message: { content: null } }] })));

    const client = new OpenAICompatibleClient("openai", "test-secret", "http://localhost:1234/v1", "test-model");
    const response = await client.chat([{ role: "user", content: "hello" }]);

    expect(response.content).toBe("");
    expect(response.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
  });

  it("reports HTTP errors with the body", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(new Response("rate limited", { status: 429 })));

    const client = new OpenAICompatibleClient("deepseek", "test-secret", "http://localhost:1234/v1", "test-model");

    await expect(client.chat([{ role: "user", content: "hello" }])).rejects.toThrow("deepseek API error: 429 rate limited");
  });

  it("rejects an unexpected response shape", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ choices: [] })));

    const client = new OpenAICompatibleClient("openai", "test-secret", "http://localhost:1234/v1", "test-model");

    await expect(client.chat([{ role: "user", content: "hello" }])).rejects.toThrow(
      "openai API returned an unexpected response shape",
    );
  });
});
