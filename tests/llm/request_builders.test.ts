import type { AnthropicModelConfig, OllamaModelConfig, OpenAiCompatibleModelConfig } from "../../src/config/modelConfig";
import { ProviderEntrySchema, toModelConfig } from "../../src/config/modelConfig";
import {
  ANTHROPIC_REASONING_REMINDER,
  ANTHROPIC_SYSTEM_PROMPT,
  OPENAI_SYSTEM_PROMPT,
  VISION_SYSTEM_PROMPT,
} from "../../src/generation/prompts";
import type { PreparedImage } from "../../src/images/preprocessImages";
import { buildAnthropicRequest } from "../../src/llm/providers/anthropic";
import { authorizeHeaders, buildProviderRequest } from "../../src/llm/providers";
import { buildOllamaRequest } from "../../src/llm/providers/ollama";
import { buildOpenAiCompatibleRequest } from "../../src/llm/providers/openaiCompatible";

const anthropic: AnthropicModelConfig = {
  provider: "anthropic",
  vendor: "anthropic",
  model: "m",
  maxTokens: 10,
  temperature: 0.3,
  apiEndpoint: "http://llm.local/v1/messages",
  apiKeyEnv: "TEST_ANTHROPIC_KEY",
  headers: { "anthropic-version": "2023-06-01" },
};

const ollama: OllamaModelConfig = {
  provider: "ollama",
  vendor: "ollama",
  model: "llama3.1",
  maxTokens: 4000,
  temperature: 0.7,
  apiEndpoint: "http://ollama.local/api/chat",
  headers: { "Content-Type": "application/json" },
};

const openai: OpenAiCompatibleModelConfig = {
  provider: "openai-compatible",
  vendor: "openai",
  model: "gpt-test",
  maxTokens: 4000,
  temperature: 0.7,
  presencePenalty: 0.2,
  apiEndpoint: "http://llm.local/v1/chat/completions",
  apiKeyEnv: "TEST_OPENAI_KEY",
  headers: { "Content-Type": "application/json" },
};

function image(name: string, base64: string): PreparedImage {
  return { name, base64, mediaType: "image/png", sizeBytes: 3 };
}

describe("Anthropic request builder", () => {
  test("text request has a system prompt, one user turn and the configured temperature", () => {
    const req = buildAnthropicRequest({ prompt: "X" }, anthropic);

    expect(req.model).toBe("m");
    expect(req.max_tokens).toBe(10);
    expect(req.temperature).toBe(0.3);
    expect(req.system).toBe(ANTHROPIC_SYSTEM_PROMPT);
    expect(req.system.length).toBeGreaterThan(0);
    expect(req.messages).toHaveLength(1);
    expect(req.messages[0].role).toBe("user");
    expect(req.messages[0].content).toBe(
      "X\n\nYour response should be complete and no longer than approximately 9 tokens.\n\n" + ANTHROPIC_REASONING_REMINDER
    );
  });

  test("temperature override wins over the configured value", () => {
    expect(buildAnthropicRequest({ prompt: "X", temperature: 0.5 }, anthropic).temperature).toBe(0.5);
  });

  test("images precede a single text block", () => {
    const req = buildAnthropicRequest({ prompt: "X", images: [image("a.png", "AAA"), image("b.png", "BBB")] }, anthropic);
    const content = req.messages[0].content;
    if (typeof content === "string") throw new Error("expected content blocks");

    expect(req.system).toBe(VISION_SYSTEM_PROMPT);
    expect(content).toHaveLength(3);
    expect(content.map((b) => b.type)).toEqual(["image", "image", "text"]);
    expect(content[0]).toEqual({ type: "image", source: { type: "base64", media_type: "image/png", data: "AAA" } });
    expect(content[1]).toEqual({ type: "image", source: { type: "base64", media_type: "image/png", data: "BBB" } });

    const last = content[2];
    if (last.type !== "text") throw new Error("expected a text block");
    expect(last.text.startsWith("Please analyze the 2 image(s) I've shared above")).toBe(true);
    expect(last.text).toContain("\n\nX\n\nYour response should be complete");
  });

  test("an empty image list builds the text request", () => {
    const req = buildAnthropicRequest({ prompt: "X", images: [] }, anthropic);
    expect(typeof req.messages[0].content).toBe("string");
  });
});

describe("Ollama request builder", () => {
  test("uses system + user messages, stream=false and options", () => {
    const req = buildOllamaRequest({ prompt: "X" }, ollama);

    expect(req.model).toBe("llama3.1");
    expect(req.stream).toBe(false);
    expect(req.messages.map((m) => m.role)).toEqual(["system", "user"]);
    expect(req.options).toEqual({ temperature: 0.7, top_p: 0.9, num_predict: 4000 });
    expect(req.messages[1].content.startsWith("X\n\nYour response should be complete and no longer than approximately 3600 tokens.")).toBe(true);
  });

  test("temperature override goes into options", () => {
    expect(buildOllamaRequest({ prompt: "X", temperature: 1.2 }, { ...ollama, topP: 0.5 }).options).toEqual({
      temperature: 1.2,
      top_p: 0.5,
      num_predict: 4000,
    });
  });
});

describe("OpenAI-compatible request builder", () => {
  const shortContext = { description: "x".repeat(999), personas: "", themes: "" };
  const longContext = { description: "x".repeat(1001), personas: "", themes: "" };

  test("max_tokens follows the context-length heuristic", () => {
    expect(buildOpenAiCompatibleRequest({ prompt: "X", context: shortContext }, openai).max_tokens).toBe(1600);
    expect(buildOpenAiCompatibleRequest({ prompt: "X", context: longContext }, openai).max_tokens).toBe(1400);
  });

  test("falls back to the configured max_tokens without context", () => {
    expect(buildOpenAiCompatibleRequest({ prompt: "X" }, openai).max_tokens).toBe(4000);
  });

  test("carries sampling parameters with defaults", () => {
    const req = buildOpenAiCompatibleRequest({ prompt: "X", temperature: 1.1 }, openai);

    expect(req.model).toBe("gpt-test");
    expect(req.temperature).toBe(1.1);
    expect(req.top_p).toBe(0.9);
    expect(req.presence_penalty).toBe(0.2);
    expect(req.messages[0]).toEqual({ role: "system", content: OPENAI_SYSTEM_PROMPT });
    expect(req.messages[1].role).toBe("user");
  });

  test("vision content lists data-URI images with detail high, then text", () => {
    const req = buildOpenAiCompatibleRequest({ prompt: "X", images: [image("a.png", "AAA")] }, openai);
    const content = req.messages[1].content;
    if (typeof content === "string") throw new Error("expected content parts");

    expect(req.messages[0].content).toBe(VISION_SYSTEM_PROMPT);
    expect(content).toHaveLength(2);
    expect(content[0]).toEqual({ type: "image_url", image_url: { url: "data:image/png;base64,AAA", detail: "high" } });
    expect(content[1].type).toBe("text");
  });
});

describe("provider dispatch", () => {
  test("an unrecognised provider label builds the OpenAI-compatible shape", () => {
    const config = toModelConfig(
      "mystery",
      ProviderEntrySchema.parse({
        provider: "mystery-vendor",
        model: "m",
        max_tokens: 100,
        api_endpoint: "http://llm.local/v1/chat/completions",
        api_key_env: "TEST_KEY",
      })
    );

    expect(config.provider).toBe("openai-compatible");
    const req = buildProviderRequest({ prompt: "X" }, config);
    expect(Object.keys(req).sort()).toEqual(["max_tokens", "messages", "model", "presence_penalty", "temperature", "top_p"]);
  });

  test("authorizeHeaders adds the provider credential without touching the config", () => {
    expect(authorizeHeaders(anthropic, "test-key")).toEqual({ "anthropic-version": "2023-06-01", "x-api-key": "test-key" });
    expect(authorizeHeaders(openai, "test-key")).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-key" });
    expect(authorizeHeaders(ollama, undefined)).toEqual({ "Content-Type": "application/json" });
    expect(anthropic.headers).toEqual({ "anthropic-version": "2023-06-01" });
  });
});
