import { z } from "zod";

import type { OllamaModelConfig } from "../../config/modelConfig";
import { OLLAMA_REASONING_REMINDER, OLLAMA_SYSTEM_PROMPT } from "../../generation/prompts";
import { BuildRequestInput, ExtractResult, extractWith, withTokenGuidance } from "./types";

export type OllamaRequest = {
  model: string;
  messages: [{ role: "system"; content: string }, { role: "user"; content: string }];
  stream: false;
  options: { temperature: number; top_p: number; num_predict: number };
};

// Text only: callers reject images before a request is built for this provider.
export function buildOllamaRequest(input: BuildRequestInput, config: OllamaModelConfig): OllamaRequest {
  const prompt = withTokenGuidance(input.prompt, config.maxTokens);
  return {
    model: config.model,
    messages: [
      { role: "system", content: OLLAMA_SYSTEM_PROMPT },
      { role: "user", content: `${prompt}\n\n${OLLAMA_REASONING_REMINDER}` },
    ],
    stream: false,
    options: {
      temperature: input.temperature ?? config.temperature,
      top_p: config.topP ?? 0.9,
      num_predict: config.maxTokens,
    },
  };
}

const OllamaResponseSchema = z.object({
  message: z.object({ content: z.string() }).passthrough(),
});

export function extractOllamaText(raw: unknown): ExtractResult {
  return extractWith("Ollama", raw, OllamaResponseSchema, (r) => r.message.content);
}
