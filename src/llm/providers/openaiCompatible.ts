import { z } from "zod";

import type { OpenAiCompatibleModelConfig } from "../../config/modelConfig";
import { OPENAI_REASONING_REMINDER, OPENAI_SYSTEM_PROMPT, VISION_SYSTEM_PROMPT, visionTextBlock } from "../../generation/prompts";
import { calculateMaxTokens } from "../maxTokens";
import { BuildRequestInput, ExtractResult, extractWith, hasImages, withTokenGuidance } from "./types";

export type OpenAiContentPart =
  | { type: "image_url"; image_url: { url: string; detail: "high" } }
  | { type: "text"; text: string };

export type OpenAiCompatibleRequest = {
  model: string;
  messages: [{ role: "system"; content: string }, { role: "user"; content: string | OpenAiContentPart[] }];
  max_tokens: number;
  temperature: number;
  top_p: number;
  presence_penalty: number;
};

function toDataUrl(base64: string, mediaType: string): string {
  return `data:${mediaType};base64,${base64}`;
}

export function buildOpenAiCompatibleRequest(input: BuildRequestInput, config: OpenAiCompatibleModelConfig): OpenAiCompatibleRequest {
  const prompt = withTokenGuidance(input.prompt, config.maxTokens);
  const ctx = input.context;
  const base = {
    model: config.model,
    max_tokens: ctx ? calculateMaxTokens(ctx.description, ctx.personas, ctx.themes) : config.maxTokens,
    temperature: input.temperature ?? config.temperature,
    top_p: config.topP ?? 0.9,
    presence_penalty: config.presencePenalty ?? 0.1,
  };

  if (!hasImages(input)) {
    return {
      ...base,
      messages: [
        { role: "system", content: OPENAI_SYSTEM_PROMPT },
        { role: "user", content: `${prompt}\n\n${OPENAI_REASONING_REMINDER}` },
      ],
    };
  }

  const content: OpenAiContentPart[] = input.images.map((img): OpenAiContentPart => ({
    type: "image_url",
    image_url: { url: toDataUrl(img.base64, img.mediaType), detail: "high" },
  }));
  content.push({ type: "text", text: visionTextBlock(input.images.length, prompt) });

  return {
    ...base,
    messages: [
      { role: "system", content: VISION_SYSTEM_PROMPT },
      { role: "user", content },
    ],
  };
}

const OpenAiResponseSchema = z.object({
  choices: z.tuple([z.object({ message: z.object({ content: z.string() }).passthrough() }).passthrough()]).rest(z.unknown()),
});

export function extractOpenAiCompatibleText(raw: unknown): ExtractResult {
  return extractWith("OpenAI-compatible", raw, OpenAiResponseSchema, (r) => r.choices[0].message.content);
}

export function authorizeBearer(headers: Record<string, string>, apiKey: string): Record<string, string> {
  return { ...headers, Authorization: `Bearer ${apiKey}` };
}
