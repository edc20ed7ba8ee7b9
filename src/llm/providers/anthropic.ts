import { z } from "zod";

import type { AnthropicModelConfig } from "../../config/modelConfig";
import { ANTHROPIC_REASONING_REMINDER, ANTHROPIC_SYSTEM_PROMPT, VISION_SYSTEM_PROMPT, visionTextBlock } from "../../generation/prompts";
import type { ImageMediaType } from "../../images/preprocessImages";
import { BuildRequestInput, ExtractResult, extractWith, hasImages, withTokenGuidance } from "./types";

export type AnthropicContentBlock =
  | { type: "image"; source: { type: "base64"; media_type: ImageMediaType; data: string } }
  | { type: "text"; text: string };

export type AnthropicRequest = {
  model: string;
  max_tokens: number;
  temperature: number;
  system: string;
  messages: [{ role: "user"; content: string | AnthropicContentBlock[] }];
};

export function buildAnthropicRequest(input: BuildRequestInput, config: AnthropicModelConfig): AnthropicRequest {
  const prompt = withTokenGuidance(input.prompt, config.maxTokens);
  const base = {
    model: config.model,
    max_tokens: config.maxTokens,
    temperature: input.temperature ?? config.temperature,
  };

  if (!hasImages(input)) {
    return {
      ...base,
      system: ANTHROPIC_SYSTEM_PROMPT,
      messages: [{ role: "user", content: `${prompt}\n\n${ANTHROPIC_REASONING_REMINDER}` }],
    };
  }

  // Images go first so the text can refer to them as "shared above".
  const content: AnthropicContentBlock[] = input.images.map((img): AnthropicContentBlock => ({
    type: "image",
    source: { type: "base64", media_type: img.mediaType, data: img.base64 },
  }));
  content.push({ type: "text", text: visionTextBlock(input.images.length, prompt) });

  return {
    ...base,
    system: VISION_SYSTEM_PROMPT,
    messages: [{ role: "user", content }],
  };
}

const AnthropicResponseSchema = z.object({
  // Only the first block is read; later blocks (tool_use and the like) may lack text.
  content: z.tuple([z.object({ text: z.string() }).passthrough()]).rest(z.unknown()),
});

export function extractAnthropicText(raw: unknown): ExtractResult {
  return extractWith("Anthropic", raw, AnthropicResponseSchema, (r) => r.content[0].text);
}

export function authorizeAnthropic(headers: Record<string, string>, apiKey: string): Record<string, string> {
  return { ...headers, "x-api-key": apiKey };
}
