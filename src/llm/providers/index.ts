import type { ModelConfig, ProviderKind } from "../../config/modelConfig";
import { AnthropicRequest, authorizeAnthropic, buildAnthropicRequest, extractAnthropicText } from "./anthropic";
import { buildOllamaRequest, extractOllamaText, OllamaRequest } from "./ollama";
import {
  authorizeBearer,
  buildOpenAiCompatibleRequest,
  extractOpenAiCompatibleText,
  OpenAiCompatibleRequest,
} from "./openaiCompatible";
import type { BuildRequestInput, ExtractResult } from "./types";

export type ProviderRequest = AnthropicRequest | OllamaRequest | OpenAiCompatibleRequest;

export type ProviderTraits = {
  requiresApiKey: boolean;
  supportsVision: boolean;
};

export const PROVIDER_TRAITS: Record<ProviderKind, ProviderTraits> = {
  anthropic: { requiresApiKey: true, supportsVision: true },
  ollama: { requiresApiKey: false, supportsVision: false },
  "openai-compatible": { requiresApiKey: true, supportsVision: true },
};

export function buildProviderRequest(input: BuildRequestInput, config: ModelConfig): ProviderRequest {
  switch (config.provider) {
    case "anthropic":
      return buildAnthropicRequest(input, config);
    case "ollama":
      return buildOllamaRequest(input, config);
    case "openai-compatible":
      return buildOpenAiCompatibleRequest(input, config);
  }
}

export function extractProviderText(raw: unknown, config: ModelConfig): ExtractResult {
  switch (config.provider) {
    case "anthropic":
      return extractAnthropicText(raw);
    case "ollama":
      return extractOllamaText(raw);
    case "openai-compatible":
      return extractOpenAiCompatibleText(raw);
  }
}

/** Configured headers plus the provider's credential header. Ollama sends none. */
export function authorizeHeaders(config: ModelConfig, apiKey: string | undefined): Record<string, string> {
  const headers = { ...config.headers };
  switch (config.provider) {
    case "anthropic":
      return apiKey ? authorizeAnthropic(headers, apiKey) : headers;
    case "ollama":
      return headers;
    case "openai-compatible":
      return apiKey ? authorizeBearer(headers, apiKey) : headers;
  }
}

export type { BuildRequestInput, ExtractResult } from "./types";
export { PARSE_ERROR_PREFIX } from "./types";
