import { AxiosError, AxiosResponse } from "axios";

import { logger } from "../config/logger";
import type { ModelConfig } from "../config/modelConfig";
import type { PreparedImage } from "../images/preprocessImages";
import { authorizeHeaders, buildProviderRequest, extractProviderText, PROVIDER_TRAITS } from "../llm/providers";
import { charLength } from "../llm/maxTokens";
import { HttpStatusError, isTransportError, postJsonWithRetry, responseBodyText, RetryPolicy } from "../llm/retry";
import { buildArtefactPrompt, buildVisionArtefactPrompt, ProjectFields } from "./prompts";
import { splitReasoning } from "./reasoning";

export const TEXT_TIMEOUT_MS = 60_000;
export const VISION_TIMEOUT_MS = 120_000;

export type GenerationErrorCode = "CONFIG_ERROR" | "TRANSPORT_ERROR" | "SERVER_ERROR" | "CLIENT_ERROR" | "PARSE_ERROR";

export type GenerationError = {
  code: GenerationErrorCode;
  message: string;
};

export type GenerationOutput = {
  /** Raw model output, reasoning block included. */
  text: string;
  content: string;
  reasoning?: string;
};

export type GenerationResult = { ok: true; value: GenerationOutput } | { ok: false; error: GenerationError };

export type GenerationRequest = {
  project: ProjectFields;
  category: string;
  closingInstruction: string;
  config: ModelConfig;
  temperature?: number;
  images?: PreparedImage[];
  retryPolicy?: RetryPolicy;
};

export type GenerationDeps = {
  /** Where API keys are looked up. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  sleep?: (ms: number) => Promise<void>;
};

function fail(code: GenerationErrorCode, message: string): GenerationResult {
  logger.error("generation", message, { code });
  return { ok: false, error: { code, message } };
}

function truncate(text: string, max = 500): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function toFailure(err: unknown): GenerationResult {
  if (err instanceof HttpStatusError) {
    return fail("SERVER_ERROR", `API Error: ${err.status} - ${truncate(err.body)}`);
  }
  if (isTransportError(err)) {
    return fail("TRANSPORT_ERROR", `Error generating artefact: ${err.code ?? "NETWORK_ERROR"}: ${err.message}`);
  }
  if (err instanceof AxiosError) {
    return fail("CONFIG_ERROR", `Error generating artefact: ${err.message}`);
  }
  return fail("TRANSPORT_ERROR", `Error generating artefact: ${err instanceof Error ? err.message : String(err)}`);
}

/**
 * Runs one generation against the configured provider. Always resolves: every
 * failure comes back as `{ ok: false, error }` with a code the caller can branch on.
 */
export async function generateArtefact(request: GenerationRequest, deps: GenerationDeps = {}): Promise<GenerationResult> {
  const { config, project, category, closingInstruction } = request;
  const traits = PROVIDER_TRAITS[config.provider];
  const images = request.images ?? [];
  const env = deps.env ?? process.env;

  let apiKey: string | undefined;
  if (traits.requiresApiKey) {
    const keyEnv = config.apiKeyEnv ?? "";
    apiKey = env[keyEnv]?.trim() || undefined;
    if (!apiKey) {
      return fail("CONFIG_ERROR", `${keyEnv} not found in environment variables`);
    }
  }

  if (images.length > 0 && !traits.supportsVision) {
    return fail(
      "CONFIG_ERROR",
      `Vision features are not supported with provider '${config.vendor}'. Switch to an Anthropic or OpenAI-compatible provider.`
    );
  }

  const headers = authorizeHeaders(config, apiKey);
  logger.info("generation", `Using provider: ${config.vendor}`, { model: config.model, images: images.length });

  const prompt =
    images.length > 0
      ? buildVisionArtefactPrompt({ project, category, closingInstruction })
      : buildArtefactPrompt({ project, category, closingInstruction, maxTokens: config.maxTokens });

  const body = buildProviderRequest(
    {
      prompt,
      images,
      temperature: request.temperature,
      context: { description: project.description, personas: project.personas, themes: project.themes },
    },
    config
  );

  logger.debug("generation", `Sending request to: ${config.apiEndpoint}`, {
    bodyKeys: Object.keys(body),
    headerNames: Object.keys(headers),
  });

  let response: AxiosResponse<unknown>;
  try {
    response = await postJsonWithRetry(config.apiEndpoint, body, {
      headers,
      timeoutMs: images.length > 0 ? VISION_TIMEOUT_MS : TEXT_TIMEOUT_MS,
      policy: request.retryPolicy,
      sleep: deps.sleep,
    });
  } catch (err) {
    return toFailure(err);
  }

  logger.debug("generation", `Response status code: ${response.status}`);
  if (response.status < 200 || response.status >= 300) {
    return fail("CLIENT_ERROR", `API Error: ${response.status} - ${truncate(responseBodyText(response.data))}`);
  }

  const extracted = extractProviderText(response.data, config);
  if (!extracted.ok) {
    return fail("PARSE_ERROR", extracted.message);
  }

  // Characters against a token budget: only a rough truncation signal.
  const length = charLength(extracted.text);
  if (length > config.maxTokens * 0.9) {
    logger.warn("generation", `Response approaching token limit: ${length} characters`, {
      maxTokens: config.maxTokens,
    });
  }

  const split = splitReasoning(extracted.text);
  logger.info("generation", `Generated artefact (${length} chars)`);
  return { ok: true, value: { text: extracted.text, ...split } };
}

export const ERROR_MARKER = "Error";

/**
 * Renders a result as plain text for consumers that branch on a leading
 * "Error" marker.
 */
export function toLegacyText(result: GenerationResult): string {
  if (result.ok) return result.value.text;
  const { message } = result.error;
  return message.startsWith(ERROR_MARKER) ? message : `${ERROR_MARKER}: ${message}`;
}

export function isErrorText(text: string): boolean {
  return text.startsWith(ERROR_MARKER);
}
