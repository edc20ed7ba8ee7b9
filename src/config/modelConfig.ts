import fs from "fs";
import { z } from "zod";

import { logger } from "./logger";

export type ProviderKind = "anthropic" | "ollama" | "openai-compatible";

type BaseModelConfig = {
  /** Provider label as written in the config file, e.g. "perplexity". */
  vendor: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP?: number;
  presencePenalty?: number;
  apiEndpoint: string;
  headers: Record<string, string>;
};

export type AnthropicModelConfig = BaseModelConfig & { provider: "anthropic"; apiKeyEnv: string };
export type OllamaModelConfig = BaseModelConfig & { provider: "ollama"; apiKeyEnv?: string };
export type OpenAiCompatibleModelConfig = BaseModelConfig & { provider: "openai-compatible"; apiKeyEnv: string };

export type ModelConfig = AnthropicModelConfig | OllamaModelConfig | OpenAiCompatibleModelConfig;

export class ModelConfigError extends Error {
  public readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "ModelConfigError";
    this.cause = cause;
  }
}

export function providerKindFor(label: string | undefined): ProviderKind {
  const v = String(label ?? "").trim().toLowerCase();
  if (v === "anthropic") return "anthropic";
  if (v === "ollama") return "ollama";
  return "openai-compatible";
}

export const ProviderEntrySchema = z.object({
  provider: z.string().optional(),
  model: z.string().min(1),
  max_tokens: z.number().int().positive(),
  temperature: z.number().min(0).default(0.7),
  top_p: z.number().min(0).max(1).optional(),
  presence_penalty: z.number().optional(),
  api_endpoint: z.string().url(),
  api_key_env: z.string().min(1).optional(),
  headers: z.record(z.string()).default({}),
});

export type ProviderEntry = z.infer<typeof ProviderEntrySchema>;

export const ModelConfigFileSchema = z.object({
  current_provider: z.string().min(1).default("anthropic"),
  providers: z.record(z.unknown()),
});

export type ModelConfigFile = z.infer<typeof ModelConfigFileSchema>;

/** Maps one `providers` entry of the config file to a typed ModelConfig. */
export function toModelConfig(name: string, entry: ProviderEntry): ModelConfig {
  const vendor = entry.provider ?? name;
  const base: BaseModelConfig = {
    vendor,
    model: entry.model,
    maxTokens: entry.max_tokens,
    temperature: entry.temperature,
    topP: entry.top_p,
    presencePenalty: entry.presence_penalty,
    apiEndpoint: entry.api_endpoint,
    headers: { ...entry.headers },
  };

  const kind = providerKindFor(vendor);
  if (kind === "ollama") {
    return { ...base, provider: "ollama", apiKeyEnv: entry.api_key_env };
  }
  if (!entry.api_key_env) {
    throw new ModelConfigError(`Provider ${name} is missing api_key_env`);
  }
  if (kind === "anthropic") {
    return { ...base, provider: "anthropic", apiKeyEnv: entry.api_key_env };
  }
  return { ...base, provider: "openai-compatible", apiKeyEnv: entry.api_key_env };
}

export const DEFAULT_MODEL_CONFIG: AnthropicModelConfig = {
  provider: "anthropic",
  vendor: "anthropic",
  model: "claude-sonnet-4-20250514",
  maxTokens: 4000,
  temperature: 0.7,
  topP: 0.9,
  presencePenalty: 0.1,
  apiEndpoint: "https://api.anthropic.com/v1/messages",
  apiKeyEnv: "ANTHROPIC_API_KEY",
  headers: {
    "Content-Type": "application/json",
    "anthropic-version": "2023-06-01",
  },
};

export function readModelConfigFile(filePath: string): ModelConfigFile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ModelConfigError(`Cannot read model configuration ${filePath}`, err);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ModelConfigError(`Model configuration ${filePath} is not valid JSON`, err);
  }

  const parsed = ModelConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ModelConfigError(`Model configuration ${filePath} is malformed`, parsed.error);
  }
  return parsed.data;
}

function writeModelConfigFile(filePath: string, file: ModelConfigFile): void {
  fs.writeFileSync(filePath, JSON.stringify(file, null, 4), "utf8");
}

export function loadProviderConfig(file: ModelConfigFile, name: string): ModelConfig {
  const entry = file.providers[name];
  if (entry === undefined) {
    throw new ModelConfigError(`Provider ${name} not found in configuration`);
  }
  const parsed = ProviderEntrySchema.safeParse(entry);
  if (!parsed.success) {
    throw new ModelConfigError(`Provider ${name} has an invalid configuration`, parsed.error);
  }
  return toModelConfig(name, parsed.data);
}

/** Resolves the ModelConfig of `current_provider`. */
export function loadModelConfig(filePath: string): ModelConfig {
  const file = readModelConfigFile(filePath);
  return loadProviderConfig(file, file.current_provider);
}

export function loadModelConfigOrDefault(filePath: string): ModelConfig {
  try {
    return loadModelConfig(filePath);
  } catch (err) {
    logger.error("config", `Error loading model configuration: ${err instanceof Error ? err.message : String(err)}`);
    return DEFAULT_MODEL_CONFIG;
  }
}

export function listProviderNames(filePath: string): string[] {
  return Object.keys(readModelConfigFile(filePath).providers);
}

export function setCurrentProvider(filePath: string, name: string): void {
  const file = readModelConfigFile(filePath);
  if (!(name in file.providers)) {
    throw new ModelConfigError(`Provider ${name} not found in configuration`);
  }
  writeModelConfigFile(filePath, { ...file, current_provider: name });
}

export function setOllamaModel(filePath: string, model: string, providerName = "ollama"): void {
  const file = readModelConfigFile(filePath);
  const entry = file.providers[providerName];
  if (!entry || typeof entry !== "object") {
    throw new ModelConfigError(`Provider ${providerName} not found in configuration`);
  }
  writeModelConfigFile(filePath, {
    ...file,
    providers: { ...file.providers, [providerName]: { ...entry, model } },
  });
}

const TEMPERATURE_RANGES: Record<string, readonly [number, number]> = {
  anthropic: [0, 1],
  perplexity: [0, 1.99],
  openai: [0, 2],
  ollama: [0, 2],
};

export function temperatureRange(config: ModelConfig): readonly [number, number] {
  return TEMPERATURE_RANGES[config.vendor.toLowerCase()] ?? [0, 1];
}

export function clampTemperature(config: ModelConfig, temperature: number): number {
  const [min, max] = temperatureRange(config);
  return Math.min(Math.max(temperature, min), max);
}
