/**
 * Environment configuration.
 * Loads `.env` from the working directory and exposes typed settings. Provider
 * secrets are not part of this object: each ModelConfig names the variable
 * that holds its key, and the orchestrator reads it at call time.
 */

import dotenv from "dotenv";
import path from "path";

import type { RetryPolicy } from "../llm/retry";

dotenv.config({ path: path.resolve(process.cwd(), ".env") });

interface EnvConfig {
  /** Model configuration file with `current_provider` and `providers` (default: model_config.json) */
  MODEL_CONFIG_PATH: string;
  /** Artefact categories file (default: artefact_categories.json) */
  ARTEFACT_CATEGORIES_PATH: string;
  /** Closing instruction file (default: prompt_instructions.json) */
  PROMPT_INSTRUCTIONS_PATH: string;
  /** Directory generated artefacts are written to (default: artefacts) */
  ARTEFACTS_DIR: string;
  /** Local Ollama server used for model discovery (default: http://localhost:11434) */
  OLLAMA_BASE_URL: string;
  /** Retry policy for provider calls */
  RETRY_POLICY: RetryPolicy;
}

function getEnv(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const v = source[name];
  return v && v.trim() ? v.trim() : undefined;
}

function getNumber(source: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = getEnv(source, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function getCount(source: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const n = getNumber(source, name, fallback);
  return Number.isInteger(n) ? n : fallback;
}

function loadEnvConfig(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const cwd = process.cwd();
  return {
    MODEL_CONFIG_PATH: path.resolve(cwd, getEnv(source, "MODEL_CONFIG_PATH") ?? "model_config.json"),
    ARTEFACT_CATEGORIES_PATH: path.resolve(cwd, getEnv(source, "ARTEFACT_CATEGORIES_PATH") ?? "artefact_categories.json"),
    PROMPT_INSTRUCTIONS_PATH: path.resolve(cwd, getEnv(source, "PROMPT_INSTRUCTIONS_PATH") ?? "prompt_instructions.json"),
    ARTEFACTS_DIR: path.resolve(cwd, getEnv(source, "ARTEFACTS_DIR") ?? "artefacts"),
    OLLAMA_BASE_URL: (getEnv(source, "OLLAMA_BASE_URL") ?? "http://localhost:11434").replace(/\/+$/, ""),
    RETRY_POLICY: {
      maxRetries: getCount(source, "LLM_MAX_RETRIES", 3),
      baseDelayMs: getNumber(source, "LLM_RETRY_BASE_MS", 1000),
      maxDelayMs: getNumber(source, "LLM_RETRY_MAX_MS", 10000),
      exponentialBase: 2,
    },
  };
}

export { loadEnvConfig };
export type { EnvConfig };
