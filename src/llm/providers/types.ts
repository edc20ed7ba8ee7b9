import { z } from "zod";

import { logger } from "../../config/logger";
import type { PreparedImage } from "../../images/preprocessImages";
import { safeTokenBudget } from "../maxTokens";
import { tokenGuidance } from "../../generation/prompts";

export type BuildRequestInput = {
  prompt: string;
  images?: PreparedImage[];
  /** Overrides the configured temperature. */
  temperature?: number;
  /** Brief fields that size the OpenAI-compatible completion budget. */
  context?: { description: string; personas: string; themes: string };
};

export type ExtractResult = { ok: true; text: string } | { ok: false; message: string };

export const PARSE_ERROR_PREFIX = "Error parsing response:";

export function withTokenGuidance(prompt: string, maxTokens: number): string {
  return `${prompt}\n\n${tokenGuidance(safeTokenBudget(maxTokens))}`;
}

export function hasImages(input: BuildRequestInput): input is BuildRequestInput & { images: PreparedImage[] } {
  return Array.isArray(input.images) && input.images.length > 0;
}

function topLevelKeys(raw: unknown): string[] {
  return raw && typeof raw === "object" && !Array.isArray(raw) ? Object.keys(raw) : [];
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/** Validates `raw` against a provider's response shape and picks the text out of it. */
export function extractWith<TSchema extends z.ZodTypeAny>(
  providerLabel: string,
  raw: unknown,
  schema: TSchema,
  pick: (parsed: z.infer<TSchema>) => string
): ExtractResult {
  const keys = topLevelKeys(raw);
  logger.debug("providers", "Response keys", { provider: providerLabel, keys });

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = formatIssues(parsed.error);
    logger.error("providers", `Error extracting ${providerLabel} response: ${detail}`, { keys });
    return { ok: false, message: `${PARSE_ERROR_PREFIX} ${detail}` };
  }
  return { ok: true, text: pick(parsed.data) };
}
