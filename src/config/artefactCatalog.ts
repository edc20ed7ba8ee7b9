import fs from "fs";
import { z } from "zod";

import { logger } from "./logger";

const ArtefactCategoriesSchema = z.object({
  artefact_types: z.array(z.string().min(1)).min(1),
});

const PromptInstructionsSchema = z.object({
  closing_instruction: z.string().min(1),
});

export const DEFAULT_CLOSING_INSTRUCTION =
  "The artefact should reflect the context and show how the architecture serves as a catalyst for change.";

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, "utf8"));
}

export function loadArtefactCategories(filePath: string): string[] {
  try {
    const categories = ArtefactCategoriesSchema.parse(readJson(filePath)).artefact_types;
    logger.info("catalog", "Loaded artefact categories", { count: categories.length });
    return categories;
  } catch (err) {
    logger.error("catalog", `Error loading artefact categories: ${err instanceof Error ? err.message : String(err)}`);
    throw err;
  }
}

export function loadClosingInstruction(filePath: string): string {
  try {
    return PromptInstructionsSchema.parse(readJson(filePath)).closing_instruction;
  } catch (err) {
    logger.error("catalog", `Error loading prompt instructions: ${err instanceof Error ? err.message : String(err)}`);
    return DEFAULT_CLOSING_INSTRUCTION;
  }
}
