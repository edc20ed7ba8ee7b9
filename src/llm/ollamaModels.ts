import axios from "axios";
import { z } from "zod";

import { logger } from "../config/logger";

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string().min(1) }).passthrough()).default([]),
});

/** Names of the models a local Ollama server has pulled; empty when it cannot be reached. */
export async function listOllamaModels(baseUrl = "http://localhost:11434", timeoutMs = 5000): Promise<string[]> {
  try {
    const res = await axios.get<unknown>(`${baseUrl.replace(/\/+$/, "")}/api/tags`, {
      timeout: timeoutMs,
      validateStatus: (s) => s >= 200 && s < 300,
    });
    const parsed = TagsResponseSchema.safeParse(res.data);
    if (!parsed.success) {
      logger.error("ollama", "Unexpected /api/tags response shape");
      return [];
    }
    return parsed.data.models.map((m) => m.name);
  } catch (err) {
    logger.error("ollama", `Error fetching Ollama models: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }
}
