import fs from "fs";
import { z } from "zod";

export const BriefSchema = z
  .object({
    description: z.string().min(1),
    location: z.string().default(""),
    date: z.string().default(""),
    personas: z.string().default(""),
    themes: z.string().default(""),
    category: z.string().min(1),
    temperature: z.number().min(0).optional(),
    /** Provider name from the model configuration; the file's current_provider when absent. */
    provider: z.string().min(1).optional(),
  })
  .strict();

export type Brief = z.infer<typeof BriefSchema>;

export function loadBrief(filePath: string): Brief {
  return BriefSchema.parse(JSON.parse(fs.readFileSync(filePath, "utf8")));
}
