import fs from "fs";
import path from "path";

import type { ProjectFields } from "../generation/prompts";
import { renderReasoningMarkup } from "../generation/reasoning";
import { logger } from "../config/logger";

export type ArtefactMetadata = {
  project: ProjectFields;
  vendor: string;
  model: string;
  temperature: number;
};

export type SaveArtefactOptions = {
  dir: string;
  now?: Date;
  /** Adds the `show-think` class so the reasoning block renders expanded. */
  showReasoning?: boolean;
};

export type ArtefactSummary = {
  filename: string;
  filepath: string;
  created: Date;
  project: string;
  location: string;
  model: string;
  sizeBytes: number;
};

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function fileStamp(d: Date): string {
  return `${pad(d.getFullYear() % 100)}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}`;
}

function footerStamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function sanitizeFilename(name: string): string {
  return name.replace(/[<>:"/\\|?*]/g, "").replace(/ /g, "_");
}

export function artefactFilename(description: string, now: Date): string {
  const clean = description.split(/\r?\n/).join(" ").trim().slice(0, 30);
  return `${fileStamp(now)}_${sanitizeFilename(clean)}.md`;
}

export function renderArtefactMarkdown(content: string, meta: ArtefactMetadata, now: Date, showReasoning = false): string {
  const { project } = meta;
  return `<div class="generated-content${showReasoning ? " show-think" : ""}">

# Diegetic Artefact Generation results:

## Project
${project.description}

## Location
${project.location}

## Date/Timeframe
${project.date}

## User Personas
${project.personas}

## Key Themes
${project.themes}

## Generated Artefact
${renderReasoningMarkup(content)}

---
*Generated on ${footerStamp(now)}*
*Model: ${meta.vendor}/${meta.model} (temperature: ${meta.temperature})*

</div>`;
}

/** Writes the artefact as markdown and returns its path. Not atomic. */
export function saveArtefact(content: string, meta: ArtefactMetadata, opts: SaveArtefactOptions): string {
  const now = opts.now ?? new Date();
  fs.mkdirSync(opts.dir, { recursive: true });
  const filepath = path.join(opts.dir, artefactFilename(meta.project.description, now));
  fs.writeFileSync(filepath, renderArtefactMarkdown(content, meta, now, opts.showReasoning), "utf8");
  logger.info("storage", `Saved artefact ${filepath}`);
  return filepath;
}

function section(content: string, heading: string): string | undefined {
  const match = new RegExp(`## ${heading}\\n([\\s\\S]+?)\\n\\n`).exec(content);
  return match ? match[1].trim() : undefined;
}

/** Saved artefacts in `dir`, newest first. Unreadable files are skipped. */
export function listArtefacts(dir: string): ArtefactSummary[] {
  if (!fs.existsSync(dir)) return [];

  const out: ArtefactSummary[] = [];
  for (const filename of fs.readdirSync(dir)) {
    if (!filename.endsWith(".md")) continue;
    const filepath = path.join(dir, filename);
    try {
      const stats = fs.statSync(filepath);
      const content = fs.readFileSync(filepath, "utf8");
      out.push({
        filename,
        filepath,
        created: stats.mtime,
        project: (section(content, "Project") ?? "Unknown Project").slice(0, 100),
        location: (section(content, "Location") ?? "Unknown Location").slice(0, 50),
        model: /\*Model: (.+?)\*/.exec(content)?.[1] ?? "Unknown",
        sizeBytes: stats.size,
      });
    } catch (err) {
      logger.warn("storage", `Skipping unreadable artefact ${filepath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return out.sort((a, b) => b.created.getTime() - a.created.getTime());
}

export function loadArtefact(filepath: string): string {
  try {
    return fs.readFileSync(filepath, "utf8");
  } catch (err) {
    throw new Error(`Error loading artefact: ${err instanceof Error ? err.message : String(err)}`);
  }
}
