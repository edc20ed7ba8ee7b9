#!/usr/bin/env node
/**
 * Generate one artefact from a JSON brief.
 *
 * Usage:
 *   node dist/scripts/generateFromBrief.js brief.json [image.png ...] [--show-reasoning]
 *
 * The brief holds description, location, date, personas, themes, category and
 * optionally temperature and provider. Images switch the request to the
 * provider's vision format.
 */

import fs from "fs";
import path from "path";

import { loadArtefactCategories, loadClosingInstruction } from "../config/artefactCatalog";
import { loadEnvConfig } from "../config/env";
import { logger } from "../config/logger";
import { clampTemperature, loadProviderConfig, readModelConfigFile } from "../config/modelConfig";
import { loadBrief } from "../generation/brief";
import { generateArtefact, toLegacyText } from "../generation/generateArtefact";
import { describeImage, estimateVisionTokens, prepareImagesForApi } from "../images/preprocessImages";
import { saveArtefact } from "../storage/artefactStore";

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const showReasoning = args.includes("--show-reasoning");
  const [briefPath, ...imagePaths] = args.filter((a) => !a.startsWith("--"));

  if (!briefPath) {
    console.error("Usage: generateFromBrief <brief.json> [image ...] [--show-reasoning]");
    return 2;
  }

  const env = loadEnvConfig();
  const brief = loadBrief(briefPath);
  if (!loadArtefactCategories(env.ARTEFACT_CATEGORIES_PATH).includes(brief.category)) {
    logger.warn("cli", `Category '${brief.category}' is not listed in ${env.ARTEFACT_CATEGORIES_PATH}`);
  }
  const file = readModelConfigFile(env.MODEL_CONFIG_PATH);
  const config = loadProviderConfig(file, brief.provider ?? file.current_provider);
  const temperature = clampTemperature(config, brief.temperature ?? config.temperature);

  const images = await prepareImagesForApi(
    imagePaths.map((p) => ({ name: path.basename(p), bytes: fs.readFileSync(p) }))
  );
  if (imagePaths.length > 0 && images.length === 0) {
    console.error("No valid images could be processed.");
    return 1;
  }
  if (images.length > 0) {
    logger.info("cli", `Attaching ${images.length} image(s), ~${estimateVisionTokens(images.length)} extra tokens`, {
      images: images.map(describeImage),
    });
  }

  const project = {
    description: brief.description,
    location: brief.location,
    date: brief.date,
    personas: brief.personas,
    themes: brief.themes,
  };

  const result = await generateArtefact({
    project,
    category: brief.category,
    closingInstruction: loadClosingInstruction(env.PROMPT_INSTRUCTIONS_PATH),
    config,
    temperature,
    images,
    retryPolicy: env.RETRY_POLICY,
  });

  if (!result.ok) {
    console.error(toLegacyText(result));
    return 1;
  }

  const filepath = saveArtefact(
    result.value.text,
    { project, vendor: config.vendor, model: config.model, temperature },
    { dir: env.ARTEFACTS_DIR, showReasoning }
  );
  console.log(filepath);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[generate] Unhandled error:", err);
    process.exitCode = 1;
  });
