export { generateArtefact, toLegacyText, isErrorText, ERROR_MARKER, TEXT_TIMEOUT_MS, VISION_TIMEOUT_MS } from "./generation/generateArtefact";
export type {
  GenerationRequest,
  GenerationResult,
  GenerationOutput,
  GenerationError,
  GenerationErrorCode,
  GenerationDeps,
} from "./generation/generateArtefact";
export { buildArtefactPrompt, buildVisionArtefactPrompt } from "./generation/prompts";
export type { ProjectFields } from "./generation/prompts";
export { splitReasoning, renderReasoningMarkup, REASONING_START, REASONING_END } from "./generation/reasoning";
export { loadBrief, BriefSchema } from "./generation/brief";
export type { Brief } from "./generation/brief";

export { withRetry, postJsonWithRetry, retryDelayMs, isRetryableFailure, HttpStatusError, DEFAULT_RETRY_POLICY } from "./llm/retry";
export type { RetryPolicy, RetryOptions } from "./llm/retry";
export { calculateMaxTokens, charLength } from "./llm/maxTokens";
export { buildProviderRequest, extractProviderText, authorizeHeaders, PROVIDER_TRAITS, PARSE_ERROR_PREFIX } from "./llm/providers";
export type { ProviderRequest, BuildRequestInput, ExtractResult } from "./llm/providers";
export { listOllamaModels } from "./llm/ollamaModels";

export {
  validateImage,
  resizeImageIfNeeded,
  prepareImagesForApi,
  estimateVisionTokens,
  describeImage,
  mediaTypeFor,
} from "./images/preprocessImages";
export type { ImageUpload, PreparedImage, ImageMediaType } from "./images/preprocessImages";

export {
  loadModelConfig,
  loadModelConfigOrDefault,
  listProviderNames,
  setCurrentProvider,
  setOllamaModel,
  temperatureRange,
  clampTemperature,
  ModelConfigError,
  DEFAULT_MODEL_CONFIG,
} from "./config/modelConfig";
export type { ModelConfig, ProviderKind } from "./config/modelConfig";
export { loadArtefactCategories, loadClosingInstruction } from "./config/artefactCatalog";
export { loadEnvConfig } from "./config/env";
export { logger } from "./config/logger";

export { saveArtefact, listArtefacts, loadArtefact, sanitizeFilename } from "./storage/artefactStore";
export type { ArtefactMetadata, ArtefactSummary } from "./storage/artefactStore";
