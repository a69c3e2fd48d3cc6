export * from "./types";
export * from "./errors";
export { loadConfig, DEFAULT_CONFIG, type SeoConfig } from "./config";
export { consoleLogger, silentLogger, type Logger } from "./logger";
export { AnalysisResultSchema, ModelResponseSchema, VideoContextSchema } from "./schema";
export { parseModelResponse, validateAnalysisResult, validateVideoContext, isAnalysisResult } from "./validator";
export { buildContext, transcriptBudget, TRUNCATION_MARKER } from "./contextBuilder";
export { renderPrompt, formatInstructions, PROMPT_VERSION, SYSTEM_PROMPT } from "./promptTemplate";
export { repairModelResponse, repairTags, normalizeThumbnails, TAG_COUNT } from "./repair";
export { fallback } from "./fallback";
export { generate, type EngineDeps } from "./generationEngine";
export {
  createBackendResolver,
  OpenAIChatBackend,
  type BackendResolver,
  type ChatBackend,
} from "./adapters/chatBackends";
export { createImageService, OpenAIImageService, type ImageGenerationService } from "./adapters/imageService";
export { parseVideoReference, detectPlatform, extractYouTubeVideoId, type VideoReference } from "./videoReference";
export { analyzeVideo, type VideoContextSource, type VideoAnalysis } from "./pipeline";
export { buildPreviewSvg } from "./thumbnailPreview";
export { renderThumbnail, buildImagePrompt, type RenderedThumbnail, type RenderOptions } from "./thumbnailRenderer";
