import { buildContext } from "./contextBuilder";
import { PROMPT_VERSION, renderPrompt, SYSTEM_PROMPT } from "./promptTemplate";
import { parseModelResponse, validateAnalysisResult } from "./validator";
import { repairModelResponse } from "./repair";
import { fallback } from "./fallback";
import { loadConfig, type SeoConfig } from "./config";
import { consoleLogger, type Logger } from "./logger";
import { BackendUnavailableError, SchemaViolationError, describeError } from "./errors";
import { createBackendResolver, type BackendResolver } from "./adapters/chatBackends";
import { deepFreeze, fingerprint } from "./utils";
import type { AnalysisResult, BackendKind, GenerationRequest, VideoContext } from "./types";

export type EngineDeps = {
  config?: SeoConfig;
  resolveBackend?: BackendResolver;
  logger?: Logger;
};

export type ResolvedRequest = {
  language: string;
  backend: BackendKind;
  model: string;
};

export function resolveRequest(request: GenerationRequest, config: SeoConfig): ResolvedRequest {
  const backend = request.backend ?? "remote";
  return {
    language: request.language?.trim() || "English",
    backend,
    model: request.model?.trim() || config.defaultModels[backend],
  };
}

async function attempt(video: VideoContext, req: ResolvedRequest, resolveBackend: BackendResolver, logger: Logger) {
  const backend = await resolveBackend(req.backend, req.model);

  const prompt = renderPrompt({ contextBlock: buildContext(video, req.backend), language: req.language });
  logger.debug(`prompt v${PROMPT_VERSION} ${fingerprint(prompt)} (${prompt.length} chars) -> ${req.backend}/${req.model}`);

  const raw = await backend.complete({ system: SYSTEM_PROMPT, user: prompt });
  const result = repairModelResponse(parseModelResponse(raw));

  const check = validateAnalysisResult(result);
  if (!check.valid) {
    throw new SchemaViolationError("repaired result still violates the output schema", check.errors);
  }
  return result;
}

/**
 * Run one SEO generation. Never rejects: any failure yields the fallback
 * result, so callers always receive a schema-valid AnalysisResult.
 */
export async function generate(
  video: VideoContext,
  request: GenerationRequest = {},
  deps: EngineDeps = {}
): Promise<AnalysisResult> {
  const logger = deps.logger ?? consoleLogger;
  try {
    const config = deps.config ?? loadConfig();
    const req = resolveRequest(request, config);
    const resolveBackend = deps.resolveBackend ?? createBackendResolver(config);

    const result = await attempt(video, req, resolveBackend, logger);
    logger.info(`generated ${result.seo.tags.length} tags, ${result.seo.titles.length} titles for "${video.title}"`);
    return deepFreeze(result);
  } catch (err) {
    if (err instanceof BackendUnavailableError) {
      logger.warn(`backend unavailable, using fallback: ${err.message}`);
    } else if (err instanceof SchemaViolationError) {
      logger.warn(`unusable model response, using fallback: ${err.message}`);
    } else {
      logger.error(`generation failed unexpectedly, using fallback: ${describeError(err)}`);
    }
    return fallback(video, request.language);
  }
}
