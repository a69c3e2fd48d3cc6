import { generate, type EngineDeps } from "./generationEngine";
import { parseVideoReference, type VideoReference } from "./videoReference";
import { isVideoContext, validateVideoContext } from "./validator";
import { InvalidInputError, describeError } from "./errors";
import type { AnalysisResult, GenerationRequest, VideoContext } from "./types";

/** Upstream metadata/transcript lookup. Owned by the caller. */
export interface VideoContextSource {
  fetch(reference: VideoReference): Promise<VideoContext>;
}

export type VideoAnalysis = {
  reference: VideoReference;
  video: VideoContext;
  result: AnalysisResult;
};

/**
 * URL in, analysis out. Rejects only with InvalidInputError (bad URL, or a
 * source record that breaks the VideoContext contract); everything past that
 * point degrades to the fallback result.
 */
export async function analyzeVideo(
  url: string,
  source: VideoContextSource,
  request: GenerationRequest = {},
  deps: EngineDeps = {}
): Promise<VideoAnalysis> {
  const reference = parseVideoReference(url);

  const video: unknown = await source.fetch(reference).catch((err: unknown) => {
    throw new InvalidInputError(`could not load video metadata for ${reference.url}: ${describeError(err)}`, {
      cause: err,
    });
  });

  if (!isVideoContext(video)) {
    const { errors = [] } = validateVideoContext(video);
    throw new InvalidInputError(`video metadata is malformed: ${errors.join("; ")}`);
  }

  const result = await generate(video, request, deps);
  return { reference, video, result };
}
