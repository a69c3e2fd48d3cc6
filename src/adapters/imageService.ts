import OpenAI from "openai";
import type { SeoConfig } from "../config";
import { RenderFailureError } from "../errors";
import type { OpenAIClientOptions } from "./chatBackends";

export type ImageSize = "1024x1024" | "1792x1024";

export type ImageRequest = {
  prompt: string;
  size: ImageSize;
  quality: "standard" | "hd";
  n: 1;
};

/** Best-effort image synthesis: resolves to an image URL or rejects. */
export interface ImageGenerationService {
  generate(request: ImageRequest): Promise<string>;
}

export class OpenAIImageService implements ImageGenerationService {
  constructor(private readonly client: OpenAI, private readonly model = "dall-e-3") {}

  async generate(request: ImageRequest): Promise<string> {
    const response = await this.client.images.generate({
      model: this.model,
      prompt: request.prompt,
      size: request.size,
      quality: request.quality,
      n: request.n,
    });
    const url = response.data?.[0]?.url;
    if (!url) throw new RenderFailureError("remote", "image service returned no URL");
    return url;
  }
}

/** `null` when no API key is configured: callers go straight to local synthesis. */
export function createImageService(
  config: SeoConfig,
  clientOptions: OpenAIClientOptions = {}
): ImageGenerationService | null {
  if (!config.openaiApiKey) return null;
  const client = new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
    maxRetries: 0,
    timeout: config.requestTimeoutMs,
    ...clientOptions,
  });
  return new OpenAIImageService(client);
}
