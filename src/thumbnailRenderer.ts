import sharp from "sharp";
import type { ImageGenerationService, ImageSize } from "./adapters/imageService";
import { RenderFailureError, describeError } from "./errors";
import { consoleLogger, type Logger } from "./logger";
import {
  PREVIEW_HEIGHT,
  PREVIEW_WIDTH,
  buildPreviewSvg,
  flatPlaceholderSvg,
} from "./thumbnailPreview";
import type { ThumbnailConcept } from "./types";

export type RenderedImage = { mimeType: "image/png" | "image/svg+xml"; data: Buffer };

export type RenderedThumbnail =
  | { tier: "remote"; url: string }
  | ({ tier: "local" | "placeholder" } & RenderedImage);

/** SVG (and optional base image) to PNG bytes. */
export type Rasterizer = (svg: string, base?: Buffer) => Promise<Buffer>;

export type RenderOptions = {
  platform?: string;
  baseImageUrl?: string;
  imageService?: ImageGenerationService | null;
  quality?: "standard" | "hd";
  logger?: Logger;
  rasterize?: Rasterizer;
  fetchImage?: (url: string) => Promise<Buffer>;
};

const PLATFORM_IMAGE_SIZES: Record<string, ImageSize> = {
  YouTube: "1792x1024",
  Instagram: "1024x1024",
  LinkedIn: "1792x1024",
};

export function imageSizeFor(platform = "YouTube"): ImageSize {
  return PLATFORM_IMAGE_SIZES[platform] ?? "1792x1024";
}

export function buildImagePrompt(concept: ThumbnailConcept, videoTitle: string, platform = "YouTube"): string {
  const size = imageSizeFor(platform);
  return [
    `Create a highly engaging professional ${platform} thumbnail in ${size}.`,
    "- Aspect ratio must strictly match platform requirements",
    "- Sharp composition, cinematic depth, clear subject visibility",
    `- Strong readable foreground text: "${concept.text_overlay}"`,
    `- Focus subject: ${concept.focal_point}`,
    `- Emotional tone: ${concept.tone}`,
    `- Visual concept: ${concept.concept}`,
    concept.composition ? `- Composition: ${concept.composition}` : null,
    `- Color palette: ${concept.colors.join(", ")}`,
    "- Strong contrast colors, readable on mobile",
    "- Avoid clutter and tiny text",
    `Video title context: "${videoTitle}"`,
  ]
    .filter((line): line is string => line !== null)
    .join("\n");
}

export const sharpRasterize: Rasterizer = async (svg, base) => {
  const overlay = Buffer.from(svg);
  if (!base) return sharp(overlay).png().toBuffer();
  return sharp(base)
    .resize(PREVIEW_WIDTH, PREVIEW_HEIGHT, { fit: "cover" })
    .composite([{ input: overlay, top: 0, left: 0 }])
    .png()
    .toBuffer();
};

export async function downloadImage(url: string): Promise<Buffer> {
  const res = await fetch(url, { signal: AbortSignal.timeout(8_000) });
  if (!res.ok) throw new Error(`GET ${url} answered ${res.status}`);
  return Buffer.from(await res.arrayBuffer());
}

/**
 * Gradient preview, or the concept's overlay on a base image when one is
 * given and can be loaded. Throws RenderFailureError.
 */
export async function renderLocalPreview(
  concept: ThumbnailConcept,
  videoTitle: string,
  options: RenderOptions = {}
): Promise<Buffer> {
  const logger = options.logger ?? consoleLogger;
  const rasterize = options.rasterize ?? sharpRasterize;

  if (options.baseImageUrl) {
    try {
      const base = await (options.fetchImage ?? downloadImage)(options.baseImageUrl);
      return await rasterize(buildPreviewSvg(concept, { background: false, title: videoTitle }), base);
    } catch (err) {
      logger.warn(`base image unusable, drawing gradient instead: ${describeError(err)}`);
    }
  }

  try {
    return await rasterize(buildPreviewSvg(concept, { title: videoTitle }));
  } catch (err) {
    throw new RenderFailureError("local", `local preview failed: ${describeError(err)}`, { cause: err });
  }
}

/** Flat #222222 frame. Cannot fail: the SVG itself is returned if rasterizing does. */
export async function renderPlaceholder(rasterize: Rasterizer = sharpRasterize, logger: Logger = consoleLogger): Promise<RenderedImage> {
  const svg = flatPlaceholderSvg();
  try {
    return { mimeType: "image/png", data: await rasterize(svg) };
  } catch (err) {
    logger.error(`placeholder rasterization failed, returning SVG: ${describeError(err)}`);
    return { mimeType: "image/svg+xml", data: Buffer.from(svg) };
  }
}

/**
 * Render one thumbnail concept: image service first (when configured), then
 * the local preview, then a flat placeholder. Always resolves.
 */
export async function renderThumbnail(
  concept: ThumbnailConcept,
  videoTitle: string,
  options: RenderOptions = {}
): Promise<RenderedThumbnail> {
  const logger = options.logger ?? consoleLogger;

  if (options.imageService) {
    try {
      const url = await options.imageService.generate({
        prompt: buildImagePrompt(concept, videoTitle, options.platform),
        size: imageSizeFor(options.platform),
        quality: options.quality ?? "standard",
        n: 1,
      });
      return { tier: "remote", url };
    } catch (err) {
      const failure =
        err instanceof RenderFailureError ? err : new RenderFailureError("remote", describeError(err), { cause: err });
      logger.warn(`image service failed, rendering locally: ${failure.message}`);
    }
  }

  try {
    const data = await renderLocalPreview(concept, videoTitle, options);
    return { tier: "local", mimeType: "image/png", data };
  } catch (err) {
    logger.warn(describeError(err));
  }

  return { tier: "placeholder", ...(await renderPlaceholder(options.rasterize, logger)) };
}
