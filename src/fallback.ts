import { TAG_COUNT } from "./repair";
import { deepFreeze } from "./utils";
import type { AnalysisResult, VideoContext } from "./types";

export const FALLBACK_VOCABULARY = [
  "youtube",
  "video",
  "content",
  "viral",
  "trending",
  "growth",
  "algorithm",
  "seo",
  "engagement",
  "audience",
] as const;

export function fallbackTags(count = TAG_COUNT): string[] {
  return Array.from({ length: count }, (_, i) => FALLBACK_VOCABULARY[i % FALLBACK_VOCABULARY.length]);
}

/**
 * Network-free result used whenever generation fails. Depends only on the
 * video title; `language` is accepted for signature parity with generate()
 * and does not change the text.
 */
export function fallback(video: VideoContext, _language = "English"): AnalysisResult {
  const title = video.title.trim() || "Untitled Video";

  return deepFreeze({
    analysis: `SEO analysis is temporarily unavailable for ${title}.`,
    seo: {
      tags: fallbackTags(),
      description: `This is a video titled "${title}". Full SEO optimization could not be generated right now; try again later.`,
      timestamps: [
        { time: "00:00", description: "Introduction" },
        { time: "00:30", description: "Main content" },
      ],
      titles: [{ rank: 1, title, reason: "Fallback title" }],
    },
    thumbnails: {
      thumbnail_concepts: [
        {
          concept: "Bold contrast thumbnail with strong central text",
          text_overlay: "WATCH THIS",
          colors: ["#FF0000", "#FFFFFF", "#000000"],
          focal_point: "Center",
          tone: "Bold",
          composition: "Centered",
        },
      ],
    },
  });
}
