import { PLATFORMS } from "./types";

const TimestampSchema = {
  type: "object",
  properties: {
    time: { type: "string", pattern: "^\\d+:[0-5]\\d$" },
    description: { type: "string" },
  },
  required: ["time", "description"],
  additionalProperties: false,
} as const;

const TitleSchema = {
  type: "object",
  properties: {
    rank: { type: "integer", minimum: 1 },
    title: { type: "string", minLength: 1 },
    reason: { type: "string" },
  },
  required: ["rank", "title", "reason"],
  additionalProperties: false,
} as const;

const conceptProperties = {
  concept: { type: "string" },
  text_overlay: { type: "string" },
  colors: { type: "array", items: { type: "string" }, minItems: 1 },
  focal_point: { type: "string" },
  tone: { type: "string" },
  composition: { type: "string" },
} as const;

const ThumbnailConceptSchema = {
  type: "object",
  properties: conceptProperties,
  required: ["concept", "text_overlay", "colors", "focal_point", "tone", "composition"],
  additionalProperties: false,
} as const;

const seoProperties = (tags: object) => ({
  tags,
  description: { type: "string" },
  timestamps: { type: "array", items: TimestampSchema },
  titles: { type: "array", items: TitleSchema, minItems: 1 },
});

/** The output contract every returned result satisfies, fallback included. */
export const AnalysisResultSchema = {
  type: "object",
  properties: {
    analysis: { type: "string" },
    seo: {
      type: "object",
      properties: seoProperties({
        type: "array",
        items: { type: "string", pattern: "^[^#\\s]" },
        minItems: 35,
        maxItems: 35,
      }),
      required: ["tags", "description", "timestamps", "titles"],
      additionalProperties: false,
    },
    thumbnails: {
      type: "object",
      properties: {
        thumbnail_concepts: { type: "array", items: ThumbnailConceptSchema },
      },
      required: ["thumbnail_concepts"],
      additionalProperties: false,
    },
  },
  required: ["analysis", "seo", "thumbnails"],
  additionalProperties: false,
} as const;

const RawThumbnailConceptSchema = {
  type: "object",
  properties: conceptProperties,
  required: ["concept", "text_overlay", "colors", "focal_point", "tone"],
} as const;

/**
 * What a model response has to look like before repair. Extra keys are
 * tolerated and dropped by repair; tag count and the thumbnails wrapper are
 * left to repair as well.
 */
export const ModelResponseSchema = {
  type: "object",
  properties: {
    analysis: { type: "string" },
    seo: {
      type: "object",
      properties: seoProperties({ type: "array", items: { type: "string" } }),
      required: ["tags", "description", "timestamps", "titles"],
    },
    thumbnails: {
      anyOf: [
        { type: "array", items: RawThumbnailConceptSchema },
        {
          type: "object",
          properties: {
            thumbnail_concepts: { type: "array", items: RawThumbnailConceptSchema },
          },
        },
        { type: "null" },
      ],
    },
  },
  required: ["analysis", "seo"],
} as const;

export const VideoContextSchema = {
  type: "object",
  properties: {
    title: { type: "string" },
    author: { type: "string" },
    platform: { type: "string", enum: PLATFORMS },
    duration_seconds: { type: "integer", minimum: 0 },
    transcript_text: { type: "string" },
  },
  required: ["title", "author", "platform", "duration_seconds", "transcript_text"],
} as const;
