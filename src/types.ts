export type BackendKind = "remote" | "local";

export const PLATFORMS = ["YouTube", "Instagram", "LinkedIn", "Facebook", "TikTok", "Unknown"] as const;
export type Platform = (typeof PLATFORMS)[number];

export type VideoContext = {
  title: string;
  author: string;
  platform: Platform;
  duration_seconds: number;
  transcript_text: string; // "" when the source has none
};

export type TimestampEntry = {
  time: string; // MM:SS
  description: string;
};

export type TitleCandidate = {
  rank: number;
  title: string;
  reason: string;
};

export type ThumbnailConcept = {
  concept: string;
  text_overlay: string;
  colors: string[]; // hex, best-first
  focal_point: string;
  tone: string;
  composition: string;
};

export type SeoBundle = {
  tags: string[];
  description: string;
  timestamps: TimestampEntry[];
  titles: TitleCandidate[];
};

export type ThumbnailSet = {
  thumbnail_concepts: ThumbnailConcept[];
};

export type AnalysisResult = {
  analysis: string;
  seo: SeoBundle;
  thumbnails: ThumbnailSet;
};

/** A concept as a model may return it, before `composition` is defaulted. */
export type RawThumbnailConcept = Omit<ThumbnailConcept, "composition"> & {
  composition?: string;
};

export type RawThumbnails =
  | RawThumbnailConcept[]
  | { thumbnail_concepts?: RawThumbnailConcept[] }
  | null;

/** Parsed model output: the contract minus what repair is allowed to fix. */
export type ModelResponse = {
  analysis: string;
  seo: SeoBundle;
  thumbnails?: RawThumbnails;
};

export type GenerationRequest = {
  language?: string; // default "English"
  backend?: BackendKind; // default "remote"
  model?: string; // default per backend, see config
};
