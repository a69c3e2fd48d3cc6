import type {
  AnalysisResult,
  ModelResponse,
  RawThumbnailConcept,
  RawThumbnails,
  ThumbnailConcept,
  ThumbnailSet,
  TitleCandidate,
} from "./types";

export const TAG_COUNT = 35;

function toConcept(c: RawThumbnailConcept): ThumbnailConcept {
  return {
    concept: c.concept,
    text_overlay: c.text_overlay,
    colors: [...c.colors],
    focal_point: c.focal_point,
    tone: c.tone,
    composition: c.composition ?? "",
  };
}

/** Accepts every shape models have been seen to return for `thumbnails`. */
export function normalizeThumbnails(value: RawThumbnails | undefined): ThumbnailSet {
  if (value === undefined || value === null) return { thumbnail_concepts: [] };
  const concepts = Array.isArray(value) ? value : value.thumbnail_concepts ?? [];
  return { thumbnail_concepts: concepts.map(toConcept) };
}

/**
 * Force exactly TAG_COUNT tags, keeping the model's order: models put their
 * strongest tags at the top. Only a leading `#` or blank is stripped and
 * empty entries dropped; repeated tags are left as sent.
 */
export function repairTags(tags: string[]): string[] {
  const out = tags.map((raw) => raw.replace(/^[#\s]+/, "").trim()).filter((tag) => tag !== "");

  if (out.length > TAG_COUNT) return out.slice(0, TAG_COUNT);

  const seen = new Set(out);
  for (let i = 0; out.length < TAG_COUNT; i++) {
    const filler = `extra_tag_${i}`;
    if (seen.has(filler)) continue;
    seen.add(filler);
    out.push(filler);
  }
  return out;
}

/** Best rank first; stable, so ordered input comes back unchanged. */
export function orderTitles(titles: TitleCandidate[]): TitleCandidate[] {
  return titles
    .map((t, i) => ({ t, i }))
    .sort((a, b) => a.t.rank - b.t.rank || a.i - b.i)
    .map(({ t }) => ({ rank: t.rank, title: t.title, reason: t.reason }));
}

/** Turn a parsed model response into the output contract. Idempotent. */
export function repairModelResponse(response: ModelResponse): AnalysisResult {
  return {
    analysis: response.analysis,
    seo: {
      tags: repairTags(response.seo.tags),
      description: response.seo.description,
      timestamps: response.seo.timestamps.map((ts) => ({ time: ts.time, description: ts.description })),
      titles: orderTitles(response.seo.titles),
    },
    thumbnails: normalizeThumbnails(response.thumbnails),
  };
}
