import { describe, it, expect } from "vitest";
import { FALLBACK_VOCABULARY, fallback, fallbackTags } from "../src/fallback";
import { validateAnalysisResult } from "../src/validator";
import { hash } from "../src/utils";
import { canonicalSerialize, videoFixture } from "./helpers";

describe("fallback (20-run hash)", () => {
  const video = videoFixture();

  it("produces identical hashes across 20 runs", () => {
    const hashes = new Set<string>();
    for (let i = 0; i < 20; i++) {
      hashes.add(hash(canonicalSerialize(fallback(video, "English"))));
    }
    expect(hashes.size).toBe(1);
  });

  it("ignores transcript, author and language", () => {
    const other = videoFixture({ author: "Someone else", transcript_text: "different words", duration_seconds: 5 });
    expect(fallback(other, "Japanese")).toEqual(fallback(video, "English"));
  });
});

describe("fallback result", () => {
  const result = fallback(videoFixture(), "English");

  it("satisfies the output schema", () => {
    expect(validateAnalysisResult(result)).toEqual({ valid: true });
  });

  it("cycles the vocabulary to exactly 35 tags", () => {
    expect(result.seo.tags).toHaveLength(35);
    expect(result.seo.tags[0]).toBe("youtube");
    expect(result.seo.tags[10]).toBe("youtube");
    expect(result.seo.tags[34]).toBe("trending");
    result.seo.tags.forEach((tag, i) => expect(tag).toBe(FALLBACK_VOCABULARY[i % 10]));
    expect(fallbackTags(3)).toEqual(["youtube", "video", "content"]);
  });

  it("keeps the original title as the only candidate", () => {
    expect(result.seo.titles).toEqual([{ rank: 1, title: "Intro to Rust", reason: "Fallback title" }]);
    expect(result.analysis).toBe("SEO analysis is temporarily unavailable for Intro to Rust.");
    expect(result.seo.description).toContain('"Intro to Rust"');
  });

  it("has two canonical timestamps and one thumbnail concept", () => {
    expect(result.seo.timestamps.map((t) => t.time)).toEqual(["00:00", "00:30"]);
    expect(result.thumbnails.thumbnail_concepts).toHaveLength(1);
    expect(result.thumbnails.thumbnail_concepts[0].colors).toEqual(["#FF0000", "#FFFFFF", "#000000"]);
  });

  it("names an untitled video", () => {
    expect(fallback(videoFixture({ title: "  " })).seo.titles[0].title).toBe("Untitled Video");
  });

  it("is frozen", () => {
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.seo.tags)).toBe(true);
    expect(Object.isFrozen(result.thumbnails.thumbnail_concepts[0])).toBe(true);
  });
});
