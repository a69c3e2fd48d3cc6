import { describe, it, expect } from "vitest";
import {
  buildPreviewSvg,
  flatPlaceholderSvg,
  gradientColors,
  parseHexColor,
  textPlacement,
  tonePattern,
} from "../src/thumbnailPreview";
import type { ThumbnailConcept } from "../src/types";

const concept = (overrides: Partial<ThumbnailConcept> = {}): ThumbnailConcept => ({
  concept: "Crab mascot",
  text_overlay: "RUST & <GO>",
  colors: ["#B7410E", "#FFFFFF", "#000000"],
  focal_point: "crab",
  tone: "Energetic",
  composition: "Text top",
  ...overrides,
});

const count = (s: string, needle: RegExp) => (s.match(needle) ?? []).length;

describe("colors", () => {
  it("parses six-digit hex with or without #", () => {
    expect(parseHexColor("#FF0000")).toEqual([255, 0, 0]);
    expect(parseHexColor("ff8800")).toEqual([255, 136, 0]);
    expect(parseHexColor("red")).toBeNull();
    expect(parseHexColor("#FFF")).toBeNull();
  });

  it("falls back to blue over white unless two colors parse", () => {
    expect(gradientColors(["#ff0000"])).toEqual(["#3366CC", "#FFFFFF"]);
    expect(gradientColors(["#ff0000", "teal"])).toEqual(["#3366CC", "#FFFFFF"]);
    expect(gradientColors(["#ff0000", "#00ff00", "#000000"])).toEqual(["#FF0000", "#00FF00"]);
  });
});

describe("tonePattern", () => {
  it("matches tone keywords case-insensitively, first match wins", () => {
    expect(tonePattern("Highly Professional")).toBe("grid");
    expect(tonePattern("ENERGETIC and fun")).toBe("crosshatch");
    expect(tonePattern("dramatic")).toBe("arcs");
    expect(tonePattern("professional but dramatic")).toBe("grid");
    expect(tonePattern("calm")).toBeNull();
  });
});

describe("textPlacement", () => {
  it("centers by default and moves to quarter lines by composition", () => {
    expect(textPlacement("", 1280, 720)).toEqual({ x: 640, y: 360, anchor: "middle", baseline: "middle" });
    expect(textPlacement("Text TOP", 1280, 720)).toEqual({ x: 640, y: 180, anchor: "middle", baseline: "hanging" });
    expect(textPlacement("bottom third", 1280, 720)).toEqual({ x: 640, y: 540, anchor: "middle", baseline: "hanging" });
    expect(textPlacement("left side", 1280, 720)).toEqual({ x: 320, y: 360, anchor: "start", baseline: "middle" });
    expect(textPlacement("Right", 1280, 720)).toEqual({ x: 960, y: 360, anchor: "end", baseline: "middle" });
    expect(textPlacement("top left", 1280, 720).y).toBe(180);
  });
});

describe("buildPreviewSvg", () => {
  const svg = buildPreviewSvg(concept());

  it("draws a vertical gradient from the first two colors", () => {
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="1280" height="720" viewBox="0 0 1280 720">')).toBe(true);
    expect(svg).toContain('<linearGradient id="bg" x1="0" y1="0" x2="0" y2="1">');
    expect(svg).toContain('<stop offset="0" stop-color="#B7410E"/><stop offset="1" stop-color="#FFFFFF"/>');
  });

  it("adds the tone pattern", () => {
    expect(svg).toContain('stroke-opacity="0.1" stroke-width="3"');
    const arcs = buildPreviewSvg(concept({ tone: "Dramatic" }));
    expect(count(arcs, /<circle /g)).toBe(11);
    const grid = buildPreviewSvg(concept({ tone: "professional" }));
    expect(grid).toContain("M1240 0V720");
    expect(grid).toContain("M0 680H1280");
    expect(grid).not.toContain("M1280 0V720");
    expect(buildPreviewSvg(concept({ tone: "calm" }))).not.toContain("<path");
  });

  it("writes the escaped overlay text with an outline", () => {
    expect(svg).toContain('<text x="640" y="180" text-anchor="middle" dominant-baseline="hanging" ');
    expect(svg).toContain('fill="#B7410E" stroke="#FFFFFF" stroke-width="6"');
    expect(svg).toContain(">RUST &amp; &lt;GO&gt;</text>");
  });

  it("uses white text on a black outline when colors are unusable", () => {
    const out = buildPreviewSvg(concept({ colors: ["red"] }));
    expect(out).toContain('fill="#FFFFFF" stroke="#000000"');
    expect(out).toContain('stop-color="#3366CC"');
  });

  it("always adds the watermark", () => {
    expect(svg).toContain('<text x="1040" y="685" dominant-baseline="hanging"');
    expect(svg.endsWith(">AI Generated Preview</text></svg>")).toBe(true);
    expect(count(buildPreviewSvg(concept({ text_overlay: "" })), /<text /g)).toBe(1);
  });

  it("leaves out the background for an overlay", () => {
    const overlay = buildPreviewSvg(concept(), { background: false, title: "Intro to Rust" });
    expect(overlay).not.toContain("linearGradient");
    expect(overlay).not.toContain("<path");
    expect(overlay).toContain("<title>Intro to Rust</title>");
  });
});

describe("flatPlaceholderSvg", () => {
  it("is a single dark rectangle", () => {
    expect(flatPlaceholderSvg()).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="1280" height="720" viewBox="0 0 1280 720">' +
        '<rect width="1280" height="720" fill="#222222"/></svg>'
    );
  });
});
