import type { ThumbnailConcept } from "./types";

export const PREVIEW_WIDTH = 1280;
export const PREVIEW_HEIGHT = 720;
export const DEFAULT_GRADIENT: [string, string] = ["#3366CC", "#FFFFFF"];
export const PLACEHOLDER_COLOR = "#222222";
export const WATERMARK = "AI Generated Preview";

export type Rgb = [number, number, number];
export type TonePattern = "grid" | "crosshatch" | "arcs";
export type TextAnchor = "start" | "middle" | "end";
export type TextBaseline = "middle" | "hanging";
/** `hanging` puts the top edge of the text on `y`. */
export type TextPlacement = { x: number; y: number; anchor: TextAnchor; baseline: TextBaseline };

export type PreviewSvgOptions = {
  width?: number;
  height?: number;
  /** false when the SVG is an overlay on a downloaded base image */
  background?: boolean;
  title?: string;
};

export function parseHexColor(color: string): Rgb | null {
  const m = /^#?([0-9a-fA-F]{6})$/.exec(color.trim());
  if (!m) return null;
  const n = parseInt(m[1], 16);
  return [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff];
}

export function toHex([r, g, b]: Rgb): string {
  return "#" + [r, g, b].map((c) => c.toString(16).padStart(2, "0")).join("").toUpperCase();
}

export function gradientColors(colors: string[]): [string, string] {
  if (colors.length < 2) return DEFAULT_GRADIENT;
  const top = parseHexColor(colors[0]);
  const bottom = parseHexColor(colors[1]);
  if (!top || !bottom) return DEFAULT_GRADIENT;
  return [toHex(top), toHex(bottom)];
}

export function tonePattern(tone: string): TonePattern | null {
  const t = tone.toLowerCase();
  if (t.includes("professional")) return "grid";
  if (t.includes("energetic")) return "crosshatch";
  if (t.includes("dramatic")) return "arcs";
  return null;
}

export function textPlacement(composition: string, width: number, height: number): TextPlacement {
  const c = composition.toLowerCase();
  if (c.includes("top")) return { x: width / 2, y: height / 4, anchor: "middle", baseline: "hanging" };
  if (c.includes("bottom")) return { x: width / 2, y: (height * 3) / 4, anchor: "middle", baseline: "hanging" };
  if (c.includes("left")) return { x: width / 4, y: height / 2, anchor: "start", baseline: "middle" };
  if (c.includes("right")) return { x: (width * 3) / 4, y: height / 2, anchor: "end", baseline: "middle" };
  return { x: width / 2, y: height / 2, anchor: "middle", baseline: "middle" };
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function patternSvg(pattern: TonePattern, w: number, h: number): string {
  const segments: string[] = [];
  switch (pattern) {
    case "grid":
      for (let x = 0; x < w; x += 40) segments.push(`M${x} 0V${h}`);
      for (let y = 0; y < h; y += 40) segments.push(`M0 ${y}H${w}`);
      return `<path d="${segments.join("")}" stroke="#FFFFFF" stroke-opacity="0.06" stroke-width="1" fill="none"/>`;
    case "crosshatch":
      for (let x = -h; x < w + h; x += 60) segments.push(`M${x} 0L${x + h} ${h}M${x} ${h}L${x + h} 0`);
      return `<path d="${segments.join("")}" stroke="#FFFFFF" stroke-opacity="0.1" stroke-width="3" fill="none"/>`;
    case "arcs": {
      const circles: string[] = [];
      for (let r = 50; r < Math.max(w, h); r += 120) {
        circles.push(`<circle cx="${w / 2}" cy="${h / 2}" r="${r}"/>`);
      }
      return `<g stroke="#FFFFFF" stroke-opacity="0.12" stroke-width="2" fill="none">${circles.join("")}</g>`;
    }
  }
}

function overlayTextSvg(concept: ThumbnailConcept, w: number, h: number): string {
  const text = concept.text_overlay.trim();
  if (!text) return "";
  const fill = toHex(parseHexColor(concept.colors[0] ?? "") ?? [255, 255, 255]);
  const outline = concept.colors.length > 1 ? toHex(parseHexColor(concept.colors[1]) ?? [255, 255, 255]) : "#000000";
  const { x, y, anchor, baseline } = textPlacement(concept.composition, w, h);
  return (
    `<text x="${x}" y="${y}" text-anchor="${anchor}" dominant-baseline="${baseline}" ` +
    `font-family="Impact, Arial, Helvetica, sans-serif" font-size="80" font-weight="bold" ` +
    `fill="${fill}" stroke="${outline}" stroke-width="6" stroke-linejoin="round" paint-order="stroke">` +
    `${escapeXml(text)}</text>`
  );
}

/** Local preview as SVG: gradient, tone pattern, outlined overlay text, watermark. */
export function buildPreviewSvg(concept: ThumbnailConcept, options: PreviewSvgOptions = {}): string {
  const w = options.width ?? PREVIEW_WIDTH;
  const h = options.height ?? PREVIEW_HEIGHT;
  const parts: string[] = [`<svg xmlns="http://www.w3.org/2000/svg" width="${w}" height="${h}" viewBox="0 0 ${w} ${h}">`];

  if (options.title) parts.push(`<title>${escapeXml(options.title)}</title>`);

  if (options.background !== false) {
    const [top, bottom] = gradientColors(concept.colors);
    parts.push(
      `<defs><linearGradient id="bg" x1="0" y1="0" x2="0" y2="1">` +
        `<stop offset="0" stop-color="${top}"/><stop offset="1" stop-color="${bottom}"/>` +
        `</linearGradient></defs>`,
      `<rect width="${w}" height="${h}" fill="url(#bg)"/>`
    );
    const pattern = tonePattern(concept.tone);
    if (pattern) parts.push(patternSvg(pattern, w, h));
  }

  parts.push(overlayTextSvg(concept, w, h));
  parts.push(
    `<text x="${w - 240}" y="${h - 35}" dominant-baseline="hanging" font-family="Arial, Helvetica, sans-serif" ` +
      `font-size="20" fill="#FFFFFF">${WATERMARK}</text>`
  );
  parts.push("</svg>");
  return parts.join("");
}

export function flatPlaceholderSvg(width = PREVIEW_WIDTH, height = PREVIEW_HEIGHT): string {
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
    `<rect width="${width}" height="${height}" fill="${PLACEHOLDER_COLOR}"/></svg>`
  );
}
