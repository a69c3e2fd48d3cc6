import { InvalidInputError } from "./errors";
import type { Platform } from "./types";

export type VideoReference = {
  url: string;
  platform: Platform;
  videoId: string | null; // YouTube only
};

const PLATFORM_HOSTS: [Platform, string[]][] = [
  ["YouTube", ["youtube.com", "youtu.be"]],
  ["Instagram", ["instagram.com"]],
  ["LinkedIn", ["linkedin.com"]],
  ["Facebook", ["facebook.com"]],
  ["TikTok", ["tiktok.com"]],
];

const YOUTUBE_ID_PATTERNS = [
  /(?:youtube\.com\/watch\?(?:.*&)?v=|youtu\.be\/|youtube\.com\/embed\/|youtube\.com\/v\/|youtube\.com\/e\/)([^&?#/]+)/,
  /youtube\.com\/shorts\/([^&?#/]+)/,
];

export function detectPlatform(url: string): Platform {
  const lower = url.toLowerCase();
  for (const [platform, hosts] of PLATFORM_HOSTS) {
    if (hosts.some((h) => lower.includes(h))) return platform;
  }
  return "Unknown";
}

export function extractYouTubeVideoId(url: string): string | null {
  let u = url.trim();
  if (!u) return null;
  if (!/^https?:\/\//i.test(u)) u = `https://${u}`;

  for (const re of YOUTUBE_ID_PATTERNS) {
    const m = re.exec(u);
    if (m) return m[1];
  }
  return null;
}

/** Throws InvalidInputError when there is nothing to analyze. */
export function parseVideoReference(url: string): VideoReference {
  const trimmed = url.trim();
  if (!trimmed) throw new InvalidInputError("Please enter a video URL");

  const platform = detectPlatform(trimmed);
  if (platform !== "YouTube") return { url: trimmed, platform, videoId: null };

  const videoId = extractYouTubeVideoId(trimmed);
  if (!videoId) throw new InvalidInputError(`Invalid YouTube URL: ${trimmed}`);
  return { url: trimmed, platform, videoId };
}

export function placeholderThumbnailUrl(ref: VideoReference): string | null {
  return ref.videoId ? `https://img.youtube.com/vi/${ref.videoId}/hqdefault.jpg` : null;
}
