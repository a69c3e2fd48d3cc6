import type { BackendKind, VideoContext } from "./types";

export const TRUNCATION_MARKER = " ... (truncated)";

const TRANSCRIPT_BUDGET: Record<BackendKind, number> = {
  remote: 30_000,
  local: 15_000, // local models run with much smaller context windows
};

export function transcriptBudget(kind: BackendKind): number {
  return TRANSCRIPT_BUDGET[kind];
}

export function truncateTranscript(transcript: string, kind: BackendKind): string {
  const max = transcriptBudget(kind);
  if (transcript.length <= max) return transcript;
  // budget counts code points; slicing UTF-16 units could split a surrogate pair
  const chars = Array.from(transcript);
  if (chars.length <= max) return transcript;
  return chars.slice(0, max).join("") + TRUNCATION_MARKER;
}

/** The video block the prompt embeds. Pure. */
export function buildContext(video: VideoContext, kind: BackendKind): string {
  const transcript = truncateTranscript(video.transcript_text, kind);
  return [
    `Title: ${video.title}`,
    `Author: ${video.author}`,
    `Platform: ${video.platform}`,
    `Duration: ${video.duration_seconds} seconds`,
    "",
    "Transcript:",
    transcript || "(no transcript available)",
  ].join("\n");
}
