import type { BackendKind } from "./types";

export type SeoConfig = {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  ollamaBaseUrl: string;
  requestTimeoutMs: number;
  temperature: number;
  defaultModels: Record<BackendKind, string>;
};

export const DEFAULT_CONFIG: SeoConfig = {
  ollamaBaseUrl: "http://localhost:11434/v1",
  requestTimeoutMs: 120_000,
  temperature: 0.7,
  defaultModels: { remote: "gpt-4o", local: "qwen2.5:3b" },
};

function numberFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number(value);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

/** Read settings from the environment; unset or malformed values keep their defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SeoConfig {
  return {
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    openaiBaseUrl: nonEmpty(env.OPENAI_BASE_URL),
    ollamaBaseUrl: nonEmpty(env.OLLAMA_BASE_URL) ?? DEFAULT_CONFIG.ollamaBaseUrl,
    requestTimeoutMs: numberFrom(env.SEO_REQUEST_TIMEOUT_MS, DEFAULT_CONFIG.requestTimeoutMs),
    temperature: numberFrom(env.SEO_TEMPERATURE, DEFAULT_CONFIG.temperature),
    defaultModels: {
      remote: nonEmpty(env.SEO_REMOTE_MODEL) ?? DEFAULT_CONFIG.defaultModels.remote,
      local: nonEmpty(env.SEO_LOCAL_MODEL) ?? DEFAULT_CONFIG.defaultModels.local,
    },
  };
}
