import fs from "fs";
import path from "path";
import { vi } from "vitest";
import type { BackendResolver, ChatPrompt } from "../src/adapters/chatBackends";
import type { ModelResponse, VideoContext } from "../src/types";

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, "../fixtures", name), "utf8");
}

export function modelResponseFixture(): ModelResponse {
  return JSON.parse(readFixture("model-response.json"));
}

export function videoFixture(overrides: Partial<VideoContext> = {}): VideoContext {
  return { ...JSON.parse(readFixture("video-context.json")), ...overrides };
}

export function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** In-process stand-in for a model: records every prompt and answers with `reply`. */
export function fakeResolver(reply: string | (() => Promise<string>)) {
  const prompts: ChatPrompt[] = [];
  const resolved: { kind: string; model: string }[] = [];
  const resolve: BackendResolver = async (kind, model) => {
    resolved.push({ kind, model });
    return {
      kind,
      model,
      complete: async (prompt) => {
        prompts.push(prompt);
        return typeof reply === "string" ? reply : reply();
      },
    };
  };
  return { resolve, prompts, resolved };
}

export type RecordedRequest = { url: string; method: string; body?: string };

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

/** fetch stand-in for the openai client. */
export function fakeFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const requests: RecordedRequest[] = [];
  const fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    requests.push({
      url,
      method: init?.method ?? "GET",
      body: typeof init?.body === "string" ? init.body : undefined,
    });
    return handler(url, init);
  };
  return { fetch, requests };
}

export function chatCompletion(content: string | null) {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "test-model",
    choices: [
      {
        index: 0,
        finish_reason: "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null },
      },
    ],
  };
}

/** Canonical JSON (sorted keys) for stable hashing. */
export function canonicalSerialize(o: unknown): string {
  const seen = new WeakSet<object>();
  const sortKeys = (v: unknown): unknown => {
    if (v && typeof v === "object") {
      if (seen.has(v)) return null;
      seen.add(v);
      if (Array.isArray(v)) return v.map(sortKeys);
      const out: Record<string, unknown> = {};
      for (const [k, val] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        out[k] = sortKeys(val);
      }
      return out;
    }
    return v;
  };
  return JSON.stringify(sortKeys(o));
}
