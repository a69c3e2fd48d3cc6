import OpenAI from "openai";
import type { SeoConfig } from "../config";
import { BackendUnavailableError, SchemaViolationError, describeError } from "../errors";
import type { BackendKind } from "../types";

export type OpenAIClientOptions = NonNullable<ConstructorParameters<typeof OpenAI>[0]>;

export type ChatPrompt = { system: string; user: string };

/** A resolved language model. One complete() call is one request. */
export interface ChatBackend {
  readonly kind: BackendKind;
  readonly model: string;
  complete(prompt: ChatPrompt): Promise<string>;
}

export type BackendResolver = (kind: BackendKind, model: string) => Promise<ChatBackend>;

/**
 * Chat-completions backend. Serves both the cloud API and Ollama, which
 * exposes the same protocol under /v1.
 */
export class OpenAIChatBackend implements ChatBackend {
  constructor(
    private readonly client: OpenAI,
    readonly kind: BackendKind,
    readonly model: string,
    private readonly temperature: number
  ) {}

  async complete(prompt: ChatPrompt): Promise<string> {
    const completion = await this.client.chat.completions
      .create({
        model: this.model,
        temperature: this.temperature,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
      })
      .catch((err: unknown) => {
        throw new BackendUnavailableError(`${this.kind} model "${this.model}" request failed: ${describeError(err)}`, {
          cause: err,
        });
      });

    const content = completion.choices[0]?.message?.content;
    if (!content || !content.trim()) {
      throw new SchemaViolationError(`${this.kind} model "${this.model}" returned an empty completion`);
    }
    return content;
  }
}

async function listModelIds(client: OpenAI): Promise<string[]> {
  const ids: string[] = [];
  for await (const model of client.models.list()) ids.push(model.id);
  return ids;
}

/** Ollama reports untagged pulls as `name:latest`. */
export function isModelInstalled(model: string, installed: string[]): boolean {
  return installed.includes(model) || (!model.includes(":") && installed.includes(`${model}:latest`));
}

/**
 * Build the resolver the engine uses. `clientOptions` is merged last, which
 * is how tests swap in a fetch stand-in.
 */
export function createBackendResolver(config: SeoConfig, clientOptions: OpenAIClientOptions = {}): BackendResolver {
  return async (kind, model) => {
    const base: OpenAIClientOptions = { maxRetries: 0, timeout: config.requestTimeoutMs };

    if (kind === "remote") {
      if (!config.openaiApiKey) {
        throw new BackendUnavailableError("OPENAI_API_KEY is not set");
      }
      const client = new OpenAI({
        ...base,
        apiKey: config.openaiApiKey,
        baseURL: config.openaiBaseUrl,
        ...clientOptions,
      });
      return new OpenAIChatBackend(client, kind, model, config.temperature);
    }

    const client = new OpenAI({ ...base, apiKey: "ollama", baseURL: config.ollamaBaseUrl, ...clientOptions });
    const installed = await listModelIds(client).catch((err: unknown) => {
      throw new BackendUnavailableError(`cannot reach Ollama at ${config.ollamaBaseUrl}: ${describeError(err)}`, {
        cause: err,
      });
    });
    if (!isModelInstalled(model, installed)) {
      throw new BackendUnavailableError(`model "${model}" is not installed; run: ollama pull ${model}`);
    }
    return new OpenAIChatBackend(client, kind, model, config.temperature);
  };
}
