import Ajv, { type ErrorObject } from "ajv";
import { AnalysisResultSchema, ModelResponseSchema, VideoContextSchema } from "./schema";
import { SchemaViolationError } from "./errors";
import type { AnalysisResult, ModelResponse, VideoContext } from "./types";

const ajv = new Ajv({ allErrors: true, strict: true });
const validateResultFn = ajv.compile<AnalysisResult>(AnalysisResultSchema);
const validateResponseFn = ajv.compile<ModelResponse>(ModelResponseSchema);
const validateContextFn = ajv.compile<VideoContext>(VideoContextSchema);

export type ValidationOutcome = { valid: boolean; errors?: string[] };

function describe(errors: ErrorObject[] | null | undefined): string[] {
  return (errors || []).map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
}

export function validateAnalysisResult(o: unknown): ValidationOutcome {
  if (validateResultFn(o)) return { valid: true };
  return { valid: false, errors: describe(validateResultFn.errors) };
}

export function isAnalysisResult(o: unknown): o is AnalysisResult {
  return validateResultFn(o);
}

export function validateVideoContext(o: unknown): ValidationOutcome {
  if (validateContextFn(o)) return { valid: true };
  return { valid: false, errors: describe(validateContextFn.errors) };
}

export function isVideoContext(o: unknown): o is VideoContext {
  return validateContextFn(o);
}

/** Models like to wrap JSON in a markdown fence despite being told not to. */
export function stripCodeFence(raw: string): string {
  const text = raw.trim();
  const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/.exec(text);
  return fenced ? fenced[1].trim() : text;
}

/**
 * Parse raw model text into a ModelResponse. Throws SchemaViolationError
 * for anything that is not JSON of the expected shape.
 */
export function parseModelResponse(raw: string): ModelResponse {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(raw));
  } catch (err) {
    throw new SchemaViolationError("model response is not valid JSON", [], { cause: err });
  }

  if (!validateResponseFn(data)) {
    const issues = describe(validateResponseFn.errors);
    throw new SchemaViolationError(`model response does not match the schema: ${issues.join("; ")}`, issues);
  }

  const ranks = new Set<number>();
  for (const t of data.seo.titles) {
    if (ranks.has(t.rank)) {
      throw new SchemaViolationError(`duplicate title rank ${t.rank}`, [`/seo/titles rank ${t.rank} is repeated`]);
    }
    ranks.add(t.rank);
  }
  return data;
}
