/**
 * SEO prompt template.
 * Version: 2.1.0
 */

import { AnalysisResultSchema } from "./schema";

export const PROMPT_VERSION = "2.1.0";

export const SYSTEM_PROMPT = `You are an elite YouTube SEO strategist and growth expert. You answer with a single JSON object and nothing else.`;

export const SEO_PROMPT_TEMPLATE = `LANGUAGE: {language}

Analyze the video below and produce the best SEO optimization plan for it.

VIDEO DATA:
{video_info}

REQUIREMENTS:

1. ANALYSIS
Deep insight on audience intent, tone, value proposition, why viewers watch and engagement potential.

2. TAGS
- EXACTLY 35 SEO tags
- No duplicates
- No hashtags, never start a tag with "#"
- Short, high search intent

3. DESCRIPTION
- 350 to 500 words
- Hook in the first line
- Keyword rich
- End with a clear call to action

4. TIMESTAMPS
- Helpful navigation points across the whole video
- "time" in MM:SS format

5. TITLES
- EXACTLY 5 high CTR titles
- Ranked 1 to 5, best first
- A brief reason for each

6. THUMBNAILS
EXACTLY 3 thumbnail concepts, each with:
- concept
- text_overlay
- colors: 3 hex color codes such as "#FF0000"
- focal_point
- tone
- composition

Write every text value in {language}, whatever the language of the video.

Return ONLY valid JSON. No markdown. No code fences. No explanations.

{format_instructions}`;

export function formatInstructions(): string {
  return [
    "The output must be a JSON instance that conforms to the JSON schema below.",
    "",
    'As an example, for the schema {"properties": {"foo": {"type": "array", "items": {"type": "string"}}}, "required": ["foo"]}',
    'the object {"foo": ["bar", "baz"]} is a well-formatted instance of the schema. The object {"properties": {"foo": ["bar", "baz"]}} is not well-formatted.',
    "",
    "Here is the output schema:",
    JSON.stringify(AnalysisResultSchema),
  ].join("\n");
}

/** Single-pass `{name}` substitution: substituted text is never expanded again. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? vars[name] : match
  );
}

export function renderPrompt(input: { contextBlock: string; language: string }): string {
  return renderTemplate(SEO_PROMPT_TEMPLATE, {
    language: input.language,
    video_info: input.contextBlock,
    format_instructions: formatInstructions(),
  });
}
