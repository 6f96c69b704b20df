import * as cheerio from "cheerio";
import { type FieldSchema, describeFieldSchema } from "../schema";

export const TRUNCATION_MARKER = "\n\n[Content truncated...]";

export const DEFAULT_SYSTEM_PROMPT = `You are a web data extraction assistant. Extract structured data from the page content you are given and answer with valid JSON.

Rules:
1. Extract only the fields that were requested.
2. Answer with a JSON object that follows the requested schema.
3. Use null for any field that cannot be found.
4. Use an empty array when a list field has no items.
5. Keep the data types given in the schema.
6. Answer with the JSON object only, without any explanation.`;

export interface PromptInput {
  content: string;
  schema: FieldSchema;
  instructions?: string;
  /** Content longer than this is truncated before it is embedded. */
  maxLength: number;
}

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * Shortens `content` to at most `maxLength` characters plus a marker. The cut
 * moves back to the last tag end or sentence end when that keeps more than
 * 80% of the allowed length.
 */
export function truncateContent(content: string, maxLength: number): string {
  if (content.length <= maxLength) {
    return content;
  }

  const truncated = content.slice(0, maxLength);
  const cutPoint = Math.max(truncated.lastIndexOf(">"), truncated.lastIndexOf(".")) + 1;
  if (cutPoint > maxLength * 0.8) {
    return `${truncated.slice(0, cutPoint)}${TRUNCATION_MARKER}`;
  }
  return `${truncated}${TRUNCATION_MARKER}`;
}

/**
 * Removes markup that carries no extractable data (scripts, styles, inline
 * SVG, frames, templates and comments).
 */
export function cleanHtml(html: string): string {
  const $ = cheerio.load(html.replace(/<!--[\s\S]*?-->/g, ""));
  $("script, style, noscript, svg, iframe, template").remove();
  return $.html();
}

/**
 * Rough token estimate at four characters per token.
 */
export function estimateTokenCount(text: string): number {
  return Math.ceil(text.length / 4);
}

function instructionsSection(instructions: string | undefined, heading: string): string {
  const trimmed = instructions?.trim();
  return trimmed ? `\n${heading}\n${trimmed}\n` : "";
}

function extractionRequest(input: PromptInput): string {
  return `${instructionsSection(input.instructions, "Additional Instructions:")}
Schema to extract:
${describeFieldSchema(input.schema)}

Page Content:
${truncateContent(input.content, input.maxLength)}

Return only valid JSON matching the schema above.`;
}

/**
 * Self-contained prompt that embeds the rules and the schema as text.
 */
export function buildExtractionPrompt(input: PromptInput): string {
  return `${DEFAULT_SYSTEM_PROMPT}\n${extractionRequest(input)}`;
}

/**
 * System and user messages for chat-completion APIs. The rules travel in the
 * system message only.
 */
export function buildChatMessages(input: PromptInput, systemPrompt = DEFAULT_SYSTEM_PROMPT): ChatMessage[] {
  return [
    { role: "system", content: systemPrompt },
    { role: "user", content: extractionRequest(input).trimStart() },
  ];
}

/**
 * Prompt for providers that receive the schema out of band as a structured
 * response schema. The schema itself is not repeated in the text.
 */
export function buildSchemaGuidedPrompt(input: Omit<PromptInput, "schema">): string {
  return `You are a web data extraction assistant. Extract structured data from the page content and answer with valid JSON only.

Rules:
1. Output the JSON object only, with no markdown and no prose.
2. Follow the response schema supplied with this request; do not restate it.
3. Return every field of the schema, even when its value is null.
4. Use values that appear in the content; never invent values.
5. Use a bare null for missing values, never the string "null", "N/A" or a placeholder.
6. Use [] for lists without items and never put null inside a list.
7. Keep the data types of the schema (string, number, boolean, array).
8. For object fields, give the structured content as a JSON string or formatted text.
9. Prefer ISO 8601 for dates; partial dates are fine when nothing more is available.
10. Do not invent URLs, email addresses or prices; use null when they are missing.
11. Trim surrounding whitespace.
${instructionsSection(input.instructions, "Additional Instructions (follow them, but do not restate the schema):")}
PAGE CONTENT START
${truncateContent(input.content, input.maxLength)}
PAGE CONTENT END

Return the complete JSON object with all schema fields now.`;
}
