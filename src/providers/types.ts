import type { FieldSchema } from "../schema";
import type { JsonObject } from "../utils/json";
import type { Logger } from "../utils/logger";
import type { AiProvider } from "./models";

/**
 * Sampling parameters passed through to the completion API.
 */
export interface GenerationOptions {
  /** Defaults to 0.1 */
  temperature?: number;
  /** Defaults to 1000 */
  maxTokens?: number;
  topP?: number;
  /** Gemini only */
  topK?: number;
  /** OpenAI only */
  frequencyPenalty?: number;
  /** OpenAI only */
  presencePenalty?: number;
}

export interface ProviderOptions {
  apiKey: string;
  model?: string;
  /** Deadline for one completion request */
  timeoutMs?: number;
  generation?: GenerationOptions;
  /** Strip scripts, styles and comments before prompting. Defaults to true. */
  cleanHtml?: boolean;
  logger?: Logger;
}

export interface ExtractOptions {
  /** Free-text guidance appended to the prompt */
  instructions?: string;
}

export interface ProviderExtraction {
  /** Parsed and normalized result; every schema field is present */
  data: JsonObject;
  /** Completion text as returned by the service */
  rawResponse: string;
}

/**
 * Input for one completion call, after validation and cleanup.
 */
export interface CompletionRequest {
  content: string;
  schema: FieldSchema;
  instructions?: string;
}

/**
 * An AI service able to turn page content into data shaped by a field schema.
 */
export interface ExtractionProvider {
  readonly id: AiProvider;
  readonly displayName: string;
  readonly model: string;
  /** Page content beyond this many characters is truncated */
  readonly maxContentLength: number;
  extract(
    content: string,
    schema: FieldSchema,
    options?: ExtractOptions,
  ): Promise<ProviderExtraction>;
  /** Cheap format check of the configured API key; makes no request. */
  validateApiKey(): boolean;
}
