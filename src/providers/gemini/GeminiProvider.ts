import {
  type GenerateContentParameters,
  type GenerateContentResponse,
  GoogleGenAI,
  HarmBlockThreshold,
  HarmCategory,
} from "@google/genai";
import { ParsingError, ProviderError, toError } from "../../utils/errors";
import { BaseExtractionProvider, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from "../BaseExtractionProvider";
import { AiProvider, DEFAULT_MODELS } from "../models";
import { buildSchemaGuidedPrompt } from "../prompt";
import type { CompletionRequest, ProviderOptions } from "../types";
import { toGeminiResponseSchema } from "./responseSchema";

/**
 * The slice of the SDK client this provider calls.
 */
export interface GeminiModelsClient {
  generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse>;
}

export interface GeminiProviderOptions extends ProviderOptions {
  /** Replaces the SDK client, mainly for tests */
  client?: GeminiModelsClient;
}

const SAFETY_SETTINGS = [
  HarmCategory.HARM_CATEGORY_HARASSMENT,
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_NONE }));

/**
 * Extraction through Gemini with a structured response schema, so the field
 * schema is enforced by the service rather than described in the prompt.
 */
export class GeminiProvider extends BaseExtractionProvider {
  readonly id = AiProvider.Gemini;
  readonly maxContentLength = 100_000;

  private readonly client: GeminiModelsClient;

  constructor(options: GeminiProviderOptions) {
    super(options, DEFAULT_MODELS[AiProvider.Gemini]);
    this.client = options.client ?? new GoogleGenAI({ apiKey: options.apiKey }).models;
  }

  validateApiKey(): boolean {
    return this.apiKey.startsWith("AI") && this.apiKey.length >= 10;
  }

  protected async complete(request: CompletionRequest): Promise<string> {
    const prompt = buildSchemaGuidedPrompt({
      content: request.content,
      instructions: request.instructions,
      maxLength: this.maxContentLength,
    });

    let response: GenerateContentResponse;
    try {
      response = await this.client.generateContent({
        model: this.model,
        contents: prompt,
        config: {
          temperature: this.generation.temperature ?? DEFAULT_TEMPERATURE,
          topK: this.generation.topK,
          topP: this.generation.topP,
          maxOutputTokens: this.generation.maxTokens ?? DEFAULT_MAX_TOKENS,
          responseMimeType: "application/json",
          responseSchema: toGeminiResponseSchema(request.schema),
          safetySettings: SAFETY_SETTINGS,
        },
      });
    } catch (error) {
      throw this.toProviderError(error);
    }

    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new ProviderError(
        `Content blocked by safety filters: ${blockReason}`,
        this.id,
        "generic",
        400,
      );
    }

    const text = response.text;
    if (!text?.trim()) {
      throw new ParsingError("empty response content", text ?? "");
    }
    this.logger.debug(`${this.displayName} answered with ${text.length} characters`);
    return text;
  }

  /**
   * Classifies SDK failures by their message first, then by HTTP status.
   */
  private toProviderError(error: unknown): ProviderError {
    const cause = toError(error);
    const message = cause.message;
    const lower = message.toLowerCase();

    if (lower.includes("api key")) {
      return new ProviderError(`Invalid API key: ${message}`, this.id, "unauthorized", 401, cause);
    }
    if (lower.includes("quota") || lower.includes("rate limit")) {
      return new ProviderError(`Quota exceeded: ${message}`, this.id, "rate_limited", 429, cause);
    }
    if (lower.includes("blocked") || lower.includes("safety")) {
      return new ProviderError(
        `Content blocked by safety filters: ${message}`,
        this.id,
        "generic",
        400,
        cause,
      );
    }
    if (lower.includes("location") || lower.includes("region")) {
      return new ProviderError(
        `Unsupported user location: ${message}`,
        this.id,
        "forbidden",
        403,
        cause,
      );
    }

    const status = statusOf(error);
    if (status !== undefined) {
      return new ProviderError(
        `${this.displayName} API error (${status}): ${message}`,
        this.id,
        ProviderError.kindForStatus(status),
        status,
        cause,
      );
    }
    return new ProviderError(`${this.displayName} API error: ${message}`, this.id, "generic", undefined, cause);
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}
