import { DEFAULT_TIMEOUT_MS } from "../config";
import {
  type FieldSchema,
  normalizeExtractedData,
  nullFields,
  validateAndNormalizeFieldSchema,
} from "../schema";
import { ValidationError } from "../utils/errors";
import { parseJsonObject } from "../utils/json";
import { type Logger, logger as defaultLogger } from "../utils/logger";
import { withTimeout } from "../utils/timeout";
import { PROVIDER_DISPLAY_NAMES, type AiProvider } from "./models";
import { cleanHtml, estimateTokenCount } from "./prompt";
import type {
  CompletionRequest,
  ExtractOptions,
  ExtractionProvider,
  GenerationOptions,
  ProviderExtraction,
  ProviderOptions,
} from "./types";

export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 1000;

/**
 * Shared extraction flow: validate, clean, prompt, parse, normalize.
 * Subclasses only implement the service call in {@link complete}.
 */
export abstract class BaseExtractionProvider implements ExtractionProvider {
  abstract readonly id: AiProvider;
  abstract readonly maxContentLength: number;

  readonly model: string;
  protected readonly apiKey: string;
  protected readonly timeoutMs: number;
  protected readonly generation: GenerationOptions;
  protected readonly logger: Logger;
  private readonly shouldCleanHtml: boolean;

  protected constructor(options: ProviderOptions, defaultModel: string) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? defaultModel;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.generation = options.generation ?? {};
    this.shouldCleanHtml = options.cleanHtml ?? true;
    this.logger = options.logger ?? defaultLogger;
  }

  get displayName(): string {
    return PROVIDER_DISPLAY_NAMES[this.id];
  }

  /**
   * @throws {ValidationError} For empty content or an invalid schema
   * @throws {ProviderError} When the service rejects the request
   * @throws {ParsingError} When the answer holds no JSON object
   * @throws {TimeoutError} When the service does not answer in time
   */
  async extract(
    content: string,
    schema: FieldSchema,
    options: ExtractOptions = {},
  ): Promise<ProviderExtraction> {
    if (!content.trim()) {
      throw new ValidationError("Page content cannot be empty");
    }
    const normalizedSchema = validateAndNormalizeFieldSchema(schema);
    const pageContent = this.shouldCleanHtml ? cleanHtml(content) : content;

    this.logger.debug(
      `🤖 ${this.displayName} (${this.model}): extracting ${Object.keys(normalizedSchema).length} fields from ~${estimateTokenCount(pageContent)} tokens`,
    );

    const rawResponse = await withTimeout(
      this.complete({
        content: pageContent,
        schema: normalizedSchema,
        instructions: options.instructions,
      }),
      this.timeoutMs,
      `${this.displayName} request`,
    );

    const data = normalizeExtractedData(parseJsonObject(rawResponse), normalizedSchema);
    const missing = nullFields(data);
    if (missing.length > 0) {
      this.logger.debug(`Fields without a value: ${missing.join(", ")}`);
    }
    return { data, rawResponse };
  }

  /**
   * Sends one completion request and returns the raw answer text.
   */
  protected abstract complete(request: CompletionRequest): Promise<string>;

  abstract validateApiKey(): boolean;
}
