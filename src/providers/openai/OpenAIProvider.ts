import axios, { type AxiosResponse } from "axios";
import { z } from "zod";
import { DEFAULT_OPENAI_BASE_URL } from "../../config";
import { ParsingError, ProviderError, toError } from "../../utils/errors";
import { BaseExtractionProvider, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from "../BaseExtractionProvider";
import { AiProvider, DEFAULT_MODELS } from "../models";
import { type ChatMessage, buildChatMessages } from "../prompt";
import type { CompletionRequest, ProviderOptions } from "../types";

export interface OpenAIProviderOptions extends ProviderOptions {
  /** Any OpenAI-compatible endpoint. Defaults to the OpenAI API. */
  baseUrl?: string;
  /** Extra request headers sent with every completion request */
  headers?: Record<string, string>;
}

interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  response_format: { type: "json_object" };
  temperature: number;
  max_tokens: number;
  top_p?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const errorBodySchema = z.object({ error: z.object({ message: z.string() }) });

/**
 * Extraction through an OpenAI-compatible chat-completions endpoint in JSON mode.
 */
export class OpenAIProvider extends BaseExtractionProvider {
  readonly id = AiProvider.OpenAI;
  readonly maxContentLength = 50_000;

  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(options: OpenAIProviderOptions) {
    super(options, DEFAULT_MODELS[AiProvider.OpenAI]);
    this.baseUrl = (options.baseUrl ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, "");
    this.headers = options.headers ?? {};
  }

  validateApiKey(): boolean {
    return this.apiKey.startsWith("sk-") && this.apiKey.length >= 20;
  }

  protected async complete(request: CompletionRequest): Promise<string> {
    const body: ChatCompletionBody = {
      model: this.model,
      messages: buildChatMessages({ ...request, maxLength: this.maxContentLength }),
      response_format: { type: "json_object" },
      temperature: this.generation.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: this.generation.maxTokens ?? DEFAULT_MAX_TOKENS,
    };
    if (this.generation.topP !== undefined) {
      body.top_p = this.generation.topP;
    }
    if (this.generation.frequencyPenalty !== undefined) {
      body.frequency_penalty = this.generation.frequencyPenalty;
    }
    if (this.generation.presencePenalty !== undefined) {
      body.presence_penalty = this.generation.presencePenalty;
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await axios.post<unknown>(`${this.baseUrl}/chat/completions`, body, {
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          ...this.headers,
        },
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
    } catch (error) {
      const cause = toError(error);
      throw new ProviderError(
        `${this.displayName} request failed: ${cause.message}`,
        this.id,
        "generic",
        undefined,
        cause,
      );
    }

    if (response.status !== 200) {
      const detail = errorBodySchema.safeParse(response.data);
      throw ProviderError.fromStatus(
        this.id,
        this.displayName,
        response.status,
        detail.success ? detail.data.error.message : undefined,
      );
    }

    const completion = chatCompletionSchema.safeParse(response.data);
    if (!completion.success) {
      throw new ParsingError(
        "unexpected chat completion response shape",
        JSON.stringify(response.data) ?? "",
      );
    }
    const content = completion.data.choices[0].message.content;
    if (!content?.trim()) {
      throw new ParsingError("empty response content", content ?? "");
    }
    this.logger.debug(`${this.displayName} answered with ${content.length} characters`);
    return content;
  }
}
