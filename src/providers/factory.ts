import { type WebExtractConfig, resolveApiKey } from "../config";
import { ProviderError, UnsupportedProviderError, ValidationError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { type GeminiModelsClient, GeminiProvider } from "./gemini/GeminiProvider";
import { AiProvider, isAiProvider } from "./models";
import { OpenAIProvider } from "./openai/OpenAIProvider";
import type { ExtractionProvider, ProviderOptions } from "./types";

export interface CreateProviderOptions extends Omit<ProviderOptions, "apiKey"> {
  provider: AiProvider | string;
  apiKey: string | undefined;
  /** OpenAI only: base URL of an OpenAI-compatible API */
  baseUrl?: string;
  /** OpenAI only: extra request headers */
  headers?: Record<string, string>;
  /** Gemini only: replaces the SDK client */
  geminiClient?: GeminiModelsClient;
  /** Reject keys that fail the provider's format check */
  validateApiKey?: boolean;
}

/**
 * Instantiates the adapter for a provider.
 * @throws {ValidationError} When no API key is given
 * @throws {UnsupportedProviderError} For an unknown provider id
 * @throws {ProviderError} When `validateApiKey` is set and the key format is wrong
 */
export function createExtractionProvider(options: CreateProviderOptions): ExtractionProvider {
  const { provider, apiKey, baseUrl, headers, geminiClient, validateApiKey, ...common } = options;

  if (!isAiProvider(provider)) {
    throw new UnsupportedProviderError(provider);
  }
  if (!apiKey?.trim()) {
    throw new ValidationError(`API key for provider "${provider}" is required`);
  }

  const instance =
    provider === AiProvider.Gemini
      ? new GeminiProvider({ ...common, apiKey, client: geminiClient })
      : new OpenAIProvider({ ...common, apiKey, baseUrl, headers });

  if (validateApiKey && !instance.validateApiKey()) {
    throw new ProviderError(
      `Invalid API key format for ${instance.displayName}`,
      provider,
      "unauthorized",
    );
  }
  return instance;
}

/**
 * Adapter for the provider, model and key selected by a loaded configuration.
 */
export function createProviderFromConfig(
  config: WebExtractConfig,
  logger?: Logger,
): ExtractionProvider {
  return createExtractionProvider({
    provider: config.provider,
    apiKey: resolveApiKey(config),
    model: config.model,
    timeoutMs: config.timeoutMs,
    baseUrl: config.openaiBaseUrl,
    logger,
  });
}
