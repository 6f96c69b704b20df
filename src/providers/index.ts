export { BaseExtractionProvider, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from "./BaseExtractionProvider";
export { createExtractionProvider, createProviderFromConfig } from "./factory";
export type { CreateProviderOptions } from "./factory";
export { GeminiProvider } from "./gemini/GeminiProvider";
export type { GeminiModelsClient, GeminiProviderOptions } from "./gemini/GeminiProvider";
export { toGeminiResponseSchema } from "./gemini/responseSchema";
export {
  AI_MODELS,
  AiProvider,
  DEFAULT_MODELS,
  PROVIDER_DISPLAY_NAMES,
  getModelsForProvider,
  getProviderForModel,
  isAiProvider,
} from "./models";
export { OpenAIProvider } from "./openai/OpenAIProvider";
export type { OpenAIProviderOptions } from "./openai/OpenAIProvider";
export {
  DEFAULT_SYSTEM_PROMPT,
  buildChatMessages,
  buildExtractionPrompt,
  buildSchemaGuidedPrompt,
  cleanHtml,
  estimateTokenCount,
  truncateContent,
} from "./prompt";
export type {
  ExtractOptions,
  ExtractionProvider,
  GenerationOptions,
  ProviderExtraction,
  ProviderOptions,
} from "./types";
