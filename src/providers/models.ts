/**
 * AI services that can run an extraction.
 */
export enum AiProvider {
  OpenAI = "openai",
  Gemini = "gemini",
}

export const PROVIDER_DISPLAY_NAMES: Record<AiProvider, string> = {
  [AiProvider.OpenAI]: "OpenAI GPT",
  [AiProvider.Gemini]: "Google Gemini",
};

/** Known model names and the provider serving each. */
export const AI_MODELS: Readonly<Record<string, AiProvider>> = {
  "gpt-4o": AiProvider.OpenAI,
  "gpt-4o-mini": AiProvider.OpenAI,
  "gpt-4-turbo": AiProvider.OpenAI,
  "gpt-4-turbo-preview": AiProvider.OpenAI,
  "gpt-4": AiProvider.OpenAI,
  "gpt-3.5-turbo": AiProvider.OpenAI,
  "gpt-3.5-turbo-instruct": AiProvider.OpenAI,
  "gemini-2.5-pro": AiProvider.Gemini,
  "gemini-2.5-flash": AiProvider.Gemini,
  "gemini-2.5-flash-lite": AiProvider.Gemini,
  "gemini-2.0-flash": AiProvider.Gemini,
  "gemini-2.0-flash-lite": AiProvider.Gemini,
};

export const DEFAULT_MODELS: Record<AiProvider, string> = {
  [AiProvider.OpenAI]: "gpt-4o-mini",
  [AiProvider.Gemini]: "gemini-2.0-flash",
};

export function isAiProvider(value: string): value is AiProvider {
  return Object.values<string>(AiProvider).includes(value);
}

/**
 * Looks up the provider for a catalogued model. Unknown names fall back to a
 * prefix match so that dated snapshots (`gpt-4o-2024-08-06`) still resolve.
 */
export function getProviderForModel(model: string): AiProvider | undefined {
  const name = model.trim().toLowerCase();
  const known = AI_MODELS[name];
  if (known) {
    return known;
  }
  if (name.startsWith("gpt-") || /^o\d/.test(name)) {
    return AiProvider.OpenAI;
  }
  if (name.startsWith("gemini-")) {
    return AiProvider.Gemini;
  }
  return undefined;
}

export function getModelsForProvider(provider: AiProvider): string[] {
  return Object.entries(AI_MODELS)
    .filter(([, owner]) => owner === provider)
    .map(([model]) => model);
}
