import { z } from "zod";
import { AiProvider, DEFAULT_MODELS } from "./providers/models";
import { ValidationError } from "./utils/errors";
import { LogLevel, parseLogLevel } from "./utils/logger";

/**
 * Default configuration values for the extraction pipeline
 */

/** Deadline for a single page fetch or render, in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Additional scrape attempts after the first one fails */
export const DEFAULT_MAX_RETRIES = 2;

/** Delay before the first scrape retry; doubles on every further retry */
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;

/** Maximum number of URLs processed at the same time by a batch */
export const DEFAULT_CONCURRENCY = 3;

/** Maximum redirect hops followed by the static fetcher */
export const DEFAULT_MAX_REDIRECTS = 5;

export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

export const DEFAULT_CACHE_MAX_ENTRIES = 1000;

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (compatible; webextract/1.0; +https://www.npmjs.com/package/webextract)";

export interface WebExtractConfig {
  provider: AiProvider;
  model: string;
  openaiApiKey?: string;
  openaiBaseUrl: string;
  geminiApiKey?: string;
  timeoutMs: number;
  preferRendered: boolean;
  maxRetries: number;
  concurrency: number;
  continueOnError: boolean;
  cacheEnabled: boolean;
  cacheTtlMs: number;
  cacheMaxEntries: number;
  cacheFile?: string;
  /** Extra command-line arguments for the Chromium launch */
  launchArgs: string[];
  logLevel?: LogLevel;
}

const configSchema = z.object({
  provider: z.nativeEnum(AiProvider),
  model: z.string().trim().min(1).optional(),
  openaiApiKey: z.string().optional(),
  openaiBaseUrl: z.string().url(),
  geminiApiKey: z.string().optional(),
  timeoutMs: z.number().int().positive(),
  preferRendered: z.boolean(),
  maxRetries: z.number().int().nonnegative(),
  concurrency: z.number().int().positive(),
  continueOnError: z.boolean(),
  cacheEnabled: z.boolean(),
  cacheTtlMs: z.number().int().positive(),
  cacheMaxEntries: z.number().int().positive(),
  cacheFile: z.string().min(1).optional(),
  launchArgs: z.array(z.string()),
  logLevel: z.nativeEnum(LogLevel).optional(),
});

const integerFromEnv = z
  .string()
  .regex(/^-?\d+$/, "must be an integer")
  .transform(Number);

const booleanFromEnv = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const logLevelFromEnv = z.string().transform((value, ctx) => {
  const level = parseLogLevel(value);
  if (level === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be one of ERROR, WARN, INFO, DEBUG",
    });
    return z.NEVER;
  }
  return level;
});

const envSchema = z.object({
  WEBEXTRACT_PROVIDER: z.string().optional(),
  WEBEXTRACT_MODEL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_API_BASE: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  WEBEXTRACT_TIMEOUT_MS: integerFromEnv.optional(),
  WEBEXTRACT_PREFER_RENDERED: booleanFromEnv.optional(),
  WEBEXTRACT_MAX_RETRIES: integerFromEnv.optional(),
  WEBEXTRACT_CONCURRENCY: integerFromEnv.optional(),
  WEBEXTRACT_CONTINUE_ON_ERROR: booleanFromEnv.optional(),
  WEBEXTRACT_CACHE_ENABLED: booleanFromEnv.optional(),
  WEBEXTRACT_CACHE_TTL_MS: integerFromEnv.optional(),
  WEBEXTRACT_CACHE_MAX_ENTRIES: integerFromEnv.optional(),
  WEBEXTRACT_CACHE_FILE: z.string().optional(),
  PLAYWRIGHT_LAUNCH_ARGS: z.string().optional(),
  LOG_LEVEL: logLevelFromEnv.optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Drops blank values so that `FOO=` in a .env file behaves like an unset variable.
 */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim();
    if (trimmed) {
      values[key] = trimmed;
    }
  }
  return values;
}

function definedValues<T extends object>(overrides: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(overrides)) {
    const value: unknown = Reflect.get(overrides, key);
    if (value !== undefined) {
      Reflect.set(result, key, value);
    }
  }
  return result;
}

/**
 * Builds the effective configuration from defaults, environment variables and
 * explicit overrides, in increasing order of precedence.
 * @throws {ValidationError} Listing every offending key when a value is invalid
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<WebExtractConfig> = {},
): WebExtractConfig {
  const parsedEnv = envSchema.safeParse(presentValues(env));
  if (!parsedEnv.success) {
    throw new ValidationError(
      `Invalid environment configuration: ${formatIssues(parsedEnv.error)}`,
    );
  }
  const vars = parsedEnv.data;

  const fromEnv = definedValues({
    provider: vars.WEBEXTRACT_PROVIDER?.toLowerCase(),
    model: vars.WEBEXTRACT_MODEL,
    openaiApiKey: vars.OPENAI_API_KEY,
    openaiBaseUrl: vars.OPENAI_API_BASE,
    geminiApiKey: vars.GEMINI_API_KEY,
    timeoutMs: vars.WEBEXTRACT_TIMEOUT_MS,
    preferRendered: vars.WEBEXTRACT_PREFER_RENDERED,
    maxRetries: vars.WEBEXTRACT_MAX_RETRIES,
    concurrency: vars.WEBEXTRACT_CONCURRENCY,
    continueOnError: vars.WEBEXTRACT_CONTINUE_ON_ERROR,
    cacheEnabled: vars.WEBEXTRACT_CACHE_ENABLED,
    cacheTtlMs: vars.WEBEXTRACT_CACHE_TTL_MS,
    cacheMaxEntries: vars.WEBEXTRACT_CACHE_MAX_ENTRIES,
    cacheFile: vars.WEBEXTRACT_CACHE_FILE,
    launchArgs: vars.PLAYWRIGHT_LAUNCH_ARGS?.split(/\s+/),
    logLevel: vars.LOG_LEVEL,
  });

  const parsed = configSchema.safeParse({
    provider: AiProvider.OpenAI,
    openaiBaseUrl: DEFAULT_OPENAI_BASE_URL,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    preferRendered: false,
    maxRetries: DEFAULT_MAX_RETRIES,
    concurrency: DEFAULT_CONCURRENCY,
    continueOnError: true,
    cacheEnabled: true,
    cacheTtlMs: DEFAULT_CACHE_TTL_MS,
    cacheMaxEntries: DEFAULT_CACHE_MAX_ENTRIES,
    launchArgs: [],
    ...fromEnv,
    ...definedValues(overrides),
  });
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  return {
    ...parsed.data,
    model: parsed.data.model ?? DEFAULT_MODELS[parsed.data.provider],
  };
}

/**
 * API key for the configured provider, if one is set.
 */
export function resolveApiKey(config: WebExtractConfig): string | undefined {
  return config.provider === AiProvider.Gemini ? config.geminiApiKey : config.openaiApiKey;
}
