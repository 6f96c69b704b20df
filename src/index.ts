export { ResponseCache } from "./cache/ResponseCache";
export type { CacheEntry, CacheKeyInput, CacheStats, ResponseCacheOptions } from "./cache/types";
export * from "./config";
export { BatchProcessor } from "./pipeline/BatchProcessor";
export { ExtractionPipeline } from "./pipeline/ExtractionPipeline";
export type { ExtractionPipelineOptions, PipelineFromConfigOptions } from "./pipeline/ExtractionPipeline";
export { createFailureResult, createSuccessResult, withResultData } from "./pipeline/ExtractionResult";
export type {
  BatchExtractionOptions,
  BatchOptions,
  BatchProgress,
  ExtractionFailure,
  ExtractionRequest,
  ExtractionResult,
  ExtractionSuccess,
} from "./pipeline/types";
export * from "./providers";
export * from "./schema";
export * from "./scraper";
export * from "./utils/errors";
export type { JsonObject, JsonValue } from "./utils/json";
export { LogLevel, type Logger, getLogLevel, logger, parseLogLevel, setLogLevel } from "./utils/logger";
export { Semaphore } from "./utils/Semaphore";
export { DEFAULT_RETRY_POLICY, type RetryHooks, type RetryPolicy, withRetry } from "./utils/retry";
export { withTimeout } from "./utils/timeout";
export { validateUrl } from "./utils/url";
