import { ResponseCache } from "../cache/ResponseCache";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY_MS,
  type WebExtractConfig,
} from "../config";
import { createProviderFromConfig } from "../providers/factory";
import type { ExtractionProvider } from "../providers/types";
import { type FieldSchema, validateAndNormalizeFieldSchema } from "../schema";
import { ScraperService } from "../scraper/ScraperService";
import { BrowserSession } from "../scraper/browser/BrowserSession";
import { HttpFetcher } from "../scraper/fetcher/HttpFetcher";
import { PlaywrightFetcher } from "../scraper/fetcher/PlaywrightFetcher";
import type { ScrapeOutcome } from "../scraper/types";
import { SchemaValidationError, ValidationError, toError } from "../utils/errors";
import { type Logger, logger as defaultLogger } from "../utils/logger";
import { withRetry } from "../utils/retry";
import { validateUrl } from "../utils/url";
import { BatchProcessor } from "./BatchProcessor";
import { createFailureResult, createSuccessResult } from "./ExtractionResult";
import type { BatchExtractionOptions, ExtractionRequest, ExtractionResult } from "./types";

export interface ExtractionPipelineOptions {
  scraper: Pick<ScraperService, "scrape">;
  provider: ExtractionProvider;
  /** Without a cache every page goes to the provider */
  cache?: ResponseCache;
  /** Closed by {@link ExtractionPipeline.close} */
  browserSession?: BrowserSession;
  preferRendered?: boolean;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  concurrency?: number;
  continueOnError?: boolean;
  logger?: Logger;
}

export interface PipelineFromConfigOptions {
  /** Replaces the provider the configuration selects */
  provider?: ExtractionProvider;
  logger?: Logger;
}

/**
 * Scrapes a page, asks the AI provider for the requested fields and caches
 * the answer. {@link extract} reports failures through the result; it only
 * rejects for an empty URL or an empty schema.
 */
export class ExtractionPipeline {
  private readonly scraper: Pick<ScraperService, "scrape">;
  private readonly provider: ExtractionProvider;
  private readonly cache?: ResponseCache;
  private readonly browserSession?: BrowserSession;
  private readonly preferRendered: boolean;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly concurrency: number;
  private readonly continueOnError: boolean;
  private readonly logger: Logger;
  private readonly batchProcessor: BatchProcessor;

  constructor(options: ExtractionPipelineOptions) {
    this.scraper = options.scraper;
    this.provider = options.provider;
    this.cache = options.cache;
    this.browserSession = options.browserSession;
    this.preferRendered = options.preferRendered ?? false;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.continueOnError = options.continueOnError ?? true;
    this.logger = options.logger ?? defaultLogger;
    this.batchProcessor = new BatchProcessor(this.logger);
  }

  /**
   * Wires fetchers, browser session, provider and cache from a loaded
   * configuration. The cache file, if any, is loaded before this resolves.
   */
  static async fromConfig(
    config: WebExtractConfig,
    options: PipelineFromConfigOptions = {},
  ): Promise<ExtractionPipeline> {
    const logger = options.logger ?? defaultLogger;
    const browserSession = new BrowserSession({ launchArgs: config.launchArgs, logger });
    const scraper = new ScraperService({
      staticFetcher: new HttpFetcher({ timeoutMs: config.timeoutMs, logger }),
      renderedFetcher: new PlaywrightFetcher({
        session: browserSession,
        timeoutMs: config.timeoutMs,
        logger,
      }),
      logger,
    });
    const provider = options.provider ?? createProviderFromConfig(config, logger);

    let cache: ResponseCache | undefined;
    if (config.cacheEnabled) {
      cache = new ResponseCache({
        filePath: config.cacheFile,
        ttlMs: config.cacheTtlMs,
        maxEntries: config.cacheMaxEntries,
        logger,
      });
      await cache.initialize();
    }

    return new ExtractionPipeline({
      scraper,
      provider,
      cache,
      browserSession,
      preferRendered: config.preferRendered,
      maxRetries: config.maxRetries,
      concurrency: config.concurrency,
      continueOnError: config.continueOnError,
      logger,
    });
  }

  get providerId(): string {
    return this.provider.id;
  }

  /**
   * Runs one extraction.
   * @throws {ValidationError} When the URL is blank or the schema has no fields
   */
  async extract(request: ExtractionRequest): Promise<ExtractionResult> {
    const startedAt = Date.now();
    const url = request.url.trim();
    if (!url) {
      throw new ValidationError("URL cannot be empty");
    }
    if (Object.keys(request.fieldSchema).length === 0) {
      throw new SchemaValidationError("Schema cannot be empty");
    }

    const context = (extra: Pick<ExtractionResult, "cached" | "scrapeMethod"> = {}) => ({
      url,
      providerId: this.provider.id,
      elapsedMs: Date.now() - startedAt,
      ...extra,
    });

    let schema: FieldSchema;
    try {
      validateUrl(url);
      schema = validateAndNormalizeFieldSchema(request.fieldSchema);
    } catch (error) {
      const message = toError(error).message;
      this.logger.warn(`⚠️ Rejected extraction request for ${url}: ${message}`);
      return createFailureResult(message, context());
    }

    this.logger.info(`🔍 Extracting ${Object.keys(schema).length} fields from ${url}`);

    let page: ScrapeOutcome;
    try {
      page = await this.scrapeWithRetry(url, request);
    } catch (error) {
      const message = toError(error).message;
      this.logger.error(`❌ Failed to scrape ${url}: ${message}`);
      return createFailureResult(message, context());
    }

    const cacheKey = ResponseCache.createKey({
      pageContent: page.content,
      fieldSchema: schema,
      providerId: this.provider.id,
      options: { model: this.provider.model, customInstructions: request.customInstructions },
    });
    const cached = this.cache?.get(cacheKey);
    if (cached) {
      this.logger.info(`💾 Using cached extraction for ${url}`);
      return createSuccessResult(cached.data, context({ cached: true, scrapeMethod: page.method }));
    }

    try {
      const { data, rawResponse } = await this.provider.extract(page.content, schema, {
        instructions: request.customInstructions,
      });
      await this.cache?.store(cacheKey, data, rawResponse);
      const result = createSuccessResult(data, context({ cached: false, scrapeMethod: page.method }));
      this.logger.info(`✅ Extracted data from ${url} in ${result.elapsedMs}ms`);
      return result;
    } catch (error) {
      const message = toError(error).message;
      this.logger.error(`❌ ${this.provider.displayName} extraction failed for ${url}: ${message}`);
      return createFailureResult(message, context({ scrapeMethod: page.method }));
    }
  }

  /**
   * Extracts the same fields from many URLs. Results keep the order of `urls`.
   * @throws {ValidationError} For an empty URL list or a concurrency below 1
   * @throws {BatchError} In fail-fast mode, for the first failed URL
   */
  async extractMany(
    urls: readonly string[],
    fieldSchema: FieldSchema,
    options: BatchExtractionOptions = {},
  ): Promise<ExtractionResult[]> {
    const { concurrency = this.concurrency, continueOnError = this.continueOnError, onProgress, ...request } =
      options;
    if (urls.length === 0) {
      throw new ValidationError("URL list cannot be empty");
    }
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError(`Concurrency must be an integer >= 1, got ${concurrency}`);
    }

    this.logger.info(`📦 Extracting from ${urls.length} URLs with concurrency ${concurrency}`);
    return this.batchProcessor.process(urls, (url) => this.extract({ ...request, url, fieldSchema }), {
      concurrency,
      continueOnError,
      onProgress,
      onFailure: (error, url) =>
        createFailureResult(error.message, { url, providerId: this.provider.id, elapsedMs: 0 }),
      toFailure: (result) => (result.success ? undefined : new Error(result.error)),
    });
  }

  /**
   * Shuts down the shared browser, if one was started.
   */
  async close(): Promise<void> {
    await this.browserSession?.close();
  }

  private async scrapeWithRetry(url: string, request: ExtractionRequest): Promise<ScrapeOutcome> {
    const preferRendered = request.preferRendered ?? this.preferRendered;
    const maxRetries = request.maxRetries ?? this.maxRetries;

    return withRetry(
      (attempt) =>
        this.scraper.scrape(url, { preferRendered, isRetry: attempt > 0, render: request.render }),
      { maxAttempts: maxRetries + 1, baseDelayMs: this.retryBaseDelayMs, multiplier: 2 },
      {
        shouldRetry: (error) => !(error instanceof ValidationError),
        onRetry: (error, attempt, delayMs) =>
          this.logger.warn(
            `⚠️ Scrape attempt ${attempt + 1} of ${maxRetries + 1} for ${url} failed, retrying in ${delayMs}ms: ${error.message}`,
          ),
      },
    );
  }
}
