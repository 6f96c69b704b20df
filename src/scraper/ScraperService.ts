import { CombinedScrapeError, toError } from "../utils/errors";
import { type Logger, logger as defaultLogger } from "../utils/logger";
import type { ContentFetcher, FetchOptions, RawContent, RenderOptions } from "./fetcher/types";
import {
  type FallbackPredicate,
  ScrapeMethod,
  type ScrapeOutcome,
  type ScrapeRequestOptions,
} from "./types";

/** Error-text fragments that hint at content produced by client-side scripts. */
export const DYNAMIC_CONTENT_HINTS = [
  "javascript",
  "react",
  "vue",
  "angular",
  "spa",
  "dynamic",
  "empty",
  "no content",
] as const;

/**
 * Default fallback heuristic: the static failure mentions a script framework
 * or an empty page.
 */
export const shouldFallbackToRendered: FallbackPredicate = (error) => {
  const text = `${error.name}: ${error.message}`.toLowerCase();
  return DYNAMIC_CONTENT_HINTS.some((hint) => text.includes(hint));
};

export interface ScraperServiceOptions {
  staticFetcher: ContentFetcher<FetchOptions>;
  renderedFetcher: ContentFetcher<RenderOptions>;
  shouldFallbackToRendered?: FallbackPredicate;
  logger?: Logger;
}

/**
 * Retrieves page content with one of two strategies, falling back to the
 * other when the first one fails.
 */
export class ScraperService {
  private readonly staticFetcher: ContentFetcher<FetchOptions>;
  private readonly renderedFetcher: ContentFetcher<RenderOptions>;
  private readonly shouldFallback: FallbackPredicate;
  private readonly logger: Logger;

  constructor(options: ScraperServiceOptions) {
    this.staticFetcher = options.staticFetcher;
    this.renderedFetcher = options.renderedFetcher;
    this.shouldFallback = options.shouldFallbackToRendered ?? shouldFallbackToRendered;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Scrapes one URL.
   *
   * With `preferRendered` the browser runs first and a static fetch is the
   * fallback. Otherwise the static fetch runs first and the browser is only
   * tried on a retry attempt or when the failure looks like a dynamic page;
   * any other static failure is rethrown unchanged.
   *
   * @throws {CombinedScrapeError} When both strategies were tried and failed
   */
  async scrape(url: string, options: ScrapeRequestOptions = {}): Promise<ScrapeOutcome> {
    if (options.preferRendered) {
      return this.scrapeRenderedFirst(url, options);
    }
    return this.scrapeStaticFirst(url, options);
  }

  private async scrapeRenderedFirst(
    url: string,
    options: ScrapeRequestOptions,
  ): Promise<ScrapeOutcome> {
    let renderedError: Error;
    try {
      return await this.fetchRendered(url, options);
    } catch (error) {
      renderedError = toError(error);
      this.logger.warn(
        `⚠️ Rendered scrape of ${url} failed, falling back to static fetch: ${renderedError.message}`,
      );
    }

    try {
      return await this.fetchStatic(url, options);
    } catch (error) {
      const staticError = toError(error);
      throw new CombinedScrapeError(
        `Both rendered and static scraping failed for ${url}. Rendered error: ${renderedError.message}; static error: ${staticError.message}`,
        url,
        [renderedError, staticError],
      );
    }
  }

  private async scrapeStaticFirst(
    url: string,
    options: ScrapeRequestOptions,
  ): Promise<ScrapeOutcome> {
    let staticError: Error;
    try {
      return await this.fetchStatic(url, options);
    } catch (error) {
      staticError = toError(error);
      if (!options.isRetry && !this.shouldFallback(staticError)) {
        throw staticError;
      }
      this.logger.warn(
        `⚠️ Static fetch of ${url} failed, falling back to rendering: ${staticError.message}`,
      );
    }

    try {
      return await this.fetchRendered(url, options);
    } catch (error) {
      const renderedError = toError(error);
      throw new CombinedScrapeError(
        `Both static and rendered scraping failed for ${url}. Static error: ${staticError.message}; rendered error: ${renderedError.message}`,
        url,
        [staticError, renderedError],
      );
    }
  }

  private async fetchStatic(url: string, options: ScrapeRequestOptions): Promise<ScrapeOutcome> {
    return toOutcome(await this.staticFetcher.fetch(url, options.fetch), ScrapeMethod.Static);
  }

  private async fetchRendered(url: string, options: ScrapeRequestOptions): Promise<ScrapeOutcome> {
    return toOutcome(await this.renderedFetcher.fetch(url, options.render), ScrapeMethod.Rendered);
  }
}

function toOutcome(raw: RawContent, method: ScrapeMethod): ScrapeOutcome {
  return { content: raw.content, method, finalUrl: raw.finalUrl };
}
