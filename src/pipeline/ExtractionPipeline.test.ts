import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ResponseCache } from "../cache/ResponseCache";
import { loadConfig } from "../config";
import { AiProvider } from "../providers/models";
import type { ExtractionProvider } from "../providers/types";
import { ScraperService } from "../scraper/ScraperService";
import { BrowserSession } from "../scraper/browser/BrowserSession";
import { ScrapeMethod } from "../scraper/types";
import {
  BatchError,
  ProviderError,
  RenderedScrapeError,
  SchemaValidationError,
  ScrapeError,
  ValidationError,
} from "../utils/errors";
import { ExtractionPipeline, type ExtractionPipelineOptions } from "./ExtractionPipeline";

vi.mock("../utils/logger");
vi.mock("playwright", () => ({ chromium: { launch: vi.fn() } }));

const HOME_URL = "https://example.com";
const PAGE = "<html><body><h1>Widget</h1><p>Price: 9.99</p></body></html>";
const SCHEMA = { title: "string", price: "number" };
const WIDGET = { title: "Widget", price: 9.99 };

function page(source: string, content = PAGE) {
  return { content, mimeType: "text/html", source, finalUrl: source, statusCode: 200 };
}

describe("ExtractionPipeline", () => {
  const staticFetcher = { canFetch: vi.fn(), fetch: vi.fn() };
  const renderedFetcher = { canFetch: vi.fn(), fetch: vi.fn() };
  const extract = vi.fn<ExtractionProvider["extract"]>();
  const provider: ExtractionProvider = {
    id: AiProvider.OpenAI,
    displayName: "OpenAI GPT",
    model: "gpt-4o-mini",
    maxContentLength: 50_000,
    extract,
    validateApiKey: () => true,
  };

  beforeEach(() => {
    staticFetcher.fetch.mockReset();
    renderedFetcher.fetch.mockReset();
    extract.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const createPipeline = (options: Partial<ExtractionPipelineOptions> = {}) =>
    new ExtractionPipeline({
      scraper: new ScraperService({ staticFetcher, renderedFetcher }),
      provider,
      retryBaseDelayMs: 0,
      ...options,
    });

  describe("extract", () => {
    it("should extract data from a statically fetched page", async () => {
      staticFetcher.fetch.mockResolvedValue(page(HOME_URL));
      extract.mockResolvedValue({ data: WIDGET, rawResponse: JSON.stringify(WIDGET) });

      const result = await createPipeline().extract({ url: HOME_URL, fieldSchema: SCHEMA });

      expect(result).toMatchObject({
        success: true,
        data: { title: "Widget", price: 9.99 },
        url: HOME_URL,
        providerId: "openai",
        scrapeMethod: ScrapeMethod.Static,
        cached: false,
      });
      expect(Object.isFrozen(result)).toBe(true);
      expect(extract).toHaveBeenCalledWith(PAGE, SCHEMA, { instructions: undefined });
      expect(renderedFetcher.fetch).not.toHaveBeenCalled();
    });

    it("should report both failures when static and rendered scraping fail", async () => {
      const staticMessage = `Page returned empty content for ${HOME_URL}; it may require JavaScript rendering`;
      const renderedMessage = `Rendering failed for ${HOME_URL}: net::ERR_CONNECTION_REFUSED`;
      staticFetcher.fetch.mockRejectedValue(new ScrapeError(staticMessage, HOME_URL));
      renderedFetcher.fetch.mockRejectedValue(new RenderedScrapeError(renderedMessage, HOME_URL));

      const result = await createPipeline({ maxRetries: 0 }).extract({
        url: HOME_URL,
        fieldSchema: SCHEMA,
      });

      expect(result.success).toBe(false);
      expect(result.error).toBe(
        `Both static and rendered scraping failed for ${HOME_URL}. Static error: ${staticMessage}; rendered error: ${renderedMessage}`,
      );
      expect(extract).not.toHaveBeenCalled();
    });

    it("should reject a blank URL", async () => {
      await expect(createPipeline().extract({ url: "  ", fieldSchema: SCHEMA })).rejects.toThrow(
        ValidationError,
      );
      expect(staticFetcher.fetch).not.toHaveBeenCalled();
    });

    it("should reject an empty schema", async () => {
      await expect(createPipeline().extract({ url: HOME_URL, fieldSchema: {} })).rejects.toThrow(
        SchemaValidationError,
      );
    });

    it("should return a failure for an unsupported URL scheme without scraping", async () => {
      const result = await createPipeline().extract({
        url: "ftp://example.com/catalog",
        fieldSchema: SCHEMA,
      });

      expect(result).toMatchObject({
        success: false,
        error: 'Invalid URL "ftp://example.com/catalog": unsupported scheme "ftp". Supported schemes: http, https',
      });
      expect(staticFetcher.fetch).not.toHaveBeenCalled();
    });

    it("should return a failure for an unknown field type", async () => {
      const result = await createPipeline().extract({ url: HOME_URL, fieldSchema: { price: "money" } });

      expect(result.success).toBe(false);
      expect(result.error).toContain('Unsupported schema type "money" for field "price"');
      expect(staticFetcher.fetch).not.toHaveBeenCalled();
    });

    it("should pass the normalized schema and the instructions to the provider", async () => {
      staticFetcher.fetch.mockResolvedValue(page(HOME_URL));
      extract.mockResolvedValue({ data: { Title: "Widget" }, rawResponse: '{"Title":"Widget"}' });

      await createPipeline().extract({
        url: ` ${HOME_URL} `,
        fieldSchema: { " Title ": " STRING " },
        customInstructions: "Use the page heading",
      });

      expect(staticFetcher.fetch).toHaveBeenCalledWith(HOME_URL, undefined);
      expect(extract).toHaveBeenCalledWith(PAGE, { Title: "string" }, { instructions: "Use the page heading" });
    });

    it("should retry with fallback to rendering", async () => {
      staticFetcher.fetch.mockRejectedValue(
        new ScrapeError(`HTTP request failed with status 500 for ${HOME_URL}`, HOME_URL, 500),
      );
      renderedFetcher.fetch.mockResolvedValue(page(HOME_URL));
      extract.mockResolvedValue({ data: WIDGET, rawResponse: JSON.stringify(WIDGET) });

      const result = await createPipeline().extract({ url: HOME_URL, fieldSchema: SCHEMA });

      expect(result).toMatchObject({ success: true, scrapeMethod: ScrapeMethod.Rendered });
      expect(staticFetcher.fetch).toHaveBeenCalledTimes(2);
      expect(renderedFetcher.fetch).toHaveBeenCalledTimes(1);
    });

    it("should back off exponentially between scrape attempts", async () => {
      vi.useFakeTimers();
      staticFetcher.fetch.mockRejectedValue(new ScrapeError("HTTP request failed with status 503", HOME_URL, 503));
      renderedFetcher.fetch.mockRejectedValue(new RenderedScrapeError("browser crashed", HOME_URL));
      const pipeline = createPipeline({ maxRetries: 2, retryBaseDelayMs: 1000 });

      const pending = pipeline.extract({ url: HOME_URL, fieldSchema: SCHEMA });
      await vi.advanceTimersByTimeAsync(999);
      expect(staticFetcher.fetch).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(staticFetcher.fetch).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1999);
      expect(staticFetcher.fetch).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(staticFetcher.fetch).toHaveBeenCalledTimes(3);

      const result = await pending;
      expect(result).toMatchObject({
        success: false,
        error: `Both static and rendered scraping failed for ${HOME_URL}. Static error: HTTP request failed with status 503; rendered error: browser crashed`,
      });
    });

    it("should honour a per-request rendering preference", async () => {
      renderedFetcher.fetch.mockResolvedValue(page(HOME_URL));
      extract.mockResolvedValue({ data: WIDGET, rawResponse: JSON.stringify(WIDGET) });

      const result = await createPipeline().extract({
        url: HOME_URL,
        fieldSchema: SCHEMA,
        preferRendered: true,
        render: { waitForSelector: "h1" },
      });

      expect(result.scrapeMethod).toBe(ScrapeMethod.Rendered);
      expect(renderedFetcher.fetch).toHaveBeenCalledWith(HOME_URL, { waitForSelector: "h1" });
      expect(staticFetcher.fetch).not.toHaveBeenCalled();
    });

    it("should return a failure carrying the provider error", async () => {
      staticFetcher.fetch.mockResolvedValue(page(HOME_URL));
      extract.mockRejectedValue(
        new ProviderError("Rate limit exceeded: Too many requests", "openai", "rate_limited", 429),
      );
      const cache = new ResponseCache();

      const result = await createPipeline({ cache }).extract({ url: HOME_URL, fieldSchema: SCHEMA });

      expect(result).toMatchObject({
        success: false,
        error: "Rate limit exceeded: Too many requests",
        scrapeMethod: ScrapeMethod.Static,
      });
      expect(cache.size).toBe(0);
    });
  });

  describe("caching", () => {
    it("should answer a repeated extraction from the cache", async () => {
      staticFetcher.fetch.mockResolvedValue(page(HOME_URL));
      extract.mockResolvedValue({ data: WIDGET, rawResponse: JSON.stringify(WIDGET) });
      const pipeline = createPipeline({ cache: new ResponseCache() });

      const first = await pipeline.extract({ url: HOME_URL, fieldSchema: SCHEMA });
      const second = await pipeline.extract({ url: HOME_URL, fieldSchema: SCHEMA });

      expect(first.cached).toBe(false);
      expect(second).toMatchObject({ success: true, cached: true, data: WIDGET });
      expect(extract).toHaveBeenCalledTimes(1);
    });

    it("should keep cached data apart from the results handed out", async () => {
      staticFetcher.fetch.mockResolvedValue(page(HOME_URL));
      extract.mockResolvedValue({ data: { ...WIDGET }, rawResponse: JSON.stringify(WIDGET) });
      const pipeline = createPipeline({ cache: new ResponseCache() });

      const first = await pipeline.extract({ url: HOME_URL, fieldSchema: SCHEMA });
      if (!first.success) {
        throw new Error(first.error);
      }
      first.data.title = "Tampered";
      const second = await pipeline.extract({ url: HOME_URL, fieldSchema: SCHEMA });

      expect(second).toMatchObject({ success: true, cached: true, data: WIDGET });
    });

    it("should miss the cache when the page content changes", async () => {
      staticFetcher.fetch
        .mockResolvedValueOnce(page(HOME_URL))
        .mockResolvedValueOnce(page(HOME_URL, "<h1>Widget v2</h1>"));
      extract.mockResolvedValue({ data: WIDGET, rawResponse: JSON.stringify(WIDGET) });
      const pipeline = createPipeline({ cache: new ResponseCache() });

      await pipeline.extract({ url: HOME_URL, fieldSchema: SCHEMA });
      const second = await pipeline.extract({ url: HOME_URL, fieldSchema: SCHEMA });

      expect(second.cached).toBe(false);
      expect(extract).toHaveBeenCalledTimes(2);
    });

    it("should miss the cache when the instructions change", async () => {
      staticFetcher.fetch.mockResolvedValue(page(HOME_URL));
      extract.mockResolvedValue({ data: WIDGET, rawResponse: JSON.stringify(WIDGET) });
      const pipeline = createPipeline({ cache: new ResponseCache() });

      await pipeline.extract({ url: HOME_URL, fieldSchema: SCHEMA });
      await pipeline.extract({ url: HOME_URL, fieldSchema: SCHEMA, customInstructions: "Prices in EUR" });

      expect(extract).toHaveBeenCalledTimes(2);
    });
  });

  describe("extractMany", () => {
    const URLS = ["https://example.com/a", "ftp://example.com/b", "https://example.com/c"];

    beforeEach(() => {
      staticFetcher.fetch.mockImplementation(async (source: string) => page(source, `<h1>${source}</h1>`));
      extract.mockImplementation(async (content: string) => ({
        data: { title: content },
        rawResponse: JSON.stringify({ title: content }),
      }));
    });

    it("should return one result per URL in input order", async () => {
      const results = await createPipeline().extractMany(URLS, { title: "string" }, { concurrency: 2 });

      expect(results.map((result) => [result.url, result.success])).toEqual([
        ["https://example.com/a", true],
        ["ftp://example.com/b", false],
        ["https://example.com/c", true],
      ]);
      expect(results[2].data).toEqual({ title: "<h1>https://example.com/c</h1>" });
    });

    it("should keep going when an extraction throws", async () => {
      const results = await createPipeline().extractMany(
        ["https://example.com/a", "   "],
        { title: "string" },
        { concurrency: 1 },
      );

      expect(results[0].success).toBe(true);
      expect(results[1]).toMatchObject({ success: false, error: "URL cannot be empty", url: "   " });
    });

    it("should stop at the first failure in fail-fast mode", async () => {
      const error = await createPipeline()
        .extractMany(URLS, { title: "string" }, { concurrency: 1, continueOnError: false })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BatchError);
      expect(error).toMatchObject({ failedIndex: 1, successCount: 1, totalCount: 3 });
      expect(staticFetcher.fetch).toHaveBeenCalledTimes(1);
    });

    it("should report progress", async () => {
      const onProgress = vi.fn();

      await createPipeline().extractMany(URLS, { title: "string" }, { concurrency: 1, onProgress });

      expect(onProgress).toHaveBeenLastCalledWith({ completed: 3, total: 3 });
    });

    it("should reject an empty URL list", async () => {
      await expect(createPipeline().extractMany([], SCHEMA)).rejects.toThrow("URL list cannot be empty");
    });

    it("should reject a concurrency below one", async () => {
      await expect(createPipeline().extractMany(URLS, SCHEMA, { concurrency: 0 })).rejects.toThrow(
        ValidationError,
      );
    });
  });

  describe("lifecycle", () => {
    it("should close the browser session", async () => {
      const browserSession = new BrowserSession();
      const close = vi.spyOn(browserSession, "close").mockResolvedValue();

      await createPipeline({ browserSession }).close();

      expect(close).toHaveBeenCalledTimes(1);
    });

    it("should build a pipeline from configuration", async () => {
      const config = loadConfig({ WEBEXTRACT_CACHE_ENABLED: "false" });

      const pipeline = await ExtractionPipeline.fromConfig(config, { provider });

      expect(pipeline.providerId).toBe("openai");
      await pipeline.close();
    });
  });
});
