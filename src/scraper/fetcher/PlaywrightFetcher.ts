import type { Page } from "playwright";
import { DEFAULT_TIMEOUT_MS } from "../../config";
import { RenderedScrapeError, TimeoutError, toError } from "../../utils/errors";
import { type Logger, logger as defaultLogger } from "../../utils/logger";
import { delay, withTimeout } from "../../utils/timeout";
import type { BrowserSession } from "../browser/BrowserSession";
import type { ContentFetcher, RawContent, RenderOptions } from "./types";

const DEFAULT_VIEWPORT = { width: 1366, height: 768 };

const DEFAULT_BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const BLOCKED_RESOURCE_TYPES = new Set(["image", "media", "font"]);

export interface PlaywrightFetcherOptions {
  session: BrowserSession;
  timeoutMs?: number;
  viewport?: { width: number; height: number };
  userAgent?: string;
  /** Abort image, media and font requests. Defaults to true. */
  blockImages?: boolean;
  logger?: Logger;
}

/**
 * Renders pages in headless Chromium so that client-side scripts run before
 * the markup is read.
 */
export class PlaywrightFetcher implements ContentFetcher<RenderOptions> {
  private readonly session: BrowserSession;
  private readonly timeoutMs: number;
  private readonly viewport: { width: number; height: number };
  private readonly userAgent: string;
  private readonly blockImages: boolean;
  private readonly logger: Logger;

  constructor(options: PlaywrightFetcherOptions) {
    this.session = options.session;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.viewport = options.viewport ?? DEFAULT_VIEWPORT;
    this.userAgent = options.userAgent ?? DEFAULT_BROWSER_USER_AGENT;
    this.blockImages = options.blockImages ?? true;
    this.logger = options.logger ?? defaultLogger;
  }

  canFetch(source: string): boolean {
    return source.startsWith("http://") || source.startsWith("https://");
  }

  async fetch(source: string, options: RenderOptions = {}): Promise<RawContent> {
    this.logger.debug(`Playwright: Processing ${source}`);
    try {
      return await this.session.withPage(
        { viewport: this.viewport, userAgent: this.userAgent },
        (page) => this.render(page, source, options),
      );
    } catch (error) {
      if (error instanceof RenderedScrapeError || error instanceof TimeoutError) {
        throw error;
      }
      const cause = toError(error);
      throw new RenderedScrapeError(
        `Rendering failed for ${source}: ${cause.message}`,
        source,
        undefined,
        cause,
      );
    }
  }

  private async render(page: Page, source: string, options: RenderOptions): Promise<RawContent> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    page.setDefaultTimeout(timeoutMs);

    if (this.blockImages) {
      await page.route("**/*", (route) => {
        if (BLOCKED_RESOURCE_TYPES.has(route.request().resourceType())) {
          return route.abort();
        }
        return route.continue();
      });
    }

    const response = await withTimeout(
      page.goto(source, { waitUntil: "networkidle", timeout: timeoutMs }),
      timeoutMs,
      `Rendering ${source}`,
    );
    if (response && !response.ok()) {
      throw new RenderedScrapeError(
        `Page responded with status ${response.status()} for ${source}`,
        source,
        response.status(),
      );
    }

    if (options.waitForSelector) {
      await page.waitForSelector(options.waitForSelector);
    }
    if (options.waitForFunction) {
      await page.waitForFunction(options.waitForFunction);
    }
    if (options.scrollToBottom) {
      await page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
    }
    if (options.settleMs && options.settleMs > 0) {
      await delay(options.settleMs);
    }
    if (options.removeSelectors && options.removeSelectors.length > 0) {
      await page.evaluate((selectors) => {
        for (const selector of selectors) {
          document.querySelectorAll(selector).forEach((element) => element.remove());
        }
      }, options.removeSelectors);
    }

    const content = await page.content();
    this.logger.debug(`Playwright: Successfully rendered content for ${source}`);
    return {
      content,
      mimeType: "text/html",
      source,
      finalUrl: page.url(),
      statusCode: response?.status(),
    };
  }
}
