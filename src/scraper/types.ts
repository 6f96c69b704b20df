import type { FetchOptions, RenderOptions } from "./fetcher/types";

/**
 * How a page's content was obtained.
 */
export enum ScrapeMethod {
  /** Plain HTTP GET, no script execution */
  Static = "static",
  /** Headless Chromium, scripts executed */
  Rendered = "rendered",
}

/**
 * Options for a single scrape of one URL
 */
export interface ScrapeRequestOptions {
  /** Try the headless browser first and fall back to a static fetch */
  preferRendered?: boolean;
  /**
   * Set on retry attempts. A failing static fetch always falls back to the
   * browser when this is true.
   */
  isRetry?: boolean;
  fetch?: FetchOptions;
  render?: RenderOptions;
}

export interface ScrapeOutcome {
  content: string;
  method: ScrapeMethod;
  /** URL the content was served from */
  finalUrl: string;
}

/**
 * Decides whether a static-fetch failure suggests the page needs a browser.
 */
export type FallbackPredicate = (error: Error) => boolean;
