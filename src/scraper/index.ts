export { BrowserSession } from "./browser/BrowserSession";
export { HttpFetcher } from "./fetcher/HttpFetcher";
export { PlaywrightFetcher } from "./fetcher/PlaywrightFetcher";
export { ScraperService, shouldFallbackToRendered } from "./ScraperService";
export { ScrapeMethod } from "./types";
export type { ContentFetcher, FetchOptions, RawContent, RenderOptions } from "./fetcher/types";
export type { FallbackPredicate, ScrapeOutcome, ScrapeRequestOptions } from "./types";
