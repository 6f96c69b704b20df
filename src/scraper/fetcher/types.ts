/**
 * Page content retrieved by a fetcher, before any AI processing.
 */
export interface RawContent {
  /** Decoded page markup */
  content: string;
  /** MIME type reported for the content */
  mimeType: string;
  /** URL the caller asked for */
  source: string;
  /** URL the content was actually served from, after redirects */
  finalUrl: string;
  /** HTTP status of the final response, when known */
  statusCode?: number;
}

/**
 * Per-call options for the static HTTP fetcher
 */
export interface FetchOptions {
  /** Additional headers for HTTP requests */
  headers?: Record<string, string>;
  /** Deadline for the whole request, redirects included */
  timeoutMs?: number;
  /** Whether to follow HTTP redirects (3xx responses) */
  followRedirects?: boolean;
  /** Maximum number of redirect hops before giving up */
  maxRedirects?: number;
}

/**
 * Per-call options for the headless-browser fetcher
 */
export interface RenderOptions {
  /** Deadline for navigation and each wait step */
  timeoutMs?: number;
  /** CSS selector that must appear before the content is read */
  waitForSelector?: string;
  /** JavaScript expression polled until it is truthy */
  waitForFunction?: string;
  /** Extra delay after loading, for late client-side updates */
  settleMs?: number;
  /** Scroll to the bottom once to trigger lazy loading */
  scrollToBottom?: boolean;
  /** Elements removed from the DOM before serialising it */
  removeSelectors?: string[];
}

/**
 * Interface for fetching page content from a URL
 */
export interface ContentFetcher<TOptions> {
  /**
   * Check if this fetcher can handle the given source
   */
  canFetch(source: string): boolean;

  /**
   * Fetch content from the source
   */
  fetch(source: string, options?: TOptions): Promise<RawContent>;
}
