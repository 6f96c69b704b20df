import axios, { type AxiosResponse } from "axios";
import * as cheerio from "cheerio";
import { DEFAULT_MAX_REDIRECTS, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from "../../config";
import { RedirectError, ScrapeError, toError } from "../../utils/errors";
import { type Logger, logger as defaultLogger } from "../../utils/logger";
import { withTimeout } from "../../utils/timeout";
import { resolveRedirectUrl } from "../../utils/url";
import type { ContentFetcher, FetchOptions, RawContent } from "./types";

const BODY_EXCERPT_LENGTH = 200;

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "Accept-Encoding": "gzip, deflate",
  "Upgrade-Insecure-Requests": "1",
};

export interface HttpFetcherOptions extends FetchOptions {
  userAgent?: string;
  /**
   * Raise a ScrapeError when the page body carries no visible text, which is
   * typical for script-only application shells. Defaults to true.
   */
  rejectEmptyContent?: boolean;
  logger?: Logger;
}

/**
 * Fetches page markup over HTTP/HTTPS without executing scripts.
 * Redirects are followed hop by hop so that each hop is logged and bounded.
 */
export class HttpFetcher implements ContentFetcher<FetchOptions> {
  private readonly defaults: Required<Omit<HttpFetcherOptions, "logger">>;
  private readonly logger: Logger;

  constructor(options: HttpFetcherOptions = {}) {
    this.defaults = {
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      headers: options.headers ?? {},
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      followRedirects: options.followRedirects ?? true,
      maxRedirects: options.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
      rejectEmptyContent: options.rejectEmptyContent ?? true,
    };
    this.logger = options.logger ?? defaultLogger;
  }

  canFetch(source: string): boolean {
    return source.startsWith("http://") || source.startsWith("https://");
  }

  async fetch(source: string, options: FetchOptions = {}): Promise<RawContent> {
    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs;
    return withTimeout(
      this.fetchFollowingRedirects(source, options, timeoutMs),
      timeoutMs,
      `HTTP request to ${source}`,
    );
  }

  private async fetchFollowingRedirects(
    source: string,
    options: FetchOptions,
    timeoutMs: number,
  ): Promise<RawContent> {
    const followRedirects = options.followRedirects ?? this.defaults.followRedirects;
    const maxRedirects = options.maxRedirects ?? this.defaults.maxRedirects;
    const headers = {
      "User-Agent": this.defaults.userAgent,
      ...DEFAULT_HEADERS,
      ...this.defaults.headers,
      ...options.headers,
    };

    let currentUrl = source;
    for (let hop = 0; ; hop++) {
      const response = await this.get(currentUrl, headers, timeoutMs);
      const status = response.status;

      if (status >= 300 && status < 400) {
        const location = headerString(response.headers.location);
        if (!location) {
          throw new ScrapeError(
            `Received redirect status ${status} without a Location header from ${currentUrl}`,
            currentUrl,
            status,
          );
        }
        const target = resolveRedirectUrl(location, currentUrl);
        if (!followRedirects) {
          throw new RedirectError(currentUrl, target, status);
        }
        if (hop >= maxRedirects) {
          throw new RedirectError(
            source,
            target,
            status,
            `exceeded the maximum of ${maxRedirects} redirects`,
          );
        }
        this.logger.debug(`↪️ Following redirect ${currentUrl} -> ${target} (${status})`);
        currentUrl = target;
        continue;
      }

      if (status < 200 || status >= 300) {
        const excerpt = truncate(decodeBody(response.data, undefined), BODY_EXCERPT_LENGTH);
        throw new ScrapeError(
          `HTTP request failed with status ${status} for ${currentUrl}. Response body: ${excerpt}`,
          currentUrl,
          status,
        );
      }

      return this.toRawContent(source, currentUrl, response);
    }
  }

  private async get(
    url: string,
    headers: Record<string, string>,
    timeoutMs: number,
  ): Promise<AxiosResponse<unknown>> {
    this.logger.debug(`🌐 GET ${url}`);
    try {
      return await axios.get<unknown>(url, {
        responseType: "arraybuffer",
        headers,
        timeout: timeoutMs,
        maxRedirects: 0,
        validateStatus: () => true,
      });
    } catch (error) {
      const cause = toError(error);
      throw new ScrapeError(
        `Network request to ${url} failed: ${cause.message}`,
        url,
        undefined,
        cause,
      );
    }
  }

  private toRawContent(
    source: string,
    finalUrl: string,
    response: AxiosResponse<unknown>,
  ): RawContent {
    const contentType = headerString(response.headers["content-type"]) ?? "";
    const content = decodeBody(response.data, parseCharset(contentType));

    if (contentType && !isTextualContentType(contentType) && !looksLikeHtml(content)) {
      throw new ScrapeError(
        `Content type is not HTML or XML: ${contentType}`,
        finalUrl,
        response.status,
      );
    }

    if (this.defaults.rejectEmptyContent && !hasVisibleText(content)) {
      throw new ScrapeError(
        `Page returned empty content for ${finalUrl}; it may require JavaScript rendering`,
        finalUrl,
        response.status,
      );
    }

    return {
      content,
      mimeType: contentType.split(";")[0].trim() || "text/html",
      source,
      finalUrl,
      statusCode: response.status,
    };
  }
}

function headerString(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === "string") {
    return value[0];
  }
  return undefined;
}

function parseCharset(contentType: string): string | undefined {
  const match = contentType.match(/charset=([^;]+)/i);
  return match ? match[1].trim().replace(/^["']|["']$/g, "").toLowerCase() : undefined;
}

function isTextualContentType(contentType: string): boolean {
  const type = contentType.toLowerCase();
  return type.includes("html") || type.includes("xml") || type.includes("text/plain");
}

/**
 * Lenient check for servers that mislabel HTML documents.
 */
export function looksLikeHtml(content: string): boolean {
  const head = content.trim().toLowerCase();
  return (
    head.startsWith("<!doctype html") ||
    head.startsWith("<html") ||
    head.includes("<body") ||
    head.includes("<head") ||
    head.includes("<title")
  );
}

function hasVisibleText(content: string): boolean {
  const $ = cheerio.load(content);
  $("script, style, noscript, template").remove();
  return $("body").text().trim().length > 0;
}

/**
 * Decodes a response body with the declared charset. Unknown charsets and
 * invalid byte sequences fall back to permissive UTF-8.
 */
function decodeBody(data: unknown, charset: string | undefined): string {
  if (typeof data === "string") {
    return data;
  }

  let bytes: Uint8Array;
  if (data instanceof Uint8Array) {
    bytes = data;
  } else if (data instanceof ArrayBuffer) {
    bytes = new Uint8Array(data);
  } else {
    return data === undefined || data === null ? "" : String(data);
  }

  const strict = charset ? decodeStrict(bytes, charset) : undefined;
  return strict ?? new TextDecoder("utf-8").decode(bytes);
}

function decodeStrict(bytes: Uint8Array, charset: string): string | undefined {
  try {
    return new TextDecoder(charset, { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
