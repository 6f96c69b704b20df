class WebExtractError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Malformed input supplied by the caller. Never retried.
 */
class ValidationError extends WebExtractError {}

class InvalidUrlError extends ValidationError {
  constructor(
    public readonly url: string,
    reason: string,
    cause?: Error,
  ) {
    super(`Invalid URL "${url}": ${reason}`, cause);
  }
}

class SchemaValidationError extends ValidationError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

/**
 * Static fetch failure (network error, non-2xx status, unusable body).
 */
class ScrapeError extends WebExtractError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, cause);
  }
}

class RedirectError extends ScrapeError {
  constructor(
    public readonly originalUrl: string,
    public readonly redirectUrl: string,
    statusCode: number,
    reason = "redirect following is disabled",
  ) {
    super(
      `Redirect detected from ${originalUrl} to ${redirectUrl} (status: ${statusCode}): ${reason}`,
      originalUrl,
      statusCode,
    );
  }
}

/**
 * Raised when every scrape strategy tried for a URL failed.
 */
class CombinedScrapeError extends ScrapeError {
  constructor(
    message: string,
    url: string,
    public readonly errors: Error[],
  ) {
    super(message, url, undefined, errors[0]);
  }
}

/**
 * Headless-browser failure (launch, navigation, waiting, serialisation).
 */
class RenderedScrapeError extends WebExtractError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, cause);
  }
}

class TimeoutError extends WebExtractError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

type ProviderErrorKind =
  | "unauthorized"
  | "forbidden"
  | "rate_limited"
  | "unavailable"
  | "generic";

class ProviderError extends WebExtractError {
  constructor(
    message: string,
    public readonly providerId: string,
    public readonly kind: ProviderErrorKind = "generic",
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, cause);
  }

  static kindForStatus(status: number | undefined): ProviderErrorKind {
    switch (status) {
      case 401:
        return "unauthorized";
      case 403:
        return "forbidden";
      case 429:
        return "rate_limited";
      case 500:
      case 502:
      case 503:
      case 504:
        return "unavailable";
      default:
        return "generic";
    }
  }

  /**
   * Builds an error for an HTTP status returned by a provider, using the
   * provider's own message when it sent one.
   */
  static fromStatus(
    providerId: string,
    displayName: string,
    status: number,
    detail?: string,
  ): ProviderError {
    const kind = ProviderError.kindForStatus(status);
    switch (kind) {
      case "unauthorized":
        return new ProviderError("Authentication failed: Invalid API key", providerId, kind, status);
      case "forbidden":
        return new ProviderError(
          "Access forbidden: Check your API key permissions",
          providerId,
          kind,
          status,
        );
      case "rate_limited":
        return new ProviderError(
          `Rate limit exceeded: ${detail ?? "Rate limit exceeded"}`,
          providerId,
          kind,
          status,
        );
      case "unavailable":
        return new ProviderError(
          `${displayName} service unavailable (${status})`,
          providerId,
          kind,
          status,
        );
      default:
        return new ProviderError(
          `${displayName} API error (${status}): ${detail ?? "Unknown error"}`,
          providerId,
          kind,
          status,
        );
    }
  }
}

const RAW_PAYLOAD_LIMIT = 200;

class ParsingError extends WebExtractError {
  public readonly rawPayload: string;

  constructor(message: string, rawPayload: string, cause?: Error) {
    super(`Failed to parse content: ${message}`, cause);
    this.rawPayload =
      rawPayload.length > RAW_PAYLOAD_LIMIT
        ? `${rawPayload.slice(0, RAW_PAYLOAD_LIMIT)}...`
        : rawPayload;
  }
}

class BatchError extends WebExtractError {
  constructor(
    message: string,
    public readonly successCount: number,
    public readonly totalCount: number,
    public readonly failedIndex: number,
    cause?: Error,
  ) {
    super(message, cause);
  }
}

class UnsupportedProviderError extends WebExtractError {
  constructor(public readonly provider: string) {
    super(`Unsupported AI provider: ${provider}`);
  }
}

/**
 * Coerces an unknown thrown value into an Error.
 */
function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export {
  WebExtractError,
  ValidationError,
  InvalidUrlError,
  SchemaValidationError,
  ScrapeError,
  RedirectError,
  CombinedScrapeError,
  RenderedScrapeError,
  TimeoutError,
  ProviderError,
  ParsingError,
  BatchError,
  UnsupportedProviderError,
  toError,
};
export type { ProviderErrorKind };
