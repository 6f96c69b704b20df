import { InvalidUrlError } from "./errors";

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Validates that a string is an absolute http(s) URL with a host.
 * @throws {InvalidUrlError} If the URL is malformed or uses another scheme
 */
export function validateUrl(url: string): URL {
  const trimmed = url.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch (error) {
    throw new InvalidUrlError(
      trimmed,
      "malformed URL",
      error instanceof Error ? error : undefined,
    );
  }

  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol)) {
    throw new InvalidUrlError(
      trimmed,
      `unsupported scheme "${parsed.protocol.replace(/:$/, "")}". Supported schemes: http, https`,
    );
  }

  if (!parsed.hostname) {
    throw new InvalidUrlError(trimmed, "URL must have a valid host");
  }

  return parsed;
}

/**
 * Resolves a `Location` header against the URL that produced it.
 */
export function resolveRedirectUrl(location: string, currentUrl: string): string {
  return new URL(location, currentUrl).toString();
}
