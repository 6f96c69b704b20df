import type { ScrapeMethod } from "../scraper/types";
import type { JsonObject } from "../utils/json";
import type { ExtractionFailure, ExtractionResult, ExtractionSuccess } from "./types";

interface ResultContext {
  url: string;
  providerId: string;
  elapsedMs: number;
  cached?: boolean;
  scrapeMethod?: ScrapeMethod;
}

function withoutUndefined<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) {
      Reflect.deleteProperty(value, key);
    }
  }
  return value;
}

/**
 * Builds a frozen success result. `data` is copied, so later edits on either
 * side stay local.
 */
export function createSuccessResult(data: JsonObject, context: ResultContext): ExtractionSuccess {
  return Object.freeze(
    withoutUndefined<ExtractionSuccess>({
      success: true,
      data: structuredClone(data),
      ...context,
      timestamp: new Date().toISOString(),
    }),
  );
}

export function createFailureResult(error: string, context: ResultContext): ExtractionFailure {
  return Object.freeze(
    withoutUndefined<ExtractionFailure>({
      success: false,
      error,
      ...context,
      timestamp: new Date().toISOString(),
    }),
  );
}

/**
 * Derives a successful copy of `result` carrying `data`. The original is left untouched.
 */
export function withResultData(result: ExtractionResult, data: JsonObject): ExtractionSuccess {
  const { url, providerId, elapsedMs, timestamp, cached, scrapeMethod } = result;
  return Object.freeze(
    withoutUndefined<ExtractionSuccess>({
      success: true,
      data: structuredClone(data),
      url,
      providerId,
      elapsedMs,
      timestamp,
      cached,
      scrapeMethod,
    }),
  );
}
