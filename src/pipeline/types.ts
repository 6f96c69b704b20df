import type { FieldSchema } from "../schema";
import type { ScrapeMethod } from "../scraper/types";
import type { RenderOptions } from "../scraper/fetcher/types";
import type { JsonObject } from "../utils/json";

/**
 * One page to extract, and how.
 */
export interface ExtractionRequest {
  url: string;
  fieldSchema: FieldSchema;
  /** Extra guidance appended to the prompt */
  customInstructions?: string;
  /** Overrides the pipeline's default retrieval preference */
  preferRendered?: boolean;
  /** Overrides the pipeline's default number of scrape retries */
  maxRetries?: number;
  /** Browser options used whenever the page is rendered */
  render?: RenderOptions;
}

interface ExtractionResultBase {
  /** Wall-clock duration of the whole extraction */
  elapsedMs: number;
  providerId: string;
  url: string;
  /** Completion time as an ISO 8601 string */
  timestamp: string;
  /** Set when the data came from the response cache */
  cached?: boolean;
  /** Strategy that produced the page content */
  scrapeMethod?: ScrapeMethod;
}

export interface ExtractionSuccess extends ExtractionResultBase {
  success: true;
  data: JsonObject;
  error?: undefined;
}

export interface ExtractionFailure extends ExtractionResultBase {
  success: false;
  data?: undefined;
  error: string;
}

/**
 * Outcome of one extraction. Successful results always carry data, failed
 * results always carry an error message. Results are frozen.
 */
export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

export interface BatchProgress {
  completed: number;
  total: number;
}

export interface BatchOptions<TItem, TResult> {
  /** Maximum number of items processed at once */
  concurrency: number;
  /** Defaults to true */
  continueOnError?: boolean;
  /** Turns an item's thrown error into a result in continue mode */
  onFailure?: (error: Error, item: TItem, index: number) => TResult;
  /** Returns the error a resolved result stands for, if it is a failure. Stops a fail-fast batch. */
  toFailure?: (result: TResult) => Error | undefined;
  onProgress?: (progress: BatchProgress) => void;
}

/**
 * Options shared by every URL of a batch extraction.
 */
export interface BatchExtractionOptions
  extends Omit<ExtractionRequest, "url" | "fieldSchema"> {
  concurrency?: number;
  continueOnError?: boolean;
  onProgress?: (progress: BatchProgress) => void;
}
