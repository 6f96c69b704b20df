import type { FieldSchema } from "../schema";
import type { Logger } from "../utils/logger";
import type { JsonObject } from "../utils/json";

/**
 * Everything that influences an extraction result. Two equal inputs always
 * map to the same cache key.
 */
export interface CacheKeyInput {
  pageContent: string;
  fieldSchema: FieldSchema;
  providerId: string;
  options?: Record<string, unknown>;
}

export interface CacheEntry {
  /** SHA-256 hex digest of the canonical key input. */
  key: string;
  /** Normalized extraction result. */
  data: JsonObject;
  /** Provider text the result was parsed from, kept for diagnostics. */
  rawResponse: string;
  /** Creation time in epoch milliseconds. */
  timestamp: number;
}

export interface ResponseCacheOptions {
  /** When set, the table is loaded from and rewritten to this JSON file. */
  filePath?: string;
  /** Entries older than this are treated as absent. */
  ttlMs?: number;
  /** Upper bound on stored entries; the oldest are evicted first. */
  maxEntries?: number;
  logger?: Logger;
}

export interface CacheStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  ttlMs: number;
  maxEntries: number;
  filePath: string | null;
}
