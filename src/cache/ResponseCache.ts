import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_CACHE_MAX_ENTRIES, DEFAULT_CACHE_TTL_MS } from "../config";
import { type JsonObject, isJsonObject, stableStringify } from "../utils/json";
import { type Logger, logger as defaultLogger } from "../utils/logger";
import type { CacheEntry, CacheKeyInput, CacheStats, ResponseCacheOptions } from "./types";

const CACHE_FILE_VERSION = "1.0";

const cacheFileSchema = z.object({
  version: z.string(),
  timestamp: z.string(),
  entries: z.record(z.unknown()),
});

const persistedEntrySchema = z.object({
  data: z.unknown(),
  timestamp: z.string(),
  rawResponse: z.string(),
  inputHash: z.string().optional(),
});

interface PersistedEntry {
  data: JsonObject;
  timestamp: string;
  rawResponse: string;
  inputHash: string;
}

/**
 * Content-addressable store for AI extraction results.
 *
 * All in-memory mutation happens synchronously; the only suspension point is
 * the optional rewrite of the cache file, which runs after the table is
 * already consistent. The file is rewritten wholesale on every store, so it
 * is only suitable for a single process with a low write rate.
 */
export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly filePath?: string;
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly logger: Logger;
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(options: ResponseCacheOptions = {}) {
    this.filePath = options.filePath;
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Derives the cache key: SHA-256 over a canonical JSON rendering of the input.
   */
  static createKey(input: CacheKeyInput): string {
    const canonical = stableStringify({
      pageContent: input.pageContent,
      fieldSchema: input.fieldSchema,
      providerId: input.providerId,
      options: input.options ?? {},
    });
    return createHash("sha256").update(canonical, "utf8").digest("hex");
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Loads persisted entries, skipping any that have already expired.
   */
  async initialize(): Promise<void> {
    if (!this.filePath) {
      return;
    }

    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        this.logger.debug(`Cache file ${this.filePath} does not exist, starting empty`);
        return;
      }
      throw error;
    }

    let parsedFile: z.infer<typeof cacheFileSchema>;
    try {
      parsedFile = cacheFileSchema.parse(JSON.parse(content));
    } catch (error) {
      this.logger.warn(`⚠️ Ignoring unreadable cache file ${this.filePath}: ${error}`);
      return;
    }

    let loaded = 0;
    for (const [key, raw] of Object.entries(parsedFile.entries)) {
      const result = persistedEntrySchema.safeParse(raw);
      const timestamp = result.success ? Date.parse(result.data.timestamp) : Number.NaN;
      if (!result.success || !isJsonObject(result.data.data) || Number.isNaN(timestamp)) {
        this.logger.warn(`⚠️ Skipping malformed cache entry ${shortKey(key)}`);
        continue;
      }

      const entry: CacheEntry = {
        key,
        data: result.data.data,
        rawResponse: result.data.rawResponse,
        timestamp,
      };
      if (this.isFresh(entry)) {
        this.entries.set(key, entry);
        loaded++;
      }
    }
    this.logger.info(`💾 Loaded ${loaded} valid cache entries from ${this.filePath}`);
  }

  /**
   * Returns the entry when present and younger than the TTL. Expired entries
   * are evicted on the spot.
   */
  get(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.logger.debug(`Cache miss for key ${shortKey(key)}`);
      return undefined;
    }
    if (!this.isFresh(entry)) {
      this.logger.debug(`Cache entry expired for key ${shortKey(key)}`);
      this.entries.delete(key);
      return undefined;
    }
    this.logger.debug(`Cache hit for key ${shortKey(key)}`);
    return entry;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Inserts or overwrites an entry, prunes the table, then persists it when a
   * file path is configured.
   */
  async store(key: string, data: JsonObject, rawResponse: string): Promise<void> {
    this.entries.set(key, { key, data: structuredClone(data), rawResponse, timestamp: Date.now() });
    this.logger.debug(`Stored cache entry for key ${shortKey(key)}`);
    this.cleanup();

    if (this.filePath) {
      await this.saveToFile(this.filePath);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drops every entry and removes the cache file, if any.
   */
  async clear(): Promise<void> {
    this.entries.clear();
    this.logger.info("🧹 Cache cleared");
    if (this.filePath) {
      try {
        await fs.unlink(this.filePath);
      } catch (error) {
        if (!isMissingFileError(error)) {
          throw error;
        }
      }
    }
  }

  getStats(): CacheStats {
    let validEntries = 0;
    for (const entry of this.entries.values()) {
      if (this.isFresh(entry)) {
        validEntries++;
      }
    }
    return {
      totalEntries: this.entries.size,
      validEntries,
      expiredEntries: this.entries.size - validEntries,
      ttlMs: this.ttlMs,
      maxEntries: this.maxEntries,
      filePath: this.filePath ?? null,
    };
  }

  private isFresh(entry: CacheEntry): boolean {
    return Date.now() - entry.timestamp < this.ttlMs;
  }

  private cleanup(): void {
    let expired = 0;
    for (const [key, entry] of this.entries) {
      if (!this.isFresh(entry)) {
        this.entries.delete(key);
        expired++;
      }
    }
    if (expired > 0) {
      this.logger.debug(`Removed ${expired} expired cache entries`);
    }

    const excess = this.entries.size - this.maxEntries;
    if (excess > 0) {
      const oldest = [...this.entries.values()]
        .sort((a, b) => a.timestamp - b.timestamp)
        .slice(0, excess);
      for (const entry of oldest) {
        this.entries.delete(entry.key);
      }
      this.logger.debug(`Evicted ${excess} old cache entries to enforce size limit`);
    }
  }

  /**
   * Queues a rewrite of the cache file behind any write still in flight, so
   * overlapping stores never interleave on the same file.
   */
  private saveToFile(filePath: string): Promise<void> {
    const write = this.pendingWrite.then(() => this.writeFile(filePath));
    this.pendingWrite = write;
    return write;
  }

  private async writeFile(filePath: string): Promise<void> {
    const entries: Record<string, PersistedEntry> = {};
    for (const entry of this.entries.values()) {
      entries[entry.key] = {
        data: entry.data,
        timestamp: new Date(entry.timestamp).toISOString(),
        rawResponse: entry.rawResponse,
        inputHash: entry.key,
      };
    }
    const payload = JSON.stringify({
      version: CACHE_FILE_VERSION,
      timestamp: new Date().toISOString(),
      entries,
    });

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, payload, "utf8");
      this.logger.debug(`Saved ${this.entries.size} cache entries to ${filePath}`);
    } catch (error) {
      this.logger.warn(`⚠️ Failed to save cache file ${filePath}: ${error}`);
    }
  }
}

function shortKey(key: string): string {
  return `${key.slice(0, 16)}...`;
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
