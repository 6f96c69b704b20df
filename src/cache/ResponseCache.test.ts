import { vol } from "memfs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../utils/logger";
import { ResponseCache } from "./ResponseCache";

vi.mock("node:fs/promises", () => ({ default: vol.promises }));
vi.mock("../utils/logger");

const NOW = new Date("2025-01-01T00:00:00.000Z");
const CACHE_FILE = "/cache/responses.json";

const keyInput = {
  pageContent: "<html><body><h1>Widget</h1></body></html>",
  fieldSchema: { title: "string", price: "number" },
  providerId: "openai",
  options: { model: "gpt-4o-mini" },
};

describe("ResponseCache", () => {
  beforeEach(() => {
    vol.reset();
    vi.clearAllMocks();
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("createKey", () => {
    it("should produce a 64 character hex digest", () => {
      expect(ResponseCache.createKey(keyInput)).toMatch(/^[0-9a-f]{64}$/);
    });

    it("should be stable across calls and schema key order", () => {
      const reordered = {
        ...keyInput,
        fieldSchema: { price: "number", title: "string" },
      };
      expect(ResponseCache.createKey(reordered)).toBe(ResponseCache.createKey(keyInput));
    });

    it("should change when any input component changes", () => {
      const base = ResponseCache.createKey(keyInput);
      expect(ResponseCache.createKey({ ...keyInput, providerId: "gemini" })).not.toBe(base);
      expect(ResponseCache.createKey({ ...keyInput, pageContent: "<html></html>" })).not.toBe(
        base,
      );
      expect(
        ResponseCache.createKey({ ...keyInput, options: { model: "gpt-4o" } }),
      ).not.toBe(base);
    });

    it("should treat missing options like empty options", () => {
      const { options: _options, ...withoutOptions } = keyInput;
      expect(ResponseCache.createKey(withoutOptions)).toBe(
        ResponseCache.createKey({ ...withoutOptions, options: {} }),
      );
    });
  });

  describe("in memory", () => {
    it("should return stored entries", async () => {
      const cache = new ResponseCache();
      await cache.store("k1", { title: "Widget" }, '{"title":"Widget"}');

      expect(cache.get("k1")).toEqual({
        key: "k1",
        data: { title: "Widget" },
        rawResponse: '{"title":"Widget"}',
        timestamp: NOW.getTime(),
      });
      expect(cache.has("k1")).toBe(true);
      expect(cache.size).toBe(1);
    });

    it("should report a miss for unknown keys", () => {
      expect(new ResponseCache().get("missing")).toBeUndefined();
    });

    it("should overwrite an existing key", async () => {
      const cache = new ResponseCache();
      await cache.store("k1", { title: "Old" }, "{}");
      await cache.store("k1", { title: "New" }, "{}");
      expect(cache.get("k1")?.data).toEqual({ title: "New" });
      expect(cache.size).toBe(1);
    });

    it("should expire entries once the ttl has elapsed", async () => {
      const cache = new ResponseCache({ ttlMs: 1000 });
      await cache.store("k1", { title: "Widget" }, "{}");

      vi.setSystemTime(NOW.getTime() + 999);
      expect(cache.get("k1")).toBeDefined();

      vi.setSystemTime(NOW.getTime() + 1000);
      expect(cache.get("k1")).toBeUndefined();
      expect(cache.size).toBe(0);
    });

    it("should evict the oldest entries beyond the size limit", async () => {
      const cache = new ResponseCache({ maxEntries: 2 });
      await cache.store("a", { n: 1 }, "{}");
      vi.setSystemTime(NOW.getTime() + 1);
      await cache.store("b", { n: 2 }, "{}");
      vi.setSystemTime(NOW.getTime() + 2);
      await cache.store("c", { n: 3 }, "{}");

      expect(cache.size).toBe(2);
      expect(cache.get("a")).toBeUndefined();
      expect(cache.get("b")).toBeDefined();
      expect(cache.get("c")).toBeDefined();
    });

    it("should drop expired entries when storing", async () => {
      const cache = new ResponseCache({ ttlMs: 1000 });
      await cache.store("old", { n: 1 }, "{}");
      vi.setSystemTime(NOW.getTime() + 5000);
      await cache.store("new", { n: 2 }, "{}");

      expect(cache.size).toBe(1);
      expect(cache.getStats().expiredEntries).toBe(0);
    });

    it("should delete single entries", async () => {
      const cache = new ResponseCache();
      await cache.store("k1", { n: 1 }, "{}");
      expect(cache.delete("k1")).toBe(true);
      expect(cache.delete("k1")).toBe(false);
      expect(cache.has("k1")).toBe(false);
    });

    it("should count valid and expired entries", async () => {
      const cache = new ResponseCache({ ttlMs: 1000, maxEntries: 10 });
      await cache.store("a", { n: 1 }, "{}");
      vi.setSystemTime(NOW.getTime() + 600);
      await cache.store("b", { n: 2 }, "{}");
      vi.setSystemTime(NOW.getTime() + 1200);

      expect(cache.getStats()).toEqual({
        totalEntries: 2,
        validEntries: 1,
        expiredEntries: 1,
        ttlMs: 1000,
        maxEntries: 10,
        filePath: null,
      });
    });
  });

  describe("with a cache file", () => {
    it("should write the whole table after each store", async () => {
      const cache = new ResponseCache({ filePath: CACHE_FILE });
      await cache.store("k1", { title: "Widget" }, '{"title":"Widget"}');

      const saved: unknown = JSON.parse(vol.readFileSync(CACHE_FILE, "utf8").toString());
      expect(saved).toEqual({
        version: "1.0",
        timestamp: NOW.toISOString(),
        entries: {
          k1: {
            data: { title: "Widget" },
            timestamp: NOW.toISOString(),
            rawResponse: '{"title":"Widget"}',
            inputHash: "k1",
          },
        },
      });
    });

    it("should write the file one store at a time", async () => {
      const writeFile = vol.promises.writeFile;
      let writing = 0;
      let overlapped = false;
      const spy = vi.spyOn(vol.promises, "writeFile").mockImplementation(async (file, data) => {
        writing++;
        overlapped = overlapped || writing > 1;
        await new Promise((resolve) => setImmediate(resolve));
        try {
          await writeFile.call(vol.promises, file, data);
        } finally {
          writing--;
        }
      });
      const cache = new ResponseCache({ filePath: CACHE_FILE });

      await Promise.all([
        cache.store("a", { title: "A much longer title than the next one" }, "{}"),
        cache.store("b", { title: "B" }, "{}"),
      ]);

      expect(overlapped).toBe(false);
      expect(spy).toHaveBeenCalledTimes(2);
      spy.mockRestore();
      const reloaded = new ResponseCache({ filePath: CACHE_FILE });
      await reloaded.initialize();
      expect(reloaded.size).toBe(2);
    });

    it("should reload stored entries in a new instance", async () => {
      await new ResponseCache({ filePath: CACHE_FILE }).store("k1", { price: 9.99 }, "{}");

      const reloaded = new ResponseCache({ filePath: CACHE_FILE });
      await reloaded.initialize();

      expect(reloaded.get("k1")?.data).toEqual({ price: 9.99 });
      expect(reloaded.get("k1")?.timestamp).toBe(NOW.getTime());
    });

    it("should skip expired and malformed entries on load", async () => {
      vol.fromJSON({
        [CACHE_FILE]: JSON.stringify({
          version: "1.0",
          timestamp: NOW.toISOString(),
          entries: {
            fresh: {
              data: { title: "Fresh" },
              timestamp: "2024-12-31T23:59:00.000Z",
              rawResponse: "{}",
              inputHash: "fresh",
            },
            stale: {
              data: { title: "Stale" },
              timestamp: "2024-12-31T22:00:00.000Z",
              rawResponse: "{}",
              inputHash: "stale",
            },
            broken: { data: "not an object", timestamp: "2024-12-31T23:59:00.000Z" },
          },
        }),
      });

      const cache = new ResponseCache({ filePath: CACHE_FILE });
      await cache.initialize();

      expect(cache.size).toBe(1);
      expect(cache.get("fresh")?.data).toEqual({ title: "Fresh" });
      expect(logger.warn).toHaveBeenCalledWith("⚠️ Skipping malformed cache entry broken...");
    });

    it("should start empty when the file does not exist", async () => {
      const cache = new ResponseCache({ filePath: CACHE_FILE });
      await cache.initialize();
      expect(cache.size).toBe(0);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("should start empty and warn when the file is corrupt", async () => {
      vol.fromJSON({ [CACHE_FILE]: "{not json" });

      const cache = new ResponseCache({ filePath: CACHE_FILE });
      await cache.initialize();

      expect(cache.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it("should remove the file on clear", async () => {
      const cache = new ResponseCache({ filePath: CACHE_FILE });
      await cache.store("k1", { n: 1 }, "{}");
      expect(vol.existsSync(CACHE_FILE)).toBe(true);

      await cache.clear();

      expect(cache.size).toBe(0);
      expect(vol.existsSync(CACHE_FILE)).toBe(false);
    });

    it("should tolerate clearing before anything was written", async () => {
      const cache = new ResponseCache({ filePath: CACHE_FILE });
      await expect(cache.clear()).resolves.toBeUndefined();
    });
  });
});
