/**
 * Tests for the search cache (SQLite-based caching).
 *
 * Validates cache hit/miss, TTL expiration, key generation and statistics.
 * Each test gets its own in-memory database.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SearchCache, generateCacheKey } from "@/lib/search-cache";
import type { WebSearchOptions, WebSearchResult } from "@/lib/web-search";

const DAY_MS = 24 * 60 * 60 * 1000;
const START = new Date("2026-01-01T00:00:00.000Z");

const OPTIONS: WebSearchOptions = { query: "coffee production brazil", maxResults: 3 };
const RESULTS: WebSearchResult[] = [
  { url: "https://example.org/coffee", title: "Coffee facts", content: "Brazil is the largest producer." },
];

describe("generateCacheKey", () => {
  it("ignores query case, surrounding whitespace and whitelist order", () => {
    expect(generateCacheKey({ query: "  Coffee ", maxResults: 3, domainWhitelist: ["b.org", "a.org"] }, "tavily")).toBe(
      generateCacheKey({ query: "coffee", maxResults: 3, domainWhitelist: ["a.org", "b.org"] }, "tavily"),
    );
  });

  it("differs by provider and result count", () => {
    const base = generateCacheKey(OPTIONS, "tavily");
    expect(generateCacheKey(OPTIONS, "brave")).not.toBe(base);
    expect(generateCacheKey({ ...OPTIONS, maxResults: 5 }, "tavily")).not.toBe(base);
  });
});

describe("SearchCache", () => {
  let now: Date;
  let cache: SearchCache;

  beforeEach(() => {
    now = START;
    cache = new SearchCache({ enabled: true, ttlDays: 7, dbPath: ":memory:" }, undefined, () => now);
  });

  afterEach(async () => {
    await cache.close();
  });

  it("should return null on cache miss", async () => {
    expect(await cache.get(OPTIONS, "tavily")).toBeNull();
  });

  it("should cache and retrieve search results", async () => {
    await cache.put(OPTIONS, "tavily", RESULTS);

    const cached = await cache.get(OPTIONS, "tavily");
    expect(cached).toMatchObject({
      queryText: "coffee production brazil",
      maxResults: 3,
      results: RESULTS,
      provider: "tavily",
      cachedAt: "2026-01-01T00:00:00.000Z",
      expiresAt: "2026-01-08T00:00:00.000Z",
    });
    expect(await cache.get(OPTIONS, "brave")).toBeNull();
  });

  it("should expire entries after the TTL and clean them up", async () => {
    await cache.put(OPTIONS, "tavily", RESULTS);
    now = new Date(START.getTime() + 8 * DAY_MS);

    expect(await cache.get(OPTIONS, "tavily")).toBeNull();
    expect(await cache.cleanupExpired()).toBe(1);
    expect((await cache.stats()).totalEntries).toBe(0);
  });

  it("should respect the enabled flag", async () => {
    const disabled = new SearchCache({ enabled: false, ttlDays: 7, dbPath: ":memory:" });
    await disabled.put(OPTIONS, "tavily", RESULTS);
    expect(await disabled.get(OPTIONS, "tavily")).toBeNull();
    await disabled.close();
  });

  it("should report statistics per provider", async () => {
    await cache.put(OPTIONS, "tavily", RESULTS);
    now = new Date(START.getTime() + DAY_MS);
    await cache.put({ query: "vaccines", maxResults: 3 }, "brave", RESULTS);
    now = new Date(START.getTime() + 7.5 * DAY_MS);

    expect(await cache.stats()).toEqual({
      totalEntries: 2,
      validEntries: 1,
      expiredEntries: 1,
      providerBreakdown: { brave: 1 },
      oldestEntry: "2026-01-02T00:00:00.000Z",
      newestEntry: "2026-01-02T00:00:00.000Z",
    });
  });

  it("should clear all entries", async () => {
    await cache.put(OPTIONS, "tavily", RESULTS);
    await cache.put({ query: "other", maxResults: 1 }, "tavily", RESULTS);
    expect(await cache.clear()).toBe(2);
    expect(await cache.get(OPTIONS, "tavily")).toBeNull();
  });
});
