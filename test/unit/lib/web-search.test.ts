/**
 * Web search dispatch tests: provider resolution, credentials, whitelist and
 * caching. Provider functions are replaced so no request leaves the process.
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import { DEFAULT_SEARCH_CONFIG, type SearchConfig } from "@/lib/config-schemas";
import { SearchCache } from "@/lib/search-cache";
import {
  applyWhitelist,
  createWebSearch,
  hasUsableApiKey,
  type SearchProviderFn,
  type WebSearchResult,
} from "@/lib/web-search";

const RESULTS: WebSearchResult[] = [
  { url: "https://www.who.int/a", title: "WHO", content: "who content" },
  { url: "https://blog.example.com/b", title: "Blog", content: "blog content" },
  { url: "https://cdc.gov/c", title: "CDC", content: "cdc content" },
];

function config(overrides: Partial<SearchConfig> = {}): SearchConfig {
  return { ...DEFAULT_SEARCH_CONFIG, cache: { ...DEFAULT_SEARCH_CONFIG.cache, enabled: false }, ...overrides };
}

describe("hasUsableApiKey", () => {
  it("rejects empty and placeholder keys", () => {
    expect(hasUsableApiKey(undefined)).toBe(false);
    expect(hasUsableApiKey("  ")).toBe(false);
    expect(hasUsableApiKey("PASTE_YOUR_KEY_HERE")).toBe(false);
    expect(hasUsableApiKey("test-key")).toBe(true);
  });
});

describe("applyWhitelist", () => {
  it("keeps results whose host is listed, with or without www", () => {
    expect(applyWhitelist(RESULTS, ["who.int", "cdc.gov"]).map((r) => r.title)).toEqual(["WHO", "CDC"]);
  });

  it("drops unparsable URLs and passes everything through without a whitelist", () => {
    const broken = [{ url: "not a url", title: "x", content: "y" }];
    expect(applyWhitelist(broken, ["who.int"])).toEqual([]);
    expect(applyWhitelist(RESULTS, [])).toEqual(RESULTS);
  });
});

describe("createWebSearch", () => {
  const caches: SearchCache[] = [];

  afterEach(async () => {
    for (const cache of caches.splice(0)) await cache.close();
  });

  it("is unavailable when search is disabled", async () => {
    const tavily = vi.fn<SearchProviderFn>();
    const search = createWebSearch(config({ enabled: false }), {
      env: { TAVILY_API_KEY: "test-key" },
      providers: { tavily },
    });

    expect(search.providerName).toBe("none");
    expect(search.isConfigured()).toBe(false);
    expect(await search.search({ query: "q", maxResults: 3 })).toEqual([]);
    expect(tavily).not.toHaveBeenCalled();
  });

  it("auto-selects the first provider with a key", () => {
    expect(createWebSearch(config(), { env: { TAVILY_API_KEY: "test-key" } }).providerName).toBe("tavily");
    expect(createWebSearch(config(), { env: { BRAVE_API_KEY: "test-key" } }).providerName).toBe("brave");
    expect(createWebSearch(config(), { env: {} }).providerName).toBe("none");
  });

  it("returns [] for an explicit provider without credentials", async () => {
    const brave = vi.fn<SearchProviderFn>();
    const search = createWebSearch(config({ provider: "brave" }), { env: {}, providers: { brave } });

    expect(search.providerName).toBe("brave");
    expect(search.isConfigured()).toBe(false);
    expect(await search.search({ query: "q", maxResults: 3 })).toEqual([]);
    expect(brave).not.toHaveBeenCalled();
  });

  it("applies config defaults, the whitelist and the result limit", async () => {
    const tavily = vi.fn<SearchProviderFn>().mockResolvedValue(RESULTS);
    const search = createWebSearch(config({ domainWhitelist: ["who.int", "cdc.gov"], timeoutMs: 5000 }), {
      env: { TAVILY_API_KEY: "test-key" },
      providers: { tavily },
    });

    const results = await search.search({ query: "vaccines", maxResults: 1 });

    expect(results.map((r) => r.title)).toEqual(["WHO"]);
    expect(tavily).toHaveBeenCalledWith(
      { query: "vaccines", maxResults: 1, timeoutMs: 5000, domainWhitelist: ["who.int", "cdc.gov"] },
      expect.objectContaining({ apiKey: "test-key" }),
    );
  });

  it("serves repeated queries from the cache", async () => {
    const cache = new SearchCache({ enabled: true, ttlDays: 7, dbPath: ":memory:" });
    caches.push(cache);
    const tavily = vi.fn<SearchProviderFn>().mockResolvedValue(RESULTS);
    const search = createWebSearch(config(), { env: { TAVILY_API_KEY: "test-key" }, providers: { tavily }, cache });

    const first = await search.search({ query: "Vaccines", maxResults: 2 });
    const second = await search.search({ query: "vaccines", maxResults: 2 });

    expect(first.map((r) => r.title)).toEqual(["WHO", "Blog"]);
    expect(second).toEqual(first);
    expect(tavily).toHaveBeenCalledTimes(1);
  });

  it("propagates provider failures", async () => {
    const tavily = vi.fn<SearchProviderFn>().mockRejectedValue(new Error("network down"));
    const search = createWebSearch(config(), { env: { TAVILY_API_KEY: "test-key" }, providers: { tavily } });
    await expect(search.search({ query: "q", maxResults: 3 })).rejects.toThrow("network down");
  });
});
