/**
 * Search Cache
 *
 * SQLite cache for web search results, keyed by query, result count, provider
 * and domain whitelist. Entries expire after `ttlDays`.
 * Every operation is best-effort: a cache failure is logged and treated as a
 * miss, never surfaced to the search caller.
 *
 * @module search-cache
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import path from "path";
import crypto from "crypto";
import { z } from "zod";
import type { SearchConfig } from "./config-schemas";
import type { WebSearchOptions, WebSearchResult } from "./web-search";
import type { PipelineLogger } from "./analyzer/debug";
import { silentLogger } from "./analyzer/debug";

export type SearchCacheConfig = SearchConfig["cache"];

export interface CachedSearchResult {
  cacheKey: string;
  queryText: string;
  maxResults: number;
  results: WebSearchResult[];
  provider: string;
  cachedAt: string;
  expiresAt: string;
}

export interface SearchCacheStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  providerBreakdown: Record<string, number>;
  /** Oldest entry that has not expired */
  oldestEntry: string | null;
  newestEntry: string | null;
}

interface CacheRow {
  query: string;
  max_results: number;
  provider: string;
  payload: string;
  stored_at: string;
  expires_at: string;
}

interface SummaryRow {
  total: number;
  valid: number | null;
  oldest_valid: string | null;
  newest: string | null;
}

const PayloadSchema = z.array(
  z.object({
    url: z.string(),
    title: z.string(),
    content: z.string(),
  }),
);

const DAY_MS = 86_400_000;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS web_search_cache (
    key TEXT PRIMARY KEY,
    query TEXT NOT NULL,
    max_results INTEGER NOT NULL,
    provider TEXT NOT NULL,
    payload TEXT NOT NULL,
    stored_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS web_search_cache_expiry ON web_search_cache(expires_at);
`;

/**
 * Deterministic cache key. Query case, surrounding whitespace and whitelist
 * order do not change it.
 */
export function generateCacheKey(options: WebSearchOptions, provider: string): string {
  const whitelist = [...(options.domainWhitelist ?? [])].sort();
  const material = [options.query.trim().toLowerCase(), String(options.maxResults), provider, JSON.stringify(whitelist)];
  return crypto.createHash("sha256").update(material.join("|")).digest("hex");
}

export class SearchCache {
  private dbPromise: Promise<Database> | null = null;

  constructor(
    private readonly config: SearchCacheConfig,
    private readonly logger: PipelineLogger = silentLogger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private getDb(): Promise<Database> {
    if (!this.dbPromise) {
      this.dbPromise = this.openDb().catch((err: unknown) => {
        // let the next call retry the open
        this.dbPromise = null;
        throw err;
      });
    }
    return this.dbPromise;
  }

  private async openDb(): Promise<Database> {
    const filename = this.config.dbPath === ":memory:" ? ":memory:" : path.resolve(this.config.dbPath);
    this.logger.debug(`Opening search cache at ${filename}`);
    const db = await open({ filename, driver: sqlite3.Database });
    await db.exec("PRAGMA journal_mode=WAL");
    await db.exec(SCHEMA_SQL);
    return db;
  }

  /** Runs `op` against the database, logging and returning `fallback` on failure. */
  private async withDb<T>(action: string, fallback: T, op: (db: Database) => Promise<T>): Promise<T> {
    try {
      return await op(await this.getDb());
    } catch (err) {
      this.logger.error(`Search cache ${action} failed`, err);
      return fallback;
    }
  }

  async get(options: WebSearchOptions, provider: string): Promise<CachedSearchResult | null> {
    if (!this.config.enabled) return null;
    const cacheKey = generateCacheKey(options, provider);

    return this.withDb("read", null, async (db) => {
      const row = await db.get<CacheRow>(
        "SELECT query, max_results, provider, payload, stored_at, expires_at FROM web_search_cache WHERE key = ? AND expires_at > ?",
        [cacheKey, this.now().toISOString()],
      );
      if (!row) return null;

      const payload = PayloadSchema.safeParse(JSON.parse(row.payload));
      if (!payload.success) {
        this.logger.warn(`Discarding malformed cache entry ${cacheKey.slice(0, 12)}`);
        return null;
      }
      this.logger.info(`Cache hit for "${options.query.slice(0, 50)}" (${payload.data.length} results, ${row.provider})`);

      return {
        cacheKey,
        queryText: row.query,
        maxResults: row.max_results,
        results: payload.data,
        provider: row.provider,
        cachedAt: row.stored_at,
        expiresAt: row.expires_at,
      };
    });
  }

  async put(options: WebSearchOptions, provider: string, results: WebSearchResult[]): Promise<void> {
    if (!this.config.enabled) return;
    const storedAt = this.now();
    const expiresAt = new Date(storedAt.getTime() + this.config.ttlDays * DAY_MS);

    await this.withDb("write", undefined, async (db) => {
      await db.run(
        "INSERT OR REPLACE INTO web_search_cache (key, query, max_results, provider, payload, stored_at, expires_at) VALUES (?, ?, ?, ?, ?, ?, ?)",
        [
          generateCacheKey(options, provider),
          options.query,
          options.maxResults,
          provider,
          JSON.stringify(results),
          storedAt.toISOString(),
          expiresAt.toISOString(),
        ],
      );
      this.logger.debug(`Cached ${results.length} results from ${provider} for ${this.config.ttlDays}d`);
    });
  }

  /** Deletes expired entries and returns how many were removed. */
  cleanupExpired(): Promise<number> {
    return this.withDb("cleanup", 0, async (db) => {
      const { changes } = await db.run("DELETE FROM web_search_cache WHERE expires_at <= ?", [this.now().toISOString()]);
      return changes ?? 0;
    });
  }

  clear(): Promise<number> {
    return this.withDb("clear", 0, async (db) => {
      const { changes } = await db.run("DELETE FROM web_search_cache");
      return changes ?? 0;
    });
  }

  stats(): Promise<SearchCacheStats> {
    const empty: SearchCacheStats = {
      totalEntries: 0,
      validEntries: 0,
      expiredEntries: 0,
      providerBreakdown: {},
      oldestEntry: null,
      newestEntry: null,
    };

    return this.withDb("stats", empty, async (db) => {
      const now = this.now().toISOString();
      const summary = await db.get<SummaryRow>(
        `SELECT COUNT(*) AS total,
                SUM(CASE WHEN expires_at > ? THEN 1 ELSE 0 END) AS valid,
                MIN(CASE WHEN expires_at > ? THEN stored_at END) AS oldest_valid,
                MAX(stored_at) AS newest
         FROM web_search_cache`,
        [now, now],
      );
      const perProvider = await db.all<Array<{ provider: string; n: number }>>(
        "SELECT provider, COUNT(*) AS n FROM web_search_cache WHERE expires_at > ? GROUP BY provider",
        [now],
      );

      const totalEntries = summary?.total ?? 0;
      const validEntries = summary?.valid ?? 0;
      return {
        totalEntries,
        validEntries,
        expiredEntries: totalEntries - validEntries,
        providerBreakdown: Object.fromEntries(perProvider.map((row) => [row.provider, row.n])),
        oldestEntry: summary?.oldest_valid ?? null,
        newestEntry: summary?.newest ?? null,
      };
    });
  }

  async close(): Promise<void> {
    const pending = this.dbPromise;
    this.dbPromise = null;
    if (!pending) return;
    // an open that failed already left nothing to close
    const db = await pending.catch(() => null);
    if (db) await db.close();
  }
}
