/**
 * SQLite vector store tests, with an in-memory database and a keyword-based
 * embedder standing in for the embedding model.
 */
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import sqlite3 from "sqlite3";
import { open } from "sqlite";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Embedder } from "@/lib/embeddings";
import { SqliteVectorStore } from "@/lib/vector-store-sqlite";

function keywordEmbedder(calls: string[][]): Embedder {
  return async (texts) => {
    calls.push(texts);
    return texts.map((text) => {
      const lower = text.toLowerCase();
      if (lower.includes("coffee")) return [2, 0];
      if (lower.includes("vaccine")) return [0, 3];
      return [1, 1];
    });
  };
}

describe("SqliteVectorStore", () => {
  let calls: string[][];
  let store: SqliteVectorStore;

  beforeEach(() => {
    calls = [];
    store = new SqliteVectorStore(":memory:", keywordEmbedder(calls));
  });

  afterEach(async () => {
    await store.close();
  });

  it("returns nothing from an empty index without embedding the query", async () => {
    expect(await store.nearestNeighbors("coffee", 5)).toEqual([]);
    expect(await store.nearestNeighbors("coffee", 0)).toEqual([]);
    expect(calls).toEqual([]);
  });

  it("orders neighbours by ascending distance and honours k", async () => {
    expect(
      await store.add([
        { content: "Vaccine trials", metadata: { source: "vaccines.md", origin: "LOCAL" } },
        { content: "Coffee harvest data", metadata: { source: "coffee.md", origin: "LOCAL" } },
        { content: "General notes", metadata: { source: "notes.md", origin: "LOCAL" } },
      ]),
    ).toBe(true);

    const matches = await store.nearestNeighbors("coffee production", 2);

    expect(matches.map((m) => m.metadata.source)).toEqual(["coffee.md", "notes.md"]);
    expect(matches[0]?.distance).toBe(0);
    expect(matches[1]?.distance).toBeCloseTo(Math.sqrt(2 - Math.SQRT2), 10);
    expect(calls.at(-1)).toEqual(["coffee production"]);
  });

  it("stamps stored metadata with the time it was added", async () => {
    await store.add([{ content: "Coffee", metadata: { source: "Site", url: "https://example.org/c", origin: "WEB" } }]);
    const [match] = await store.nearestNeighbors("coffee", 1);
    expect(match?.metadata).toMatchObject({ source: "Site", url: "https://example.org/c", origin: "WEB" });
    expect(typeof match?.metadata.addedAt).toBe("string");
  });

  it("ignores a page already indexed with the same content", async () => {
    await store.add([{ content: "Coffee v1", metadata: { source: "A", url: "https://example.org/c" } }]);
    expect(await store.add([{ content: "Coffee v1", metadata: { source: "B", url: "https://example.org/c" } }])).toBe(
      true,
    );

    expect(await store.count()).toBe(1);
    const [match] = await store.nearestNeighbors("coffee", 5);
    expect(match?.metadata.source).toBe("A");
  });

  it("keeps every chunk of one source", async () => {
    expect(
      await store.add([
        { content: "Coffee harvest in Minas Gerais", metadata: { source: "cafe.md" } },
        { content: "Coffee exports by year", metadata: { source: "cafe.md" } },
      ]),
    ).toBe(true);

    expect(await store.count()).toBe(2);
    const matches = await store.nearestNeighbors("coffee", 5);
    expect(matches.map((m) => m.content)).toEqual(["Coffee harvest in Minas Gerais", "Coffee exports by year"]);
  });

  it("returns false and stores nothing when embedding fails", async () => {
    const failing = new SqliteVectorStore(":memory:", async () => {
      throw new Error("embedding quota");
    });
    expect(await failing.add([{ content: "text", metadata: { source: "a.md" } }])).toBe(false);
    expect(await failing.count()).toBe(0);
    await failing.close();
  });

  it("returns false when the embedder returns the wrong number of vectors", async () => {
    const short = new SqliteVectorStore(":memory:", async () => [[1, 0]]);
    expect(
      await short.add([
        { content: "a", metadata: { source: "a.md" } },
        { content: "b", metadata: { source: "b.md" } },
      ]),
    ).toBe(false);
    expect(await short.count()).toBe(0);
    await short.close();
  });

  it("serializes concurrent writers", async () => {
    const results = await Promise.all([
      store.add([{ content: "Coffee one", metadata: { source: "one.md" } }]),
      store.add([{ content: "Coffee two", metadata: { source: "two.md" } }]),
      store.add([{ content: "Coffee one", metadata: { source: "one.md" } }]),
    ]);
    expect(results).toEqual([true, true, true]);
    expect(await store.count()).toBe(2);
  });

  it("skips rows whose stored JSON cannot be read", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "claim-verifier-index-"));
    const dbPath = path.join(dir, "index.db");
    const onDisk = new SqliteVectorStore(dbPath, keywordEmbedder(calls));
    try {
      await onDisk.add([
        { content: "Coffee harvest", metadata: { source: "coffee.md" } },
        { content: "Vaccine trials", metadata: { source: "vaccines.md" } },
      ]);
      const raw = await open({ filename: dbPath, driver: sqlite3.Database });
      await raw.run("UPDATE documents SET metadata_json = ? WHERE content = ?", ["{not json", "Coffee harvest"]);
      await raw.close();

      const matches = await onDisk.nearestNeighbors("coffee", 5);
      expect(matches.map((m) => m.metadata.source)).toEqual(["vaccines.md"]);
    } finally {
      await onDisk.close();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
