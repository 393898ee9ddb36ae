/**
 * SQLite Vector Store
 *
 * Local evidence index. Each row holds one document with its L2-normalized
 * embedding serialized as JSON; nearest-neighbour lookup is a brute-force
 * Euclidean scan, which is adequate for curated fact-check collections.
 *
 * Rows are unique by source id (URL, else source) together with a content
 * hash: several chunks of one file are all kept, while persisting the same web
 * page twice is a no-op. Writers are serialized through an internal queue so
 * concurrent verifications can persist evidence safely.
 *
 * @module vector-store-sqlite
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import path from "path";
import crypto from "crypto";
import { z } from "zod";
import type { Embedder } from "./embeddings";
import { euclideanDistance, l2Normalize } from "./embeddings";
import {
  documentSourceId,
  type DocumentMetadata,
  type IndexedDocument,
  type NeighborMatch,
  type VectorIndex,
} from "./vector-index";
import type { PipelineLogger } from "./analyzer/debug";
import { silentLogger } from "./analyzer/debug";

interface DocumentRow {
  content: string;
  metadata_json: string;
  embedding_json: string;
}

const MetadataSchema = z.object({
  source: z.string(),
  url: z.string().optional(),
  origin: z.enum(["LOCAL", "WEB"]).optional(),
  addedAt: z.string().optional(),
});

const EmbeddingSchema = z.array(z.number());

function parseStoredJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // reported by the caller as a malformed row
    return undefined;
  }
}

export class SqliteVectorStore implements VectorIndex {
  private db: Database | null = null;
  private dbPromise: Promise<Database> | null = null;
  private writeQueue: Promise<boolean> = Promise.resolve(true);

  constructor(
    private readonly dbPath: string,
    private readonly embed: Embedder,
    private readonly logger: PipelineLogger = silentLogger,
  ) {}

  private async getDb(): Promise<Database> {
    if (this.db) return this.db;
    if (!this.dbPromise) {
      this.dbPromise = this.openDb().catch((err: unknown) => {
        this.dbPromise = null;
        throw err;
      });
    }
    return this.dbPromise;
  }

  private async openDb(): Promise<Database> {
    const filename = this.dbPath === ":memory:" ? ":memory:" : path.resolve(this.dbPath);
    this.logger.debug(`Opening vector store at ${filename}`);

    const instance = await open({ filename, driver: sqlite3.Database });
    await instance.exec("PRAGMA journal_mode=WAL");
    await instance.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        source_id TEXT NOT NULL,
        content TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        embedding_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        UNIQUE (source_id, content_hash)
      );
    `);

    this.db = instance;
    return instance;
  }

  /**
   * Closest documents to `query`, ascending by distance. Failures propagate:
   * the retriever turns them into provider errors.
   */
  async nearestNeighbors(query: string, k: number): Promise<NeighborMatch[]> {
    if (k <= 0) return [];
    const database = await this.getDb();
    const rows = await database.all<DocumentRow[]>(
      "SELECT content, metadata_json, embedding_json FROM documents",
    );
    if (rows.length === 0) return [];

    const [queryEmbedding] = await this.embed([query]);
    if (!queryEmbedding) {
      throw new Error("Embedder returned no vector for the query");
    }
    const target = l2Normalize(queryEmbedding);

    const matches: NeighborMatch[] = [];
    for (const row of rows) {
      const metadata = MetadataSchema.safeParse(parseStoredJson(row.metadata_json));
      const embedding = EmbeddingSchema.safeParse(parseStoredJson(row.embedding_json));
      if (!metadata.success || !embedding.success) {
        this.logger.warn("Skipping document with malformed stored metadata or embedding");
        continue;
      }
      matches.push({
        content: row.content,
        metadata: metadata.data,
        distance: euclideanDistance(target, embedding.data),
      });
    }

    matches.sort((a, b) => a.distance - b.distance);
    return matches.slice(0, k);
  }

  add(items: IndexedDocument[]): Promise<boolean> {
    const run = this.writeQueue.then(() => this.insertBatch(items));
    this.writeQueue = run;
    return run;
  }

  async count(): Promise<number> {
    const database = await this.getDb();
    const row = await database.get<{ count: number }>("SELECT COUNT(*) as count FROM documents");
    return row?.count ?? 0;
  }

  async close(): Promise<void> {
    await this.writeQueue;
    if (this.db) {
      await this.db.close();
      this.db = null;
      this.dbPromise = null;
    }
  }

  private async insertBatch(items: IndexedDocument[]): Promise<boolean> {
    if (items.length === 0) return true;

    let database: Database;
    let embeddings: number[][];
    try {
      database = await this.getDb();
      embeddings = await this.embed(items.map((item) => item.content));
    } catch (err) {
      this.logger.error(`Failed to prepare ${items.length} documents for indexing`, err);
      return false;
    }
    if (embeddings.length !== items.length) {
      this.logger.error(`Embedder returned ${embeddings.length} vectors for ${items.length} documents`);
      return false;
    }

    const createdAt = new Date().toISOString();
    try {
      await database.exec("BEGIN");
      let inserted = 0;
      for (let i = 0; i < items.length; i++) {
        const { content, metadata } = items[i];
        const stored: DocumentMetadata = { ...metadata, addedAt: metadata.addedAt ?? createdAt };
        const result = await database.run(
          `INSERT OR IGNORE INTO documents
           (source_id, content, content_hash, metadata_json, embedding_json, created_at)
           VALUES (?, ?, ?, ?, ?, ?)`,
          [
            documentSourceId(metadata),
            content,
            crypto.createHash("sha256").update(content).digest("hex"),
            JSON.stringify(stored),
            JSON.stringify(l2Normalize(embeddings[i])),
            createdAt,
          ],
        );
        inserted += result.changes ?? 0;
      }
      await database.exec("COMMIT");
      this.logger.info(`Indexed ${inserted} of ${items.length} documents (duplicates ignored)`);
      return true;
    } catch (err) {
      this.logger.error("Failed to index documents, rolling back", err);
      await database.exec("ROLLBACK").catch((rollbackErr: unknown) => {
        this.logger.error("Rollback failed", rollbackErr);
      });
      return false;
    }
  }
}
