/**
 * Vector Index
 *
 * Capability consumed by the hybrid retriever for local evidence lookup and
 * for persisting newly found web evidence.
 *
 * @module vector-index
 */

export type DocumentOrigin = "LOCAL" | "WEB";

export interface DocumentMetadata {
  /** File path, document title or URL the content came from */
  source: string;
  url?: string;
  origin?: DocumentOrigin;
  /** ISO timestamp set by the index when the document is stored */
  addedAt?: string;
}

export interface IndexedDocument {
  content: string;
  metadata: DocumentMetadata;
}

export interface NeighborMatch extends IndexedDocument {
  /** Similarity distance, lower = closer */
  distance: number;
}

export interface VectorIndex {
  nearestNeighbors(query: string, k: number): Promise<NeighborMatch[]>;
  /** Resolves false when the batch could not be stored; never rejects. */
  add(items: IndexedDocument[]): Promise<boolean>;
  count(): Promise<number>;
}

/**
 * Source identity of a document: the URL when present, else the source.
 */
export function documentSourceId(metadata: DocumentMetadata): string {
  return metadata.url?.trim() || metadata.source.trim();
}
