import { ContextPassage, PassageMetadata } from "../rag/types";

export interface IndexEntry {
  id: string;
  vector: number[];
  text: string;
  metadata: PassageMetadata;
}

/**
 * Storage for (id, vector, text, metadata) tuples partitioned by collection name.
 *
 * Queries against a collection that does not exist return no passages;
 * callers treat that as "not indexed".
 */
export interface VectorIndex {
  /** Inserts or replaces entries by id. */
  upsert(collection: string, entries: IndexEntry[]): Promise<void>;
  /** Nearest entries by ascending cosine distance, at most `topK`. */
  query(collection: string, vector: number[], topK: number): Promise<ContextPassage[]>;
  count(collection: string): Promise<number>;
  clear(collection: string): Promise<void>;
}

export function cosineDistance(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
