import { IndexError } from "../errors/errors";
import { ContextPassage } from "../rag/types";
import { cosineDistance, IndexEntry, VectorIndex } from "./vector.index";

/**
 * Process-local vector index with brute-force cosine search.
 * Each query scores a copy of the collection taken when it starts.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly collections = new Map<string, Map<string, IndexEntry>>();

  async upsert(collection: string, entries: IndexEntry[]): Promise<void> {
    if (!collection || collection.trim().length === 0) {
      throw new IndexError("Collection name cannot be empty");
    }

    let store = this.collections.get(collection);
    if (!store) {
      store = new Map();
      this.collections.set(collection, store);
    }

    for (const entry of entries) {
      if (entry.vector.length === 0) {
        throw new IndexError(`Entry "${entry.id}" has an empty vector`);
      }
      store.set(entry.id, {
        id: entry.id,
        vector: [...entry.vector],
        text: entry.text,
        metadata: { ...entry.metadata },
      });
    }
  }

  async query(
    collection: string,
    vector: number[],
    topK: number
  ): Promise<ContextPassage[]> {
    const store = this.collections.get(collection);
    if (!store || store.size === 0 || topK <= 0) return [];

    const snapshot = Array.from(store.values());

    return snapshot
      .map((entry) => ({
        id: entry.id,
        text: entry.text,
        distance: cosineDistance(vector, entry.vector),
        metadata: { ...entry.metadata },
      }))
      .sort((a, b) => a.distance - b.distance || a.id.localeCompare(b.id))
      .slice(0, topK);
  }

  async count(collection: string): Promise<number> {
    return this.collections.get(collection)?.size ?? 0;
  }

  async clear(collection: string): Promise<void> {
    this.collections.delete(collection);
  }
}
