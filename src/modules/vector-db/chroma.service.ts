import fetch, { RequestInit, Response } from "node-fetch";
import { errorMessage, IndexError } from "../errors/errors";
import { Logger, silentLogger } from "../logger/logger";
import { ContextPassage, PassageMetadata } from "../rag/types";
import { IndexEntry, VectorIndex } from "./vector.index";

// Chroma v2 multi-tenant configuration
const TENANT = "default_tenant";
const DATABASE = "default_database";

/**
 * Interface for collection response
 */
export interface CollectionInfo {
  id: string;
  name: string;
}

export interface ChromaOptions {
  baseUrl: string;
  tenant?: string;
  database?: string;
  logger?: Logger;
}

interface ChromaQueryResponse {
  ids?: string[][];
  documents?: (string | null)[][];
  distances?: (number | null)[][];
  metadatas?: (PassageMetadata | null)[][];
}

function isCollectionInfo(value: unknown): value is CollectionInfo {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    "name" in value &&
    typeof value.id === "string" &&
    typeof value.name === "string"
  );
}

/**
 * VectorIndex over the Chroma v2 REST API. Collections use cosine space so
 * returned distances are cosine distances.
 */
export class ChromaVectorIndex implements VectorIndex {
  private readonly apiBase: string;
  private readonly tenantBase: string;
  private readonly database: string;
  private readonly logger: Logger;
  // collection name -> collection id
  private readonly collectionCache = new Map<string, string>();
  private databaseReady = false;

  constructor(options: ChromaOptions) {
    const tenant = options.tenant ?? TENANT;
    this.database = options.database ?? DATABASE;
    this.tenantBase = `${options.baseUrl}/api/v2/tenants/${tenant}`;
    this.apiBase = `${this.tenantBase}/databases/${this.database}`;
    this.logger = options.logger ?? silentLogger;
  }

  private async request(url: string, init?: RequestInit): Promise<Response> {
    try {
      return await fetch(url, init);
    } catch (error) {
      throw new IndexError(`ChromaDB is not reachable: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async postJson(url: string, body: unknown): Promise<Response> {
    return this.request(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });
  }

  private async failWith(action: string, response: Response): Promise<never> {
    const errorText = await response.text();
    throw new IndexError(`Failed to ${action}: ${errorText}`);
  }

  /**
   * Ensure the database exists in Chroma v2
   * Creates it if it doesn't exist
   */
  private async ensureDatabaseExists(): Promise<void> {
    if (this.databaseReady) return;

    const listResponse = await this.request(`${this.tenantBase}/databases`);
    if (!listResponse.ok) {
      await this.failWith("list databases", listResponse);
    }

    const databases = (await listResponse.json()) as Array<{ name: string }>;
    if (!databases.some((db) => db.name === this.database)) {
      this.logger.info(`Database "${this.database}" not found. Creating it...`);
      const createResponse = await this.postJson(`${this.tenantBase}/databases`, {
        name: this.database,
      });
      if (!createResponse.ok) {
        await this.failWith("create database", createResponse);
      }
    }

    this.databaseReady = true;
  }

  /**
   * Look up a collection without creating it.
   */
  private async findCollection(name: string): Promise<CollectionInfo | undefined> {
    const cachedId = this.collectionCache.get(name);
    if (cachedId) return { id: cachedId, name };

    await this.ensureDatabaseExists();

    const listResponse = await this.request(`${this.apiBase}/collections`);
    if (!listResponse.ok) {
      await this.failWith("list collections", listResponse);
    }

    const json: unknown = await listResponse.json();

    // Handle both array and object response formats
    const collections: unknown[] = Array.isArray(json)
      ? json
      : typeof json === "object" &&
          json !== null &&
          "collections" in json &&
          Array.isArray(json.collections)
        ? json.collections
        : [];

    const existing = collections
      .filter(isCollectionInfo)
      .find((collection) => collection.name === name);

    if (existing) {
      this.collectionCache.set(name, existing.id);
    }
    return existing;
  }

  private async getOrCreateCollection(name: string): Promise<CollectionInfo> {
    const existing = await this.findCollection(name);
    if (existing) return existing;

    const createResponse = await this.postJson(`${this.apiBase}/collections`, {
      name,
      metadata: { "hnsw:space": "cosine" },
    });
    if (!createResponse.ok) {
      await this.failWith("create collection", createResponse);
    }

    const created: unknown = await createResponse.json();
    if (!isCollectionInfo(created)) {
      throw new IndexError(`Unexpected response when creating collection "${name}"`);
    }

    this.collectionCache.set(name, created.id);
    this.logger.info(`✅ Collection "${name}" created (id: ${created.id})`);
    return created;
  }

  async upsert(collection: string, entries: IndexEntry[]): Promise<void> {
    if (entries.length === 0) return;

    const info = await this.getOrCreateCollection(collection);
    const response = await this.postJson(
      `${this.apiBase}/collections/${info.id}/upsert`,
      {
        ids: entries.map((entry) => entry.id),
        embeddings: entries.map((entry) => entry.vector),
        documents: entries.map((entry) => entry.text),
        metadatas: entries.map((entry) => entry.metadata),
      }
    );

    if (!response.ok) {
      await this.failWith("upsert documents", response);
    }

    this.logger.debug(`Upserted ${entries.length} documents into "${collection}"`);
  }

  async query(
    collection: string,
    vector: number[],
    topK: number
  ): Promise<ContextPassage[]> {
    if (topK <= 0) return [];

    const info = await this.findCollection(collection);
    if (!info) {
      this.logger.warn(`Collection "${collection}" does not exist; returning no context`);
      return [];
    }

    const response = await this.postJson(
      `${this.apiBase}/collections/${info.id}/query`,
      {
        query_embeddings: [vector],
        n_results: topK,
        include: ["documents", "distances", "metadatas"],
      }
    );

    if (!response.ok) {
      await this.failWith("perform similarity search", response);
    }

    const data = (await response.json()) as ChromaQueryResponse;
    const ids = data.ids?.[0] ?? [];

    return ids
      .map((id, index) => ({
        id,
        text: data.documents?.[0]?.[index] ?? "",
        distance: data.distances?.[0]?.[index] ?? 1,
        metadata: data.metadatas?.[0]?.[index] ?? {},
      }))
      .sort((a, b) => a.distance - b.distance);
  }

  async count(collection: string): Promise<number> {
    const info = await this.findCollection(collection);
    if (!info) return 0;

    const response = await this.request(
      `${this.apiBase}/collections/${info.id}/count`
    );
    if (!response.ok) {
      await this.failWith("get collection count", response);
    }

    return Number(await response.json());
  }

  async clear(collection: string): Promise<void> {
    const info = await this.findCollection(collection);
    this.collectionCache.delete(collection);
    if (!info) return;

    const response = await this.request(
      `${this.apiBase}/collections/${encodeURIComponent(collection)}`,
      { method: "DELETE" }
    );
    if (!response.ok) {
      await this.failWith("delete collection", response);
    }

    this.logger.info(`Collection "${collection}" cleared`);
  }
}
