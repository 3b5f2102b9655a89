import fs from "fs";
import path from "path";
import crypto from "crypto";
import { ChunkingOptions, toChunks } from "../chunker/chunker";
import { EmbeddingProvider } from "../embeddings/embedding.service";
import { errorMessage, ExtractionError } from "../errors/errors";
import { DocumentExtractor } from "../extractor/document.extractor";
import { Logger, silentLogger } from "../logger/logger";
import { Chunk } from "../rag/types";
import { IndexEntry, VectorIndex } from "../vector-db/vector.index";

export interface CorpusIndexerOptions {
  corpusPath: string;
  collection: string;
  sourceTag?: string;
  chunking: ChunkingOptions;
  extractor: DocumentExtractor;
  embedder: EmbeddingProvider;
  index: VectorIndex;
  logger?: Logger;
  /** Entries sent per upsert request. */
  batchSize?: number;
}

export interface IndexCorpusResult {
  chunks: number;
  /** False when an existing index was kept. */
  reindexed: boolean;
}

export interface CollectionStats {
  collectionName: string;
  totalDocuments: number;
  indexed: boolean;
}

export interface CorpusIndexer {
  indexReferenceCorpus(options?: { force?: boolean }): Promise<IndexCorpusResult>;
  getCollectionStats(): Promise<CollectionStats>;
}

const DEFAULT_SOURCE_TAG = "eu_ai_act";
const DEFAULT_BATCH_SIZE = 16;

export function chunkId(chunk: Chunk): string {
  const digest = crypto.createHash("md5").update(chunk.text).digest("hex");
  return `${chunk.sourceTag}_chunk_${chunk.index}_${digest.slice(0, 8)}`;
}

async function readCorpusFile(corpusPath: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(corpusPath);
  } catch (error) {
    throw new ExtractionError(
      "parse_failure",
      `Reference corpus not found at ${corpusPath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

export function createCorpusIndexer(options: CorpusIndexerOptions): CorpusIndexer {
  const logger = options.logger ?? silentLogger;
  const sourceTag = options.sourceTag ?? DEFAULT_SOURCE_TAG;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;

  async function loadChunks(): Promise<Chunk[]> {
    const bytes = await readCorpusFile(options.corpusPath);
    const extracted = await options.extractor.extract({
      fileName: path.basename(options.corpusPath),
      bytes,
    });
    const text = options.extractor.clean(extracted.rawText);
    const chunks = toChunks(text, sourceTag, options.chunking);

    if (chunks.length === 0) {
      throw new ExtractionError(
        "parse_failure",
        `No chunks could be produced from ${options.corpusPath}`
      );
    }
    return chunks;
  }

  return {
    async indexReferenceCorpus({ force = false } = {}) {
      const existing = await options.index.count(options.collection);
      if (existing > 0 && !force) {
        logger.info(`Collection "${options.collection}" already has ${existing} documents`);
        return { chunks: existing, reindexed: false };
      }

      const chunks = await loadChunks();
      logger.info(`Indexing ${chunks.length} chunks from ${options.corpusPath}`);

      // Embed everything before the first write so a failure leaves the collection untouched.
      const entries: IndexEntry[] = [];
      for (const chunk of chunks) {
        entries.push({
          id: chunkId(chunk),
          vector: await options.embedder.embed(chunk.text),
          text: chunk.text,
          metadata: {
            chunkIndex: chunk.index,
            source: sourceTag,
            totalChunks: chunks.length,
          },
        });
      }

      if (existing > 0) {
        await options.index.clear(options.collection);
      }
      for (let start = 0; start < entries.length; start += batchSize) {
        await options.index.upsert(options.collection, entries.slice(start, start + batchSize));
      }

      logger.info("Indexing complete.", { chunks: chunks.length });
      return { chunks: chunks.length, reindexed: true };
    },

    async getCollectionStats() {
      const totalDocuments = await options.index.count(options.collection);
      return {
        collectionName: options.collection,
        totalDocuments,
        indexed: totalDocuments > 0,
      };
    },
  };
}
