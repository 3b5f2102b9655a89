import { EmbeddingProvider } from "../embeddings/embedding.service";
import { Logger, silentLogger } from "../logger/logger";
import { VectorIndex } from "../vector-db/vector.index";
import { ContextPassage, RetrievalOptions } from "./types";

export const ANCHOR_TERMS: readonly string[] = [
  "AI system",
  "machine learning",
  "high risk AI",
  "prohibited AI practices",
  "artificial intelligence regulation",
];

const QUERY_PREFIX_CHARS = 500;
const DEFAULT_TOP_K = 5;

/**
 * Leading slice of the document followed by the regulatory anchor terms, so
 * the query leans towards the parts of the corpus that classify AI systems.
 */
export function buildRetrievalQuery(documentText: string): string {
  return `${documentText.slice(0, QUERY_PREFIX_CHARS)} ${ANCHOR_TERMS.join(" ")}`;
}

export function buildContextBlock(passages: readonly ContextPassage[]): string {
  return passages
    .map((passage, index) => `[Context ${index + 1}]\n${passage.text}`)
    .join("\n\n");
}

export interface RetrieverOptions {
  embedder: EmbeddingProvider;
  index: VectorIndex;
  collection: string;
  topK?: number;
  logger?: Logger;
}

export interface Retriever {
  retrieve(documentText: string, options?: RetrievalOptions): Promise<ContextPassage[]>;
}

export function createRetriever(options: RetrieverOptions): Retriever {
  const logger = options.logger ?? silentLogger;
  const defaultTopK = options.topK ?? DEFAULT_TOP_K;

  return {
    async retrieve(documentText, retrieval = {}) {
      const topK = retrieval.topK ?? defaultTopK;
      const query = buildRetrievalQuery(documentText);

      const startEmbedding = Date.now();
      const vector = await options.embedder.embed(query);
      const embeddingMs = Date.now() - startEmbedding;

      const startRetrieval = Date.now();
      const passages = await options.index.query(options.collection, vector, topK);
      const retrievalMs = Date.now() - startRetrieval;

      logger.info(`Retrieved ${passages.length} context passages`, {
        topK,
        embeddingMs,
        retrievalMs,
      });
      passages.slice(0, 3).forEach((passage, index) => {
        logger.debug(
          `Context ${index + 1} (distance ${passage.distance.toFixed(4)}): ${passage.text.slice(0, 100)}`
        );
      });

      return passages;
    },
  };
}
