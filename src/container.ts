/**
 * Dependency wiring.
 * Builds every service from an AppConfig. Tests pass their own embedder,
 * model client and index through `overrides` so nothing leaves the process.
 */

import { AppConfig } from "./config/app.config";
import {
  createOllamaEmbeddingProvider,
  EmbeddingProvider,
} from "./modules/embeddings/embedding.service";
import {
  documentExtractor,
  DocumentExtractor,
} from "./modules/extractor/document.extractor";
import { JobOrchestrator } from "./modules/jobs/job.orchestrator";
import { InMemoryJobStore, JobStore } from "./modules/jobs/job.store";
import {
  AnalysisModelClient,
  createOllamaAnalysisClient,
} from "./modules/llm/analysis.client";
import { createOllamaClient } from "./modules/llm/ollama.service";
import { createLogger, Logger } from "./modules/logger/logger";
import { createRetriever } from "./modules/rag/retriever";
import { createResilientCaller } from "./modules/resilience/resilient.caller";
import { ChromaVectorIndex } from "./modules/vector-db/chroma.service";
import { InMemoryVectorIndex } from "./modules/vector-db/memory.index";
import { VectorIndex } from "./modules/vector-db/vector.index";
import { CorpusIndexer, createCorpusIndexer } from "./modules/vector/corpus.indexer";

export interface Container {
  config: AppConfig;
  logger: Logger;
  index: VectorIndex;
  corpusIndexer: CorpusIndexer;
  orchestrator: JobOrchestrator;
}

export interface ContainerOverrides {
  logger?: Logger;
  embedder?: EmbeddingProvider;
  analysisClient?: AnalysisModelClient;
  index?: VectorIndex;
  store?: JobStore;
  extractor?: DocumentExtractor;
}

function createVectorIndex(config: AppConfig, logger: Logger): VectorIndex {
  if (config.vectorDb.type === "memory") {
    return new InMemoryVectorIndex();
  }
  return new ChromaVectorIndex({
    baseUrl: config.vectorDb.chromaBaseUrl,
    logger: logger.child("chroma"),
  });
}

export function createContainer(
  config: AppConfig,
  overrides: ContainerOverrides = {}
): Container {
  const logger = overrides.logger ?? createLogger(config.logLevel);

  const retryLogger = logger.child("retry");
  const caller = createResilientCaller({
    attempts: config.retry.attempts,
    baseDelayMs: config.retry.baseDelayMs,
    onRetry: ({ attempt, delayMs, error }) => {
      retryLogger.warn(
        `Call failed (attempt ${attempt + 1}/${config.retry.attempts}), retrying in ${delayMs}ms`,
        { error }
      );
    },
  });

  const embedder =
    overrides.embedder ??
    createOllamaEmbeddingProvider({
      baseUrl: config.ollama.baseUrl,
      model: config.ollama.embeddingModel,
      maxInputChars: config.ollama.embeddingMaxChars,
      caller,
      logger: logger.child("embeddings"),
    });

  const analysisClient =
    overrides.analysisClient ??
    createOllamaAnalysisClient(
      createOllamaClient({ baseUrl: config.ollama.baseUrl, caller }),
      {
        model: config.ollama.model,
        judgeModel: config.ollama.judgeModel,
        logger: logger.child("llm"),
      }
    );

  const index = overrides.index ?? createVectorIndex(config, logger);
  const extractor = overrides.extractor ?? documentExtractor;

  const corpusIndexer = createCorpusIndexer({
    corpusPath: config.referenceCorpusPath,
    collection: config.vectorDb.collection,
    chunking: config.chunking,
    extractor,
    embedder,
    index,
    logger: logger.child("indexer"),
  });

  const retriever = createRetriever({
    embedder,
    index,
    collection: config.vectorDb.collection,
    topK: config.retrieval.topK,
    logger: logger.child("retriever"),
  });

  const orchestrator = new JobOrchestrator({
    store: overrides.store ?? new InMemoryJobStore(),
    extractor,
    retriever,
    analysisClient,
    chunking: config.chunking,
    topK: config.retrieval.topK,
    enabledMetrics: config.evaluation.metrics,
    judgeEnabled: config.evaluation.judgeEnabled,
    logger: logger.child("jobs"),
  });

  return { config, logger, index, corpusIndexer, orchestrator };
}
