import path from "path";
import {
  isSupportedExtension,
  SUPPORTED_EXTENSIONS,
} from "../modules/extractor/document.kinds";
import { isLogLevel, LogLevel } from "../modules/logger/logger";

export type VectorDbType = "chroma" | "memory";

export type EvaluationMetricName =
  | "faithfulness"
  | "answer_relevance"
  | "context_precision"
  | "context_recall";

export const ALL_EVALUATION_METRICS: readonly EvaluationMetricName[] = [
  "faithfulness",
  "answer_relevance",
  "context_precision",
  "context_recall",
];

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  ollama: {
    baseUrl: string;
    model: string;
    judgeModel: string;
    embeddingModel: string;
    embeddingMaxChars: number;
  };
  vectorDb: {
    type: VectorDbType;
    chromaBaseUrl: string;
    collection: string;
  };
  referenceCorpusPath: string;
  chunking: {
    targetSize: number;
    overlap: number;
  };
  retrieval: {
    topK: number;
  };
  evaluation: {
    metrics: EvaluationMetricName[];
    judgeEnabled: boolean;
  };
  retry: {
    attempts: number;
    baseDelayMs: number;
  };
  upload: {
    allowedExtensions: string[];
    maxFileSizeMb: number;
  };
}

type Env = Record<string, string | undefined>;

function safeNumber(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return value !== undefined && value.trim() !== "" && Number.isFinite(n) ? n : fallback;
}

function positiveInt(value: string | undefined, fallback: number): number {
  const n = Math.floor(safeNumber(value, fallback));
  return n > 0 ? n : fallback;
}

function safeBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return fallback;
}

function csv(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);
}

function isMetricName(value: string): value is EvaluationMetricName {
  return ALL_EVALUATION_METRICS.some((metric) => metric === value);
}

function parseMetrics(value: string | undefined): EvaluationMetricName[] {
  const parts = csv(value);
  if (!parts) return [...ALL_EVALUATION_METRICS];
  return parts.filter(isMetricName);
}

/** Keeps only extensions the extractor reads; falls back to all of them. */
function parseAllowedExtensions(value: string | undefined): string[] {
  const allowed = (csv(value) ?? [])
    .map((extension) => extension.replace(/^\./, ""))
    .filter(isSupportedExtension);
  return allowed.length > 0 ? allowed : [...SUPPORTED_EXTENSIONS];
}

function parseVectorDbType(value: string | undefined): VectorDbType {
  return value?.trim().toLowerCase() === "memory" ? "memory" : "chroma";
}

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: positiveInt(env.PORT, 4000),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    ollama: {
      baseUrl: env.OLLAMA_BASE_URL ?? "http://localhost:11434",
      model: env.OLLAMA_MODEL ?? "llama3.2",
      judgeModel: env.OLLAMA_JUDGE_MODEL ?? env.OLLAMA_MODEL ?? "llama3.2",
      embeddingModel: env.EMBEDDING_MODEL ?? "nomic-embed-text",
      embeddingMaxChars: positiveInt(env.EMBEDDING_MAX_CHARS, 8000),
    },
    vectorDb: {
      type: parseVectorDbType(env.VECTOR_DB_TYPE),
      chromaBaseUrl: env.CHROMA_BASE_URL ?? "http://localhost:8000",
      collection: env.CHROMA_COLLECTION ?? "eu_ai_act",
    },
    referenceCorpusPath: path.resolve(
      env.REFERENCE_CORPUS_PATH ?? "./data/EU_AI_ACT.pdf"
    ),
    chunking: {
      targetSize: positiveInt(env.CHUNK_SIZE, 1000),
      overlap: Math.max(0, Math.floor(safeNumber(env.CHUNK_OVERLAP, 200))),
    },
    retrieval: {
      topK: positiveInt(env.RETRIEVAL_TOP_K, 5),
    },
    evaluation: {
      metrics: parseMetrics(env.EVAL_METRICS),
      judgeEnabled: safeBoolean(env.LLM_JUDGE_ENABLED, true),
    },
    retry: {
      attempts: positiveInt(env.RETRY_ATTEMPTS, 3),
      baseDelayMs: Math.max(0, safeNumber(env.RETRY_BASE_DELAY_MS, 2000)),
    },
    upload: {
      allowedExtensions: parseAllowedExtensions(env.ALLOWED_EXTENSIONS),
      maxFileSizeMb: safeNumber(env.MAX_FILE_SIZE_MB, 50),
    },
  };
}
