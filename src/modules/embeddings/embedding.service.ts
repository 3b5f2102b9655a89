import fetch, { Response } from "node-fetch";
import { EmbeddingError, errorMessage } from "../errors/errors";
import { Logger, silentLogger } from "../logger/logger";
import { directCaller, ResilientCaller } from "../resilience/resilient.caller";

export interface EmbeddingProvider {
  /** Maps text to a fixed-length vector. Input over the provider's cap is truncated. */
  embed(text: string): Promise<number[]>;
}

export interface OllamaEmbeddingOptions {
  baseUrl: string;
  model: string;
  maxInputChars: number;
  caller?: ResilientCaller;
  logger?: Logger;
}

export function truncateForEmbedding(text: string, maxInputChars: number): string {
  return text.length > maxInputChars ? text.slice(0, maxInputChars) : text;
}

async function requestEmbedding(
  options: OllamaEmbeddingOptions,
  text: string
): Promise<number[]> {
  let response: Response;
  try {
    response = await fetch(`${options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: options.model,
        prompt: text,
      }),
    });
  } catch (error) {
    throw new EmbeddingError(
      `Ollama embedding request failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (!response.ok) {
    const body = await response.text();
    throw new EmbeddingError(
      `Ollama embedding error (${response.status}): ${body.slice(0, 200)}`
    );
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new EmbeddingError(`Ollama returned invalid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  const embedding =
    typeof data === "object" && data !== null && "embedding" in data
      ? data.embedding
      : undefined;

  if (
    !Array.isArray(embedding) ||
    embedding.length === 0 ||
    !embedding.every((value): value is number => typeof value === "number")
  ) {
    throw new EmbeddingError("Ollama returned an empty embedding.");
  }

  return embedding;
}

/**
 * Embedding provider backed by Ollama's `/api/embeddings` endpoint.
 */
export function createOllamaEmbeddingProvider(
  options: OllamaEmbeddingOptions
): EmbeddingProvider {
  const caller = options.caller ?? directCaller;
  const logger = options.logger ?? silentLogger;

  return {
    async embed(text: string): Promise<number[]> {
      if (!text || text.trim().length === 0) {
        throw new EmbeddingError("Text cannot be empty");
      }

      const input = truncateForEmbedding(text, options.maxInputChars);
      logger.debug("Generating embedding", {
        length: text.length,
        truncated: input.length < text.length,
      });

      return caller.call(() => requestEmbedding(options, input));
    },
  };
}
