import { Chunk } from "../rag/types";

export interface ChunkingOptions {
  targetSize: number;
  overlap: number;
}

export const DEFAULT_CHUNKING: ChunkingOptions = {
  targetSize: 1000,
  overlap: 200,
};

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

function splitSentences(text: string): string[] {
  return text.split(SENTENCE_BOUNDARY).filter((sentence) => sentence.length > 0);
}

/**
 * Trailing sentences of `sentences` whose summed length stays within `overlap`,
 * in original order.
 */
function takeOverlap(sentences: string[], overlap: number): string[] {
  const kept: string[] = [];
  let size = 0;
  for (let i = sentences.length - 1; i >= 0; i--) {
    const length = sentences[i].length;
    if (size + length > overlap) break;
    kept.unshift(sentences[i]);
    size += length;
  }
  return kept;
}

function sumLengths(sentences: string[]): number {
  return sentences.reduce((sum, sentence) => sum + sentence.length, 0);
}

/**
 * Splits text into overlapping chunks along sentence boundaries.
 *
 * Sizes are measured as the summed length of the sentences in a chunk. A chunk
 * is closed when the next sentence would push it past `targetSize`; the next
 * chunk then starts with as many trailing sentences as fit in `overlap`.
 * A sentence longer than `targetSize` is never split and becomes an oversized
 * chunk of its own (plus any overlap carried into it).
 */
export function chunkText(
  text: string,
  targetSize: number,
  overlap: number
): string[] {
  if (!text || text.trim().length === 0) return [];

  const chunks: string[] = [];
  let current: string[] = [];
  let currentSize = 0;

  for (const sentence of splitSentences(text)) {
    if (currentSize + sentence.length > targetSize && current.length > 0) {
      const closed = current.join(" ");
      chunks.push(closed);

      if (closed.length > overlap) {
        current = takeOverlap(current, overlap);
        currentSize = sumLengths(current);
      } else {
        current = [];
        currentSize = 0;
      }
    }

    current.push(sentence);
    currentSize += sentence.length;
  }

  if (current.length > 0) {
    chunks.push(current.join(" "));
  }

  return chunks;
}

export function toChunks(
  text: string,
  sourceTag: string,
  options: ChunkingOptions = DEFAULT_CHUNKING
): Chunk[] {
  return chunkText(text, options.targetSize, options.overlap).map(
    (chunkTextValue, index) => ({
      text: chunkTextValue,
      index,
      sourceTag,
    })
  );
}
