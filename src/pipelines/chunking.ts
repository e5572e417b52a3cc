import { ChunkingConfig } from "../config/env.js";
import { ConfigurationError } from "../domain/errors.js";
import { Chunk } from "../domain/types.js";
import { splitWords } from "../utils/text.js";

export const DEFAULT_CHUNK_SIZE = 512;
export const DEFAULT_OVERLAP = 128;

export function assertChunkingConfig({ chunkSize, overlap }: ChunkingConfig): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}.`);
  }
  if (!Number.isInteger(overlap) || overlap <= 0) {
    throw new ConfigurationError(`overlap must be a positive integer, got ${overlap}.`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(
      `overlap (${overlap}) must be smaller than chunkSize (${chunkSize}).`,
    );
  }
}

/**
 * Splits normalized text into word windows of `chunkSize` words, each
 * starting `chunkSize - overlap` words after the previous one. The last
 * window may be shorter than `chunkSize`.
 */
export function chunkDocument(
  text: string,
  config: ChunkingConfig = { chunkSize: DEFAULT_CHUNK_SIZE, overlap: DEFAULT_OVERLAP },
): Chunk[] {
  assertChunkingConfig(config);
  const { chunkSize, overlap } = config;
  const words = splitWords(text);

  if (words.length <= chunkSize) {
    return [{ index: 0, text: words.join(" "), startOffset: 0, endOffset: words.length }];
  }

  const step = chunkSize - overlap;
  const chunks: Chunk[] = [];
  let start = 0;

  while (start < words.length) {
    const end = Math.min(start + chunkSize, words.length);
    chunks.push({
      index: chunks.length,
      text: words.slice(start, end).join(" "),
      startOffset: start,
      endOffset: end,
    });

    if (end >= words.length) {
      break;
    }
    start += step;
  }

  return chunks;
}

export function expectedChunkCount(wordCount: number, { chunkSize, overlap }: ChunkingConfig): number {
  return Math.max(1, Math.ceil((wordCount - overlap) / (chunkSize - overlap)));
}

/** Rebuilds the source text from each chunk's non-overlapping prefix. */
export function reconstructFromChunks(chunks: Chunk[]): string {
  const words: string[] = [];
  chunks.forEach((chunk, position) => {
    const chunkWords = splitWords(chunk.text);
    const next = chunks[position + 1];
    const ownWords = next ? next.startOffset - chunk.startOffset : chunkWords.length;
    words.push(...chunkWords.slice(0, ownWords));
  });
  return words.join(" ");
}

/** Number of leading words a chunk shares with its predecessor. */
export function sharedPrefixLength(chunks: Chunk[], index: number): number {
  const chunk = chunks[index];
  const previous = chunks[index - 1];
  if (!chunk || !previous) {
    return 0;
  }
  return Math.max(0, previous.endOffset - chunk.startOffset);
}
