import { ExtractionFailure } from "../domain/errors.js";
import { ConceptExtractor } from "../domain/models.js";
import { Chunk, ChunkExtraction } from "../domain/types.js";

/**
 * Runs the extractor over every chunk with at most `concurrency` calls in
 * flight. Results are indexed by chunk; a failed chunk yields `null`.
 */
export async function extractChunks(
  chunks: Chunk[],
  extractor: ConceptExtractor,
  concurrency = 1,
): Promise<Array<ChunkExtraction | null>> {
  if (chunks.length === 0) {
    return [];
  }

  const workers = Math.min(Math.max(1, concurrency), chunks.length);
  const results: Array<ChunkExtraction | null> = new Array(chunks.length).fill(null);
  let cursor = 0;

  const runWorker = async () => {
    while (true) {
      const position = cursor;
      cursor += 1;
      if (position >= chunks.length) {
        return;
      }
      const chunk = chunks[position];
      try {
        results[position] = await extractor.extract(chunk.text);
      } catch (error) {
        console.error(new ExtractionFailure(chunk.index, error).message);
        results[position] = null;
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, () => runWorker()));
  return results;
}
