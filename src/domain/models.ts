import { ChunkExtraction, ConceptRecord } from "./types.js";

/**
 * Lifecycle shared by every model collaborator. Handles are created once per
 * process and passed to the pipeline explicitly.
 */
export interface ModelHandle {
  init(): Promise<void>;
  close(): Promise<void>;
}

export interface ConceptExtractor extends ModelHandle {
  extract(chunkText: string): Promise<ChunkExtraction>;
}

export interface Summarizer extends ModelHandle {
  summarize(text: string, maxWords: number): Promise<string>;
}

export type QuestionSeed =
  | { kind: "concept"; concept: ConceptRecord; context: string }
  | { kind: "chunk"; chunkIndex: number; text: string };

export interface QuestionGenerator extends ModelHandle {
  generate(seed: QuestionSeed, count: number): Promise<string[]>;
}

export interface ModelHandles {
  extractor: ConceptExtractor;
  summarizer: Summarizer;
  questionGenerator: QuestionGenerator;
}
