export interface Chunk {
  index: number;
  text: string;
  /** Word offset of the first word (inclusive). */
  startOffset: number;
  /** Word offset after the last word (exclusive). */
  endOffset: number;
}

export interface DocumentRecord {
  name: string;
  text: string;
  characterCount: number;
  wordCount: number;
  sentenceCount: number;
  chunks: Chunk[];
}

export interface EntityMention {
  text: string;
  label: string;
}

export interface ScoredKeyword {
  text: string;
  score: number;
}

export interface ChunkExtraction {
  entities: EntityMention[];
  keywords: ScoredKeyword[];
  nounPhrases: string[];
}

export type ExtractedSignal =
  | { kind: "entity"; chunkIndex: number; text: string; label: string }
  | { kind: "keyword"; chunkIndex: number; text: string; score: number }
  | { kind: "noun_phrase"; chunkIndex: number; text: string };

export type ConceptSourceKind = ExtractedSignal["kind"];

export interface ConceptRecord {
  canonicalText: string;
  displayText: string;
  sourceKind: ConceptSourceKind;
  label?: string;
  occurrenceCount: number;
  aggregateScore: number;
  firstSeenChunk: number;
}

export interface Question {
  text: string;
  normalizedText: string;
  sourceConcept?: string;
  generationRound: number;
}

export interface QuestionBatch {
  questions: Question[];
  requested: number;
  returnedCount: number;
  shortfall: number;
  round: number;
}

export interface DocumentStats {
  character_count: number;
  word_count: number;
  sentence_count: number;
  chunk_count: number;
  concept_count: number;
  questions_issued: number;
  generation_rounds: number;
  turn_count: number;
}
