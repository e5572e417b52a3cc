import {
  Chunk,
  ChunkExtraction,
  ConceptRecord,
  ExtractedSignal,
} from "../domain/types.js";
import { canonicalizeConcept, splitWords } from "../utils/text.js";
import { sharedPrefixLength } from "./chunking.js";

export interface AggregationResult {
  concepts: ConceptRecord[];
  chunkTexts: string[];
}

const EMPTY_EXTRACTION: ChunkExtraction = { entities: [], keywords: [], nounPhrases: [] };

/**
 * Merges per-chunk extraction results into document-level concept records.
 * Chunks must be added in document order; a signal that only occurs inside
 * the span a chunk shares with its predecessor is credited to the predecessor,
 * even when the predecessor itself inherited it from the chunk before.
 */
export class ConceptAggregator {
  private readonly records = new Map<string, ConceptRecord>();

  private readonly keysByChunk = new Map<number, Set<string>>();

  private readonly chunks: Chunk[] = [];

  addChunk(chunk: Chunk, extraction: ChunkExtraction | null): void {
    const previous = this.chunks[this.chunks.length - 1];
    if (previous && chunk.index <= previous.index) {
      throw new Error(
        `Chunks must be aggregated in document order (got ${chunk.index} after ${previous.index}).`,
      );
    }
    this.chunks.push(chunk);

    const shared = previous ? sharedPrefixLength([previous, chunk], 1) : 0;
    const previousKeys = previous ? this.keysByChunk.get(previous.index) : undefined;
    const chunkTerms = splitWords(chunk.text).map(canonicalizeConcept);
    const contributed = new Set<string>();
    const seen = new Set<string>();

    for (const signal of toSignals(extraction ?? EMPTY_EXTRACTION, chunk.index)) {
      const canonical = canonicalizeConcept(signal.text);
      if (!canonical) {
        continue;
      }
      const key = recordKey(signal, canonical);
      seen.add(key);

      if (
        !contributed.has(key) &&
        previousKeys?.has(key) &&
        occursOnlyInPrefix(chunkTerms, canonical.split(" "), shared)
      ) {
        continue;
      }

      const existing = this.records.get(key);
      if (!existing) {
        this.records.set(key, createRecord(signal, canonical));
        contributed.add(key);
        continue;
      }

      if (!contributed.has(key)) {
        existing.occurrenceCount += 1;
        contributed.add(key);
      }
      mergeSignal(existing, signal);
    }

    this.keysByChunk.set(chunk.index, seen);
  }

  ranked(): ConceptRecord[] {
    return [...this.records.values()]
      .map((record) => ({ ...record }))
      .sort(compareConcepts);
  }
}

export function aggregateConcepts(
  chunks: Chunk[],
  extractions: Array<ChunkExtraction | null>,
): AggregationResult {
  const aggregator = new ConceptAggregator();
  for (const chunk of chunks) {
    aggregator.addChunk(chunk, extractions[chunk.index] ?? null);
  }

  return {
    concepts: aggregator.ranked(),
    chunkTexts: chunks.map((chunk) => chunk.text),
  };
}

export function compareConcepts(a: ConceptRecord, b: ConceptRecord): number {
  if (b.aggregateScore !== a.aggregateScore) {
    return b.aggregateScore - a.aggregateScore;
  }
  if (b.occurrenceCount !== a.occurrenceCount) {
    return b.occurrenceCount - a.occurrenceCount;
  }
  if (a.firstSeenChunk !== b.firstSeenChunk) {
    return a.firstSeenChunk - b.firstSeenChunk;
  }
  if (a.canonicalText !== b.canonicalText) {
    return a.canonicalText < b.canonicalText ? -1 : 1;
  }
  const aLabel = a.label ?? "";
  const bLabel = b.label ?? "";
  if (aLabel === bLabel) {
    return 0;
  }
  return aLabel < bLabel ? -1 : 1;
}

function toSignals(extraction: ChunkExtraction, chunkIndex: number): ExtractedSignal[] {
  return [
    ...extraction.entities.map((entity) => ({
      kind: "entity" as const,
      chunkIndex,
      text: entity.text,
      label: entity.label,
    })),
    ...extraction.keywords.map((keyword) => ({
      kind: "keyword" as const,
      chunkIndex,
      text: keyword.text,
      score: Number.isFinite(keyword.score) ? keyword.score : 0,
    })),
    ...extraction.nounPhrases.map((text) => ({
      kind: "noun_phrase" as const,
      chunkIndex,
      text,
    })),
  ];
}

function recordKey(signal: ExtractedSignal, canonical: string): string {
  if (signal.kind === "entity") {
    return `entity:${signal.label.toUpperCase()}:${canonical}`;
  }
  return `term:${canonical}`;
}

function createRecord(signal: ExtractedSignal, canonical: string): ConceptRecord {
  const record: ConceptRecord = {
    canonicalText: canonical,
    displayText: signal.text.replace(/\s+/g, " ").trim(),
    sourceKind: signal.kind,
    occurrenceCount: 1,
    aggregateScore: signal.kind === "keyword" ? signal.score : 0,
    firstSeenChunk: signal.chunkIndex,
  };
  if (signal.kind === "entity") {
    record.label = signal.label.toUpperCase();
  }
  return record;
}

function mergeSignal(record: ConceptRecord, signal: ExtractedSignal): void {
  if (signal.kind !== "keyword") {
    return;
  }
  if (record.sourceKind === "noun_phrase") {
    record.sourceKind = "keyword";
    record.aggregateScore = signal.score;
    return;
  }
  record.aggregateScore = Math.max(record.aggregateScore, signal.score);
}

/**
 * True when the term sequence occurs in the chunk and every occurrence ends
 * within the first `prefixLength` words. Terms that cannot be located are
 * treated as occurring outside the prefix.
 */
function occursOnlyInPrefix(
  chunkTerms: string[],
  needle: string[],
  prefixLength: number,
): boolean {
  if (prefixLength <= 0 || needle.length === 0) {
    return false;
  }

  let found = false;
  for (let start = 0; start + needle.length <= chunkTerms.length; start += 1) {
    if (!matchesAt(chunkTerms, needle, start)) {
      continue;
    }
    if (start + needle.length > prefixLength) {
      return false;
    }
    found = true;
  }
  return found;
}

function matchesAt(haystack: string[], needle: string[], start: number): boolean {
  for (let offset = 0; offset < needle.length; offset += 1) {
    if (haystack[start + offset] !== needle[offset]) {
      return false;
    }
  }
  return true;
}
