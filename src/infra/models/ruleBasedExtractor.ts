import { ConceptExtractor } from "../../domain/models.js";
import { ChunkExtraction, EntityMention, ScoredKeyword } from "../../domain/types.js";
import { isStopword, splitSentences, tokenize } from "../../utils/text.js";

const DEFAULT_TOP_KEYWORDS = 10;
const MAX_NOUN_PHRASES = 20;
const BIGRAM_WEIGHT = 1.5;

const CAPITALIZED_SPAN = /\b[A-Z][\p{L}'-]*(?:\s+(?:of\s+|de\s+|and\s+)?[A-Z][\p{L}'-]*)*/gu;
const ACRONYM = /\b[A-Z]{2,6}s?\b/g;
const YEAR = /\b(1[0-9]{3}|20[0-9]{2})\b/g;

export interface RuleBasedExtractorOptions {
  topKeywords?: number;
}

/**
 * Extraction without a model server: capitalized spans as entities,
 * term frequency for keywords and stopword-delimited runs as noun phrases.
 */
export class RuleBasedExtractor implements ConceptExtractor {
  private readonly topKeywords: number;

  constructor(options: RuleBasedExtractorOptions = {}) {
    this.topKeywords = options.topKeywords ?? DEFAULT_TOP_KEYWORDS;
  }

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async extract(chunkText: string): Promise<ChunkExtraction> {
    const sentences = splitSentences(chunkText);
    return {
      entities: extractEntities(sentences),
      keywords: extractKeywords(sentences, this.topKeywords),
      nounPhrases: extractNounPhrases(sentences),
    };
  }
}

export function extractEntities(sentences: string[]): EntityMention[] {
  const entities: EntityMention[] = [];
  const seen = new Set<string>();

  const push = (text: string, label: string) => {
    const key = `${label}:${text.toLowerCase()}`;
    if (!seen.has(key)) {
      seen.add(key);
      entities.push({ text, label });
    }
  };

  for (const sentence of sentences) {
    for (const match of sentence.matchAll(YEAR)) {
      push(match[0], "DATE");
    }
    for (const match of sentence.matchAll(ACRONYM)) {
      push(match[0].replace(/s$/, ""), "ACRONYM");
    }
    for (const match of sentence.matchAll(CAPITALIZED_SPAN)) {
      const words = match[0].split(/\s+/);
      while (words.length > 0 && isStopword(words[0])) {
        words.shift();
      }
      const atSentenceStart = match.index === 0 && words.length === match[0].split(/\s+/).length;
      if (words.length === 0 || (atSentenceStart && words.length === 1)) {
        continue;
      }
      const text = words.join(" ");
      if (/^[A-Z]{2,6}s?$/.test(text)) {
        continue;
      }
      push(text, "NAME");
    }
  }

  return entities;
}

export function extractKeywords(sentences: string[], topN: number): ScoredKeyword[] {
  const weights = new Map<string, number>();
  const firstSeen = new Map<string, number>();
  let position = 0;

  const add = (term: string, weight: number) => {
    weights.set(term, (weights.get(term) ?? 0) + weight);
    if (!firstSeen.has(term)) {
      firstSeen.set(term, position);
    }
    position += 1;
  };

  for (const sentence of sentences) {
    const words = tokenize(sentence);
    for (let i = 0; i < words.length; i += 1) {
      if (!isContentWord(words[i])) {
        continue;
      }
      add(words[i], 1);
      if (i + 1 < words.length && isContentWord(words[i + 1])) {
        add(`${words[i]} ${words[i + 1]}`, BIGRAM_WEIGHT);
      }
    }
  }

  const max = Math.max(0, ...weights.values());
  if (max === 0) {
    return [];
  }

  return [...weights.entries()]
    .sort(
      (a, b) =>
        b[1] - a[1] || (firstSeen.get(a[0]) ?? 0) - (firstSeen.get(b[0]) ?? 0),
    )
    .slice(0, topN)
    .map(([text, weight]) => ({ text, score: Number((weight / max).toFixed(4)) }));
}

/** Runs of two to four content words, in order of first appearance. */
export function extractNounPhrases(sentences: string[]): string[] {
  const phrases: string[] = [];
  const seen = new Set<string>();

  for (const sentence of sentences) {
    for (const segment of sentence.split(/[,;:()]/)) {
      let run: string[] = [];
      const flush = () => {
        if (run.length >= 2 && run.length <= 4) {
          const phrase = run.join(" ");
          if (!seen.has(phrase)) {
            seen.add(phrase);
            phrases.push(phrase);
          }
        }
        run = [];
      };

      for (const word of tokenize(segment)) {
        if (isContentWord(word)) {
          run.push(word);
        } else {
          flush();
        }
      }
      flush();
    }
  }

  return phrases.slice(0, MAX_NOUN_PHRASES);
}

function isContentWord(word: string): boolean {
  return word.length >= 3 && !isStopword(word) && !/^\d+$/.test(word);
}
