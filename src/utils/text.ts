import { readFileSync } from "node:fs";

const WORD_REGEX = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*/gu;

const STOPWORDS: ReadonlySet<string> = new Set(
  JSON.parse(
    readFileSync(new URL("../../data/stopwords.json", import.meta.url), "utf-8"),
  ) as string[],
);

const LEADING_ARTICLE = /^(?:the|a|an)\s+/;

const PLURAL_EXCEPTIONS = new Set(["series", "species", "news", "physics", "mathematics"]);

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

/**
 * Collapses whitespace to single spaces and drops symbols outside ordinary
 * prose punctuation. Chunking, statistics and sentence splitting all run on
 * this form.
 */
export function cleanText(text: string): string {
  return normalizeText(text)
    .replace(/[^\p{L}\p{N}_\s.,!?;:()'’\-]/gu, " ")
    .replace(/\s+/g, " ")
    .replace(/\s+([.,!?;:])/g, "$1")
    .replace(/\.{4,}/g, "...")
    .trim();
}

export function splitWords(text: string): string[] {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter(Boolean);
}

export function truncateWords(text: string, maxWords: number): string {
  const words = splitWords(text);
  if (words.length <= maxWords) {
    return words.join(" ");
  }
  return words.slice(0, Math.max(0, maxWords)).join(" ");
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_REGEX) ?? [];
}

export function isStopword(word: string): boolean {
  return STOPWORDS.has(word.toLowerCase());
}

export function foldPlural(word: string): string {
  if (word.length <= 3 || PLURAL_EXCEPTIONS.has(word)) {
    return word;
  }
  if (word.endsWith("ies") && word.length > 4) {
    return `${word.slice(0, -3)}y`;
  }
  if (/(?:sses|ches|shes|xes|zes)$/.test(word)) {
    return word.slice(0, -2);
  }
  if (/(?:ss|us|is)$/.test(word)) {
    return word;
  }
  if (word.endsWith("s")) {
    return word.slice(0, -1);
  }
  return word;
}

/** Merge key for concepts: case, whitespace, edge punctuation, articles and plurals folded. */
export function canonicalizeConcept(text: string): string {
  const folded = text
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, "")
    .replace(LEADING_ARTICLE, "");

  return folded
    .split(" ")
    .filter(Boolean)
    .map(foldPlural)
    .join(" ");
}

export function normalizeQuestion(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Jaccard ratio of the two texts' word sets. */
export function tokenOverlapRatio(left: string, right: string): number {
  const leftTokens = new Set(splitWords(left));
  const rightTokens = new Set(splitWords(right));
  if (leftTokens.size === 0 && rightTokens.size === 0) {
    return 1;
  }

  let intersection = 0;
  for (const token of leftTokens) {
    if (rightTokens.has(token)) {
      intersection += 1;
    }
  }

  const union = leftTokens.size + rightTokens.size - intersection;
  return union === 0 ? 0 : intersection / union;
}
