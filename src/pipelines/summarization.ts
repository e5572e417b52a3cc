import { describeError } from "../domain/errors.js";
import { Summarizer } from "../domain/models.js";
import { DocumentRecord } from "../domain/types.js";
import { countWords, splitSentences, splitWords, truncateWords } from "../utils/text.js";

const DEFAULT_MIN_WORDS_TO_SUMMARIZE = 30;
const DEFAULT_MAX_REDUCE_DEPTH = 4;
const MIN_TARGET_WORDS = 15;

export interface SummarizationOptions {
  /** Target summary length as a fraction of the input length. */
  summaryRatio: number;
  /** Longest input, in words, the summarizer accepts in one call. */
  maxInputWords: number;
  minWordsToSummarize?: number;
  maxReduceDepth?: number;
}

export interface SummarizationResult {
  summary: string;
  chunkSummaries: string[];
  modelCalls: number;
  degraded: boolean;
}

type SummarizedDocument = Pick<DocumentRecord, "text" | "wordCount" | "chunks">;

/**
 * Two-level summarization: every chunk is summarized on its own, then the
 * chunk summaries (in document order) are summarized together. Inputs longer
 * than `maxInputWords` are split and reduced again until they fit.
 */
export async function summarizeDocument(
  document: SummarizedDocument,
  summarizer: Summarizer,
  options: SummarizationOptions,
): Promise<SummarizationResult> {
  const driver = new SummaryReducer(summarizer, options);
  const minWords = options.minWordsToSummarize ?? DEFAULT_MIN_WORDS_TO_SUMMARIZE;
  const chunkSummaries: string[] = [];
  let failedChunks = 0;

  for (const chunk of document.chunks) {
    const chunkWords = countWords(chunk.text);
    if (chunkWords < minWords) {
      chunkSummaries.push(chunk.text);
      continue;
    }
    try {
      const summary = await driver.reduce(chunk.text, targetWords(chunkWords, options.summaryRatio));
      if (summary) {
        chunkSummaries.push(summary);
      }
    } catch (error) {
      failedChunks += 1;
      console.error(`Summary failed for chunk ${chunk.index}: ${describeError(error)}`);
    }
  }

  const documentTarget = targetWords(document.wordCount, options.summaryRatio);

  if (chunkSummaries.length === 0) {
    return {
      summary: leadSummary(document.text, documentTarget),
      chunkSummaries,
      modelCalls: driver.calls,
      degraded: true,
    };
  }

  const combined = chunkSummaries.join(" ");
  let summary: string;
  let degraded = failedChunks > 0;

  if (document.chunks.length === 1) {
    summary = combined;
  } else {
    try {
      summary = await driver.reduce(combined, documentTarget);
    } catch (error) {
      console.error(`Summary reduce pass failed: ${describeError(error)}`);
      summary = truncateWords(combined, documentTarget);
      degraded = true;
    }
  }

  if (!summary.trim()) {
    summary = leadSummary(document.text, documentTarget);
    degraded = true;
  }

  return {
    summary: truncateWords(summary, Math.max(1, document.wordCount)),
    chunkSummaries,
    modelCalls: driver.calls,
    degraded,
  };
}

export function targetWords(inputWords: number, ratio: number): number {
  return Math.max(MIN_TARGET_WORDS, Math.ceil(inputWords * ratio));
}

/** Leading sentences of the text up to `maxWords` words. */
export function leadSummary(text: string, maxWords: number): string {
  const picked: string[] = [];
  let total = 0;
  for (const sentence of splitSentences(text)) {
    const words = countWords(sentence);
    if (picked.length > 0 && total + words > maxWords) {
      break;
    }
    picked.push(sentence);
    total += words;
  }
  return truncateWords(picked.join(" "), maxWords);
}

export function partitionWords(text: string, maxWords: number): string[] {
  const words = splitWords(text);
  const parts: string[] = [];
  for (let start = 0; start < words.length; start += maxWords) {
    parts.push(words.slice(start, start + maxWords).join(" "));
  }
  return parts;
}

class SummaryReducer {
  calls = 0;

  private readonly maxDepth: number;

  constructor(
    private readonly summarizer: Summarizer,
    private readonly options: SummarizationOptions,
  ) {
    this.maxDepth = options.maxReduceDepth ?? DEFAULT_MAX_REDUCE_DEPTH;
  }

  async reduce(text: string, target: number, depth = 0): Promise<string> {
    const words = countWords(text);
    if (words <= target) {
      return text;
    }

    const { maxInputWords } = this.options;
    if (words <= maxInputWords) {
      return this.callModel(text, target, words);
    }

    if (depth >= this.maxDepth) {
      return this.callModel(truncateWords(text, maxInputWords), target, maxInputWords);
    }

    const parts = partitionWords(text, maxInputWords);
    const partials: string[] = [];
    for (const part of parts) {
      const partWords = countWords(part);
      const partTarget = Math.max(1, Math.ceil((target * partWords) / words));
      partials.push(await this.callModel(part, partTarget, partWords));
    }

    let joined = partials.filter(Boolean).join(" ");
    if (countWords(joined) >= words) {
      joined = truncateWords(joined, Math.max(target, Math.floor(words / 2)));
    }
    return this.reduce(joined, target, depth + 1);
  }

  private async callModel(text: string, target: number, inputWords: number): Promise<string> {
    this.calls += 1;
    const output = (await this.summarizer.summarize(text, target)).trim();
    return truncateWords(output, inputWords);
  }
}
