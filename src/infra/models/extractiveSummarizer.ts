import { Summarizer } from "../../domain/models.js";
import { countWords, isStopword, splitSentences, tokenize, truncateWords } from "../../utils/text.js";

/**
 * Picks the sentences with the highest average term frequency, keeps them in
 * their original order and stops at the word budget.
 */
export class ExtractiveSummarizer implements Summarizer {
  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async summarize(text: string, maxWords: number): Promise<string> {
    const sentences = splitSentences(text);
    if (sentences.length === 0) {
      return "";
    }

    const frequencies = new Map<string, number>();
    for (const sentence of sentences) {
      for (const term of contentTerms(sentence)) {
        frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
      }
    }

    const ranked = sentences
      .map((sentence, index) => ({ sentence, index, score: scoreSentence(sentence, frequencies) }))
      .sort((a, b) => b.score - a.score || a.index - b.index);

    const picked: Array<{ sentence: string; index: number }> = [];
    let used = 0;
    for (const candidate of ranked) {
      const words = countWords(candidate.sentence);
      if (picked.length > 0 && used + words > maxWords) {
        continue;
      }
      picked.push(candidate);
      used += words;
      if (used >= maxWords) {
        break;
      }
    }

    const summary = picked
      .sort((a, b) => a.index - b.index)
      .map((item) => item.sentence)
      .join(" ");
    return truncateWords(summary, maxWords);
  }
}

function contentTerms(sentence: string): string[] {
  return tokenize(sentence).filter((word) => word.length > 2 && !isStopword(word));
}

function scoreSentence(sentence: string, frequencies: Map<string, number>): number {
  const terms = contentTerms(sentence);
  if (terms.length === 0) {
    return 0;
  }
  const total = terms.reduce((sum, term) => sum + (frequencies.get(term) ?? 0), 0);
  return total / terms.length;
}
