import { afterEach, describe, expect, it, vi } from "vitest";
import { chunkDocument } from "../src/pipelines/chunking.js";
import { leadSummary, summarizeDocument, targetWords } from "../src/pipelines/summarization.js";
import { countWords } from "../src/utils/text.js";
import { FailingSummarizer, LeadingWordsSummarizer } from "./helpers/fakes.js";

function documentOf(text: string, chunkSize: number, overlap: number) {
  return {
    text,
    wordCount: countWords(text),
    chunks: chunkDocument(text, { chunkSize, overlap }),
  };
}

function numberedWords(count: number): string {
  return Array.from({ length: count }, (_, idx) => `w${idx}`).join(" ");
}

describe("summarization pipeline", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("summarizes each chunk and then the combined summaries", async () => {
    const summarizer = new LeadingWordsSummarizer();
    const result = await summarizeDocument(documentOf(numberedWords(1200), 512, 128), summarizer, {
      summaryRatio: 0.3,
      maxInputWords: 600,
    });

    expect(result.chunkSummaries.map(countWords)).toEqual([154, 154, 130]);
    expect(summarizer.calls).toEqual([
      { words: 512, maxWords: 154 },
      { words: 512, maxWords: 154 },
      { words: 432, maxWords: 130 },
      { words: 438, maxWords: 360 },
    ]);
    expect(countWords(result.summary)).toBe(360);
    expect(result.modelCalls).toBe(4);
    expect(result.degraded).toBe(false);
  });

  it("splits inputs longer than the model accepts and reduces again", async () => {
    const summarizer = new LeadingWordsSummarizer();
    const result = await summarizeDocument(documentOf(numberedWords(300), 512, 128), summarizer, {
      summaryRatio: 0.1,
      maxInputWords: 100,
    });

    expect(summarizer.calls).toEqual([
      { words: 100, maxWords: 10 },
      { words: 100, maxWords: 10 },
      { words: 100, maxWords: 10 },
    ]);
    expect(result.summary.split(" ").slice(0, 3)).toEqual(["w0", "w1", "w2"]);
    expect(result.summary.split(" ")[10]).toBe("w100");
    expect(countWords(result.summary)).toBe(30);
  });

  it("passes short chunks through without a model call", async () => {
    const summarizer = new LeadingWordsSummarizer();
    const text = "Mitochondria produce most of the energy a cell needs.";
    const result = await summarizeDocument(documentOf(text, 512, 128), summarizer, {
      summaryRatio: 0.3,
      maxInputWords: 500,
    });

    expect(result.summary).toBe(text);
    expect(result.modelCalls).toBe(0);
  });

  it("falls back to the leading sentences when every chunk fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const text = Array.from({ length: 16 }, (_, idx) => `Fact ${idx} describes the cell.`).join(" ");

    const result = await summarizeDocument(documentOf(text, 50, 10), new FailingSummarizer(), {
      summaryRatio: 0.3,
      maxInputWords: 500,
    });

    expect(result.degraded).toBe(true);
    expect(result.chunkSummaries).toEqual([]);
    expect(result.summary).toBe(
      "Fact 0 describes the cell. Fact 1 describes the cell. Fact 2 describes the cell. Fact 3 describes the cell.",
    );
  });

  it("never targets fewer than fifteen words", () => {
    expect(targetWords(20, 0.3)).toBe(15);
    expect(targetWords(1000, 0.3)).toBe(300);
  });

  it("builds lead summaries from whole sentences", () => {
    expect(leadSummary("One two three. Four five six. Seven eight.", 6)).toBe("One two three. Four five six.");
    expect(leadSummary("A single very long opening sentence here.", 3)).toBe("A single very");
  });
});
