import { afterEach, describe, expect, it, vi } from "vitest";
import { AiClient, ChatRequest } from "../src/infra/ai/types.js";
import { LlmExtractor } from "../src/infra/models/llmExtractor.js";
import { LlmQuestionGenerator, parseQuestionList } from "../src/infra/models/llmQuestionGenerator.js";
import { LlmSummarizer } from "../src/infra/models/llmSummarizer.js";

class RecordingAiClient implements AiClient {
  readonly requests: ChatRequest[] = [];

  constructor(private readonly reply: string) {}

  async ping(): Promise<void> {}

  async complete(request: ChatRequest): Promise<string> {
    this.requests.push(request);
    return this.reply;
  }
}

describe("model-backed collaborators", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses numbered and bulleted question lists", () => {
    const raw = ["1. What is DNA made of?", "- Explain how enzymes work.", "ok", "* Why?", "2) Name a base pair."].join("\n");
    expect(parseQuestionList(raw)).toEqual([
      "What is DNA made of?",
      "Explain how enzymes work.",
      "Name a base pair.",
    ]);
  });

  it("limits generated questions to the requested count", async () => {
    const client = new RecordingAiClient("1. What is DNA made of?\n2. How does RNA differ from DNA?");
    const generator = new LlmQuestionGenerator(client);

    const questions = await generator.generate({ kind: "chunk", chunkIndex: 0, text: "DNA stores genes." }, 1);

    expect(questions).toEqual(["What is DNA made of?"]);
    expect(await generator.generate({ kind: "chunk", chunkIndex: 0, text: "DNA" }, 0)).toEqual([]);
    expect(client.requests).toHaveLength(1);
  });

  it("maps validated extraction JSON", async () => {
    const client = new RecordingAiClient(
      JSON.stringify({
        entities: [{ text: "Gregor Mendel", label: "PERSON" }],
        keywords: [{ text: "heredity", score: "0.8" }],
      }),
    );

    const extraction = await new LlmExtractor(client).extract("Gregor Mendel studied heredity.");

    expect(extraction).toEqual({
      entities: [{ text: "Gregor Mendel", label: "PERSON" }],
      keywords: [{ text: "heredity", score: 0.8 }],
      nounPhrases: [],
    });
    expect(client.requests[0].json).toBe(true);
  });

  it("returns empty signals for malformed extraction output", async () => {
    const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const extractor = new LlmExtractor(new RecordingAiClient("not json"));

    expect(await extractor.extract("Some text.")).toEqual({ entities: [], keywords: [], nounPhrases: [] });
    expect(await extractor.extract("   ")).toEqual({ entities: [], keywords: [], nounPhrases: [] });
    expect(logged).toHaveBeenCalledTimes(1);
  });

  it("bounds summary tokens by the word budget", async () => {
    const client = new RecordingAiClient("A short summary.");
    const summary = await new LlmSummarizer(client).summarize("Long text here.", 40);

    expect(summary).toBe("A short summary.");
    expect(client.requests[0].maxTokens).toBe(80);
  });
});
