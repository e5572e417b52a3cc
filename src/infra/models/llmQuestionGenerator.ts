import { QuestionGenerator, QuestionSeed } from "../../domain/models.js";
import { AiClient } from "../ai/types.js";

const MAX_CONTEXT_CHARS = 4000;

export class LlmQuestionGenerator implements QuestionGenerator {
  constructor(private readonly client: AiClient) {}

  async init(): Promise<void> {
    await this.client.ping();
  }

  async close(): Promise<void> {}

  async generate(seed: QuestionSeed, count: number): Promise<string[]> {
    if (count <= 0) {
      return [];
    }

    const raw = await this.client.complete({
      messages: [
        {
          role: "system",
          content:
            "You write study questions for students. Each question must be answerable from the given material. Reply with a numbered list, one question per line, nothing else.",
        },
        { role: "user", content: buildPrompt(seed, count) },
      ],
    });

    return parseQuestionList(raw).slice(0, count);
  }
}

export function parseQuestionList(raw: string): string[] {
  return raw
    .split("\n")
    .map((line) => line.replace(/^\s*(?:\d+[.)]|[-*•])\s*/, "").trim())
    .filter((line) => line.length > 8 && /[?.]$/.test(line));
}

function buildPrompt(seed: QuestionSeed, count: number): string {
  if (seed.kind === "concept") {
    return [
      `Write ${count} distinct study questions about "${seed.concept.displayText}".`,
      "",
      "Material:",
      seed.context.slice(0, MAX_CONTEXT_CHARS),
    ].join("\n");
  }
  return [
    `Write ${count} distinct study questions about the following passage.`,
    "",
    seed.text.slice(0, MAX_CONTEXT_CHARS),
  ].join("\n");
}
