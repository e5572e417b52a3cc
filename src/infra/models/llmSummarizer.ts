import { Summarizer } from "../../domain/models.js";
import { AiClient } from "../ai/types.js";

const TOKENS_PER_WORD = 2;

export class LlmSummarizer implements Summarizer {
  constructor(private readonly client: AiClient) {}

  async init(): Promise<void> {
    await this.client.ping();
  }

  async close(): Promise<void> {}

  async summarize(text: string, maxWords: number): Promise<string> {
    return this.client.complete({
      maxTokens: maxWords * TOKENS_PER_WORD,
      messages: [
        {
          role: "system",
          content:
            "You summarize study material. Use only facts from the given text. Reply with plain prose, no headings or lists.",
        },
        {
          role: "user",
          content: `Summarize the following text in at most ${maxWords} words.\n\n${text}`,
        },
      ],
    });
  }
}
