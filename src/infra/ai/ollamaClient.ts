import { z } from "zod";
import { ChatRequest } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
}

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

export class OllamaClient {
  constructor(private readonly options: OllamaClientOptions) {}

  async ping(): Promise<void> {
    const response = await fetch(`${this.options.baseUrl}/api/tags`);
    if (!response.ok) {
      throw new Error(
        `Ollama is not reachable at ${this.options.baseUrl} (${response.status}).`,
      );
    }
  }

  async complete(request: ChatRequest): Promise<string> {
    const response = await fetch(`${this.options.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify(this.buildChatRequest(request)),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = chatResponseSchema.parse(await response.json());
    return data.message?.content?.trim() ?? "";
  }

  private buildChatRequest(request: ChatRequest) {
    return {
      model: this.options.chatModel,
      stream: false,
      keep_alive: "30m",
      ...(request.json ? { format: "json" } : {}),
      options: {
        temperature: request.temperature ?? 0,
        seed: 7,
        ...(request.maxTokens ? { num_predict: request.maxTokens } : {}),
      },
      messages: request.messages,
    };
  }
}
