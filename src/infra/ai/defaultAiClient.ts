import { AiProvider, AppConfig } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { AiClient, ChatRequest } from "./types.js";

export class DefaultAiClient implements AiClient {
  private readonly openAi: OpenAiClient;

  private readonly ollama: OllamaClient;

  private readonly provider: AiProvider;

  constructor(config: AppConfig) {
    this.openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      chatModel: config.openaiChatModel,
    });
    this.ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
    });
    this.provider = config.aiProvider;
  }

  async ping(): Promise<void> {
    if (this.provider === "ollama") {
      await this.ollama.ping();
      return;
    }
    if (this.provider === "openai" && !this.openAi.isConfigured()) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
  }

  async complete(request: ChatRequest): Promise<string> {
    if (this.provider === "none") {
      throw new Error("AI provider is disabled.");
    }
    if (this.provider === "openai") {
      return this.openAi.complete(request);
    }
    return this.ollama.complete(request);
  }
}
