export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatRequest {
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Ask the model for a single JSON object. */
  json?: boolean;
}

export interface AiClient {
  /** Fails when the backing service cannot be reached. */
  ping(): Promise<void>;
  complete(request: ChatRequest): Promise<string>;
}
