import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

const envSchema = z.object({
  AI_PROVIDER: z.enum(["none", "ollama", "openai"]).default("none"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  CHUNK_SIZE: z.coerce.number().int().positive().default(512),
  CHUNK_OVERLAP: z.coerce.number().int().positive().default(128),
  SUMMARY_RATIO: z.coerce.number().gt(0).max(1).default(0.3),
  SUMMARIZER_MAX_INPUT_WORDS: z.coerce.number().int().min(50).default(500),
  INITIAL_QUESTION_COUNT: z.coerce.number().int().positive().default(15),
  CHAT_QUESTION_COUNT: z.coerce.number().int().positive().default(5),
  QUESTION_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  QUESTION_RETRY_MULTIPLIER: z.coerce.number().int().positive().default(3),
  QUESTIONS_PER_SEED: z.coerce.number().int().positive().default(2),
  CONCEPT_SEED_LIMIT: z.coerce.number().int().min(0).default(15),
  TOP_CONCEPTS: z.coerce.number().int().positive().default(15),
  EXTRACTION_CONCURRENCY: z.coerce.number().int().positive().default(1),
});

export type AiProvider = "none" | "ollama" | "openai";

export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
}

export interface QuestionConfig {
  initialCount: number;
  chatCount: number;
  similarityThreshold: number;
  retryMultiplier: number;
  questionsPerSeed: number;
  conceptSeedLimit: number;
}

export interface AppConfig {
  aiProvider: AiProvider;
  openaiApiKey: string | null;
  openaiChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  chunking: ChunkingConfig;
  summaryRatio: number;
  summarizerMaxInputWords: number;
  questions: QuestionConfig;
  topConcepts: number;
  extractionConcurrency: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  const parsed = result.data;

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new ConfigurationError(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  const openaiApiKey = parsed.OPENAI_API_KEY?.trim() || null;
  if (parsed.AI_PROVIDER === "openai" && !openaiApiKey) {
    throw new ConfigurationError("AI_PROVIDER=openai requires OPENAI_API_KEY.");
  }

  return {
    aiProvider: parsed.AI_PROVIDER,
    openaiApiKey,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },
    summaryRatio: parsed.SUMMARY_RATIO,
    summarizerMaxInputWords: parsed.SUMMARIZER_MAX_INPUT_WORDS,
    questions: {
      initialCount: parsed.INITIAL_QUESTION_COUNT,
      chatCount: parsed.CHAT_QUESTION_COUNT,
      similarityThreshold: parsed.QUESTION_SIMILARITY_THRESHOLD,
      retryMultiplier: parsed.QUESTION_RETRY_MULTIPLIER,
      questionsPerSeed: parsed.QUESTIONS_PER_SEED,
      conceptSeedLimit: parsed.CONCEPT_SEED_LIMIT,
    },
    topConcepts: parsed.TOP_CONCEPTS,
    extractionConcurrency: parsed.EXTRACTION_CONCURRENCY,
  };
}
