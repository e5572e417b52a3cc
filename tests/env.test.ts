import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { ConfigurationError } from "../src/domain/errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.aiProvider).toBe("none");
    expect(config.chunking).toEqual({ chunkSize: 512, overlap: 128 });
    expect(config.questions).toEqual({
      initialCount: 15,
      chatCount: 5,
      similarityThreshold: 0.7,
      retryMultiplier: 3,
      questionsPerSeed: 2,
      conceptSeedLimit: 15,
    });
    expect(config.summaryRatio).toBe(0.3);
    expect(config.openaiApiKey).toBeNull();
  });

  it("reads numeric settings from strings", () => {
    const config = loadConfig({ CHUNK_SIZE: "300", CHUNK_OVERLAP: "60", QUESTION_SIMILARITY_THRESHOLD: "0.85" });
    expect(config.chunking).toEqual({ chunkSize: 300, overlap: 60 });
    expect(config.questions.similarityThreshold).toBe(0.85);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => loadConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(
      new ConfigurationError("CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100)."),
    );
  });

  it("reports invalid values with their variable names", () => {
    expect(() => loadConfig({ CHUNK_SIZE: "-5" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ CHUNK_SIZE: "-5" })).toThrow(/^Invalid environment: CHUNK_SIZE: /);
  });

  it("requires an API key for the openai provider", () => {
    expect(() => loadConfig({ AI_PROVIDER: "openai", OPENAI_API_KEY: "  " })).toThrow(
      "AI_PROVIDER=openai requires OPENAI_API_KEY.",
    );
    expect(loadConfig({ AI_PROVIDER: "openai", OPENAI_API_KEY: "test-secret" }).openaiApiKey).toBe("test-secret");
  });
});
