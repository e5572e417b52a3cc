import { z } from "zod";
import { describeError } from "../../domain/errors.js";
import { ConceptExtractor } from "../../domain/models.js";
import { ChunkExtraction } from "../../domain/types.js";
import { AiClient } from "../ai/types.js";

const extractionSchema = z.object({
  entities: z
    .array(z.object({ text: z.string().min(1), label: z.string().min(1) }))
    .default([]),
  keywords: z
    .array(z.object({ text: z.string().min(1), score: z.coerce.number().min(0).max(1) }))
    .default([]),
  noun_phrases: z.array(z.string().min(1)).default([]),
});

const EMPTY: ChunkExtraction = { entities: [], keywords: [], nounPhrases: [] };

const SYSTEM_PROMPT = [
  "You extract study concepts from English text.",
  "Reply with one JSON object with keys entities, keywords and noun_phrases.",
  'entities: [{"text": string, "label": "PERSON"|"ORG"|"GPE"|"DATE"|"EVENT"|"WORK"|"OTHER"}].',
  'keywords: up to 10 items [{"text": string, "score": number between 0 and 1}].',
  "noun_phrases: up to 20 multi-word noun phrases copied from the text.",
  "Copy every span exactly as it appears in the text.",
].join(" ");

export class LlmExtractor implements ConceptExtractor {
  constructor(private readonly client: AiClient) {}

  async init(): Promise<void> {
    await this.client.ping();
  }

  async close(): Promise<void> {}

  async extract(chunkText: string): Promise<ChunkExtraction> {
    if (!chunkText.trim()) {
      return EMPTY;
    }

    try {
      const raw = await this.client.complete({
        json: true,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: chunkText },
        ],
      });
      const parsed = extractionSchema.parse(JSON.parse(raw));
      return {
        entities: parsed.entities,
        keywords: parsed.keywords,
        nounPhrases: parsed.noun_phrases,
      };
    } catch (error) {
      console.error(`Model extraction failed: ${describeError(error)}`);
      return EMPTY;
    }
  }
}
