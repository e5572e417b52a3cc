import { describeError } from "../domain/errors.js";
import { QuestionGenerator, QuestionSeed } from "../domain/models.js";
import { Chunk, ConceptRecord, Question, QuestionBatch } from "../domain/types.js";
import { normalizeQuestion, tokenOverlapRatio } from "../utils/text.js";

export interface QuestionEngineOptions {
  /** Candidates whose word overlap with an issued question exceeds this are rejected. */
  similarityThreshold: number;
  /** Generator calls allowed per request, as a multiple of the requested count. */
  retryMultiplier: number;
  questionsPerSeed: number;
  conceptSeedLimit: number;
}

interface SeedCursor {
  seed: QuestionSeed;
  requested: number;
  exhausted: boolean;
}

export interface QuestionState {
  issued: Question[];
  issuedKeys: Set<string>;
  round: number;
  seeds: SeedCursor[];
}

export function createQuestionState(
  concepts: ConceptRecord[],
  chunks: Chunk[],
  conceptSeedLimit: number,
): QuestionState {
  const chunkText = new Map(chunks.map((chunk) => [chunk.index, chunk.text]));
  const conceptSeeds: QuestionSeed[] = concepts.slice(0, conceptSeedLimit).map((concept) => ({
    kind: "concept",
    concept,
    context: chunkText.get(concept.firstSeenChunk) ?? "",
  }));
  const chunkSeeds: QuestionSeed[] = chunks.map((chunk) => ({
    kind: "chunk",
    chunkIndex: chunk.index,
    text: chunk.text,
  }));

  return {
    issued: [],
    issuedKeys: new Set(),
    round: 0,
    seeds: [...conceptSeeds, ...chunkSeeds].map((seed) => ({
      seed,
      requested: 0,
      exhausted: false,
    })),
  };
}

export class QuestionEngine {
  constructor(
    private readonly generator: QuestionGenerator,
    private readonly options: QuestionEngineOptions,
  ) {}

  /**
   * Produces up to `count` questions that were not issued before. Seeds are
   * visited in rank order; each visit asks the generator for more candidates
   * than the seed has already produced. Stops when enough questions were
   * accepted, every seed is exhausted, or the call budget is spent. A seed is
   * exhausted once it returns fewer candidates than asked or its call fails.
   */
  async generate(state: QuestionState, count: number): Promise<QuestionBatch> {
    state.round += 1;
    const round = state.round;
    const requested = Math.max(0, Math.floor(count));
    const accepted: Question[] = [];
    const maxCalls = this.options.retryMultiplier * requested;
    let calls = 0;

    while (
      accepted.length < requested &&
      calls < maxCalls &&
      state.seeds.some((cursor) => !cursor.exhausted)
    ) {
      for (const cursor of state.seeds) {
        if (accepted.length >= requested || calls >= maxCalls) {
          break;
        }
        if (cursor.exhausted) {
          continue;
        }

        const want = Math.min(this.options.questionsPerSeed, requested - accepted.length);
        const ask = cursor.requested + want;
        calls += 1;

        let candidates: string[];
        try {
          candidates = await this.generator.generate(cursor.seed, ask);
        } catch (error) {
          console.error(`Question generation failed for ${describeSeed(cursor.seed)}: ${describeError(error)}`);
          cursor.exhausted = true;
          continue;
        }
        cursor.requested = ask;

        for (const candidate of candidates) {
          if (accepted.length >= requested) {
            break;
          }
          const question = this.accept(state, candidate, cursor.seed, round);
          if (question) {
            accepted.push(question);
          }
        }

        // A seed whose candidates were all issued already stays live and is
        // read deeper on the next pass; only a short answer ends it.
        if (candidates.length < ask) {
          cursor.exhausted = true;
        }
      }
    }

    return {
      questions: accepted,
      requested,
      returnedCount: accepted.length,
      shortfall: requested - accepted.length,
      round,
    };
  }

  isDuplicate(state: QuestionState, normalizedText: string): boolean {
    if (state.issuedKeys.has(normalizedText)) {
      return true;
    }
    return state.issued.some(
      (question) =>
        tokenOverlapRatio(question.normalizedText, normalizedText) >
        this.options.similarityThreshold,
    );
  }

  private accept(
    state: QuestionState,
    candidate: string,
    seed: QuestionSeed,
    round: number,
  ): Question | null {
    const text = candidate.replace(/\s+/g, " ").trim();
    const normalizedText = normalizeQuestion(text);
    if (!normalizedText || this.isDuplicate(state, normalizedText)) {
      return null;
    }

    const question: Question = { text, normalizedText, generationRound: round };
    if (seed.kind === "concept") {
      question.sourceConcept = seed.concept.displayText;
    }
    state.issued.push(question);
    state.issuedKeys.add(normalizedText);
    return question;
  }
}

function describeSeed(seed: QuestionSeed): string {
  return seed.kind === "concept"
    ? `concept "${seed.concept.displayText}"`
    : `chunk ${seed.chunkIndex}`;
}
