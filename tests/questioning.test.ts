import { afterEach, describe, expect, it, vi } from "vitest";
import { Chunk, ConceptRecord } from "../src/domain/types.js";
import { TemplateQuestionGenerator } from "../src/infra/models/templateQuestionGenerator.js";
import {
  createQuestionState,
  QuestionEngine,
  QuestionEngineOptions,
} from "../src/pipelines/questioning.js";
import { ScriptedQuestionGenerator } from "./helpers/fakes.js";

const OPTIONS: QuestionEngineOptions = {
  similarityThreshold: 0.7,
  retryMultiplier: 3,
  questionsPerSeed: 2,
  conceptSeedLimit: 15,
};

const CHUNK: Chunk = { index: 0, text: "Cells divide and grow.", startOffset: 0, endOffset: 4 };

const TWELVE_QUESTIONS = [
  "How do plants capture light energy?",
  "Which gas do leaves absorb from the air?",
  "What role does chlorophyll play?",
  "Why are leaves usually green?",
  "What sugar do plants produce?",
  "When does cellular respiration occur?",
  "Where is water taken up by the plant?",
  "Which organelle hosts the light reactions?",
  "How is oxygen released into the atmosphere?",
  "What limits the rate of growth in shade?",
  "Name two products of the Calvin cycle.",
  "Explain why roots need minerals from soil.",
];

function concept(displayText: string): ConceptRecord {
  return {
    canonicalText: displayText.toLowerCase(),
    displayText,
    sourceKind: "keyword",
    occurrenceCount: 1,
    aggregateScore: 1,
    firstSeenChunk: 0,
  };
}

describe("question engine", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns disjoint batches for repeated requests", async () => {
    const engine = new QuestionEngine(new ScriptedQuestionGenerator({}, { 0: TWELVE_QUESTIONS }), OPTIONS);
    const state = createQuestionState([], [CHUNK], OPTIONS.conceptSeedLimit);

    const first = await engine.generate(state, 5);
    const second = await engine.generate(state, 5);

    const firstKeys = first.questions.map((question) => question.normalizedText);
    const secondKeys = new Set(second.questions.map((question) => question.normalizedText));
    expect(first.returnedCount).toBe(5);
    expect(second.returnedCount).toBe(5);
    expect(firstKeys.filter((key) => secondKeys.has(key))).toEqual([]);
    expect(second.questions.map((question) => question.text)).toEqual(TWELVE_QUESTIONS.slice(5, 10));
    expect([first.round, second.round]).toEqual([1, 2]);
  });

  it("reports a shortfall instead of padding", async () => {
    const generator = new ScriptedQuestionGenerator({}, { 0: TWELVE_QUESTIONS.slice(0, 3) });
    const engine = new QuestionEngine(generator, OPTIONS);
    const state = createQuestionState([], [CHUNK], OPTIONS.conceptSeedLimit);

    const batch = await engine.generate(state, 10);

    expect(batch).toMatchObject({ requested: 10, returnedCount: 3, shortfall: 7, round: 1 });
    expect(batch.questions).toHaveLength(3);
    expect(generator.seen).toEqual([
      { seed: "chunk:0", count: 2 },
      { seed: "chunk:0", count: 4 },
    ]);

    const next = await engine.generate(state, 2);
    expect(next).toMatchObject({ returnedCount: 0, shortfall: 2, round: 2 });
  });

  it("rejects exact duplicates after normalization", async () => {
    const engine = new QuestionEngine(
      new ScriptedQuestionGenerator({}, { 0: ["What is osmosis?", "what is   OSMOSIS", "Where does osmosis occur?"] }),
      OPTIONS,
    );
    const state = createQuestionState([], [CHUNK], OPTIONS.conceptSeedLimit);

    const batch = await engine.generate(state, 3);

    expect(batch.questions.map((question) => question.text)).toEqual([
      "What is osmosis?",
      "Where does osmosis occur?",
    ]);
  });

  it("rejects paraphrases above the similarity threshold", async () => {
    const candidates = [
      "What is the main function of the mitochondria?",
      "What is the main function of mitochondria?",
    ];
    const strict = new QuestionEngine(new ScriptedQuestionGenerator({}, { 0: candidates }), OPTIONS);
    const strictBatch = await strict.generate(createQuestionState([], [CHUNK], 15), 2);
    expect(strictBatch.returnedCount).toBe(1);

    const lenient = new QuestionEngine(new ScriptedQuestionGenerator({}, { 0: candidates }), {
      ...OPTIONS,
      similarityThreshold: 1,
    });
    const lenientBatch = await lenient.generate(createQuestionState([], [CHUNK], 15), 2);
    expect(lenientBatch.returnedCount).toBe(2);
  });

  it("visits concept seeds before chunk seeds and tags their questions", async () => {
    const generator = new ScriptedQuestionGenerator(
      { Osmosis: ["What is osmosis?"] },
      { 0: TWELVE_QUESTIONS },
    );
    const engine = new QuestionEngine(generator, OPTIONS);
    const state = createQuestionState([concept("Osmosis")], [CHUNK], OPTIONS.conceptSeedLimit);

    const batch = await engine.generate(state, 3);

    expect(batch.questions.map((question) => [question.text, question.sourceConcept])).toEqual([
      ["What is osmosis?", "Osmosis"],
      [TWELVE_QUESTIONS[0], undefined],
      [TWELVE_QUESTIONS[1], undefined],
    ]);
  });

  it("keeps reading a seed whose first candidates were already issued", async () => {
    const generator = new ScriptedQuestionGenerator(
      { Alpha: TWELVE_QUESTIONS.slice(0, 2) },
      { 0: TWELVE_QUESTIONS.slice(0, 10) },
    );
    const engine = new QuestionEngine(generator, OPTIONS);
    const state = createQuestionState([concept("Alpha")], [CHUNK], OPTIONS.conceptSeedLimit);

    const batch = await engine.generate(state, 5);

    expect(batch.returnedCount).toBe(5);
    expect(batch.questions.map((question) => question.text)).toEqual(TWELVE_QUESTIONS.slice(0, 5));
    expect(state.seeds.map((cursor) => cursor.exhausted)).toEqual([true, false]);
  });

  it("issues every template question for different concepts", async () => {
    const engine = new QuestionEngine(new TemplateQuestionGenerator(), OPTIONS);
    const state = createQuestionState([concept("osmosis"), concept("diffusion")], [], OPTIONS.conceptSeedLimit);

    const batch = await engine.generate(state, 8);

    expect(batch.returnedCount).toBe(8);
    expect(batch.questions.filter((question) => question.sourceConcept === "diffusion").map((q) => q.text)).toEqual([
      "What is diffusion?",
      "Why is diffusion important?",
      "Give an example of diffusion.",
      "Explain diffusion to a classmate.",
    ]);
  });

  it("skips a seed whose generator call fails", async () => {
    const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const engine = new QuestionEngine(new ScriptedQuestionGenerator({}, { 0: TWELVE_QUESTIONS }), OPTIONS);
    const state = createQuestionState([concept("Unknown")], [CHUNK], OPTIONS.conceptSeedLimit);

    const batch = await engine.generate(state, 2);

    expect(batch.returnedCount).toBe(2);
    expect(state.seeds[0].exhausted).toBe(true);
    expect(logged).toHaveBeenCalledWith(
      'Question generation failed for concept "Unknown": no candidates for Unknown',
    );
  });

  it("stops at the call budget", async () => {
    const generator = new ScriptedQuestionGenerator({}, { 0: TWELVE_QUESTIONS, 1: TWELVE_QUESTIONS });
    const engine = new QuestionEngine(generator, { ...OPTIONS, retryMultiplier: 1, questionsPerSeed: 1 });
    const chunks = [CHUNK, { ...CHUNK, index: 1 }];
    const state = createQuestionState([], chunks, 15);

    const batch = await engine.generate(state, 2);

    expect(batch.returnedCount).toBe(1);
    expect(generator.seen).toHaveLength(2);
  });
});
