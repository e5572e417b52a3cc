import { StudyGuideService } from "../../src/services/studyGuideService.js";
import { StudySession } from "../../src/session/studySession.js";
import { FixedExtractor, LeadingWordsSummarizer, ScriptedQuestionGenerator } from "./fakes.js";

export const PHOTOSYNTHESIS_TEXT = [
  "Photosynthesis lets plants turn light into chemical energy.",
  "Leaves absorb carbon dioxide from the air and water from the soil.",
  "Chlorophyll captures the light and the plant produces glucose for growth.",
  "Oxygen is released as a by product of the process.",
].join(" ");

export const CHUNK_QUESTIONS = [
  "How do plants capture light energy?",
  "Which gas do leaves absorb from the air?",
  "What role does chlorophyll play?",
  "Why are leaves usually green?",
  "What sugar do plants produce?",
  "When does cellular respiration occur?",
  "Where is water taken up by the plant?",
  "Which organelle hosts the light reactions?",
];

export function createTestSession(): StudySession {
  const service = new StudyGuideService(
    {
      extractor: new FixedExtractor({
        entities: [],
        keywords: [{ text: "photosynthesis", score: 1 }],
        nounPhrases: [],
      }),
      summarizer: new LeadingWordsSummarizer(),
      questionGenerator: new ScriptedQuestionGenerator(
        { photosynthesis: ["What is photosynthesis?", "Where does photosynthesis happen?"] },
        { 0: CHUNK_QUESTIONS },
      ),
    },
    {
      chunking: { chunkSize: 512, overlap: 128 },
      summaryRatio: 0.3,
      summarizerMaxInputWords: 500,
      extractionConcurrency: 1,
      questions: {
        similarityThreshold: 0.7,
        retryMultiplier: 3,
        questionsPerSeed: 2,
        conceptSeedLimit: 15,
      },
    },
  );
  return new StudySession(service, { initialQuestionCount: 4, chatQuestionCount: 3, topConcepts: 15 });
}
