import { AppConfig } from "./config/env.js";
import { ModelHandles } from "./domain/models.js";
import { createModelHandles } from "./infra/models/createModelHandles.js";
import { StudyGuideService } from "./services/studyGuideService.js";
import { StudySession } from "./session/studySession.js";

export interface StudyApp {
  service: StudyGuideService;
  createSession: () => StudySession;
  close: () => Promise<void>;
}

export function createStudyGuideService(config: AppConfig, models: ModelHandles): StudyGuideService {
  return new StudyGuideService(models, {
    chunking: config.chunking,
    summaryRatio: config.summaryRatio,
    summarizerMaxInputWords: config.summarizerMaxInputWords,
    extractionConcurrency: config.extractionConcurrency,
    questions: {
      similarityThreshold: config.questions.similarityThreshold,
      retryMultiplier: config.questions.retryMultiplier,
      questionsPerSeed: config.questions.questionsPerSeed,
      conceptSeedLimit: config.questions.conceptSeedLimit,
    },
  });
}

export async function createStudyApp(config: AppConfig): Promise<StudyApp> {
  const { models, close } = await createModelHandles(config);
  const service = createStudyGuideService(config, models);

  return {
    service,
    createSession: () =>
      new StudySession(service, {
        initialQuestionCount: config.questions.initialCount,
        chatQuestionCount: config.questions.chatCount,
        topConcepts: config.topConcepts,
      }),
    close,
  };
}
