import { AppConfig } from "../../config/env.js";
import { ModelHandles } from "../../domain/models.js";
import { DefaultAiClient } from "../ai/defaultAiClient.js";
import { ExtractiveSummarizer } from "./extractiveSummarizer.js";
import { LlmExtractor } from "./llmExtractor.js";
import { LlmQuestionGenerator } from "./llmQuestionGenerator.js";
import { LlmSummarizer } from "./llmSummarizer.js";
import { RuleBasedExtractor } from "./ruleBasedExtractor.js";
import { TemplateQuestionGenerator } from "./templateQuestionGenerator.js";

export interface ModelBootstrapResult {
  models: ModelHandles;
  close: () => Promise<void>;
}

export async function createModelHandles(config: AppConfig): Promise<ModelBootstrapResult> {
  const models = buildModels(config);
  const handles = [models.extractor, models.summarizer, models.questionGenerator];

  for (const handle of handles) {
    await handle.init();
  }

  return {
    models,
    close: async () => {
      for (const handle of handles) {
        await handle.close();
      }
    },
  };
}

function buildModels(config: AppConfig): ModelHandles {
  if (config.aiProvider === "none") {
    return {
      extractor: new RuleBasedExtractor(),
      summarizer: new ExtractiveSummarizer(),
      questionGenerator: new TemplateQuestionGenerator(),
    };
  }

  const client = new DefaultAiClient(config);
  return {
    extractor: new LlmExtractor(client),
    summarizer: new LlmSummarizer(client),
    questionGenerator: new LlmQuestionGenerator(client),
  };
}
