import { ChunkingConfig } from "../config/env.js";
import { DocumentError } from "../domain/errors.js";
import { ModelHandles } from "../domain/models.js";
import { ConceptRecord, DocumentRecord, QuestionBatch } from "../domain/types.js";
import { aggregateConcepts } from "../pipelines/aggregation.js";
import { assertChunkingConfig, chunkDocument } from "../pipelines/chunking.js";
import { extractChunks } from "../pipelines/extraction.js";
import {
  createQuestionState,
  QuestionEngine,
  QuestionEngineOptions,
  QuestionState,
} from "../pipelines/questioning.js";
import { summarizeDocument } from "../pipelines/summarization.js";
import { cleanText, countWords, splitSentences } from "../utils/text.js";

export interface StudyGuideServiceOptions {
  chunking: ChunkingConfig;
  summaryRatio: number;
  summarizerMaxInputWords: number;
  extractionConcurrency: number;
  questions: QuestionEngineOptions;
}

export interface DocumentInput {
  name: string;
  text: string;
}

export interface ProcessedDocument {
  document: DocumentRecord;
  concepts: ConceptRecord[];
  summary: string;
  summaryDegraded: boolean;
  failedChunks: number;
  questionState: QuestionState;
  initialQuestions: QuestionBatch;
}

export class StudyGuideService {
  private readonly questionEngine: QuestionEngine;

  constructor(
    private readonly models: ModelHandles,
    private readonly options: StudyGuideServiceOptions,
  ) {
    assertChunkingConfig(options.chunking);
    this.questionEngine = new QuestionEngine(models.questionGenerator, options.questions);
  }

  buildDocument(input: DocumentInput): DocumentRecord {
    const text = cleanText(input.text);
    const wordCount = countWords(text);
    if (wordCount === 0) {
      throw new DocumentError(`No extractable text in ${input.name}.`);
    }

    return {
      name: input.name,
      text,
      characterCount: input.text.length,
      wordCount,
      sentenceCount: splitSentences(text).length,
      chunks: chunkDocument(text, this.options.chunking),
    };
  }

  async processDocument(
    input: DocumentInput,
    initialQuestionCount: number,
  ): Promise<ProcessedDocument> {
    const document = this.buildDocument(input);
    console.error(
      `Processing ${document.name}: ${document.wordCount} words, ${document.chunks.length} chunks`,
    );

    const extractions = await extractChunks(
      document.chunks,
      this.models.extractor,
      this.options.extractionConcurrency,
    );
    const failedChunks = extractions.filter((item) => item === null).length;
    const { concepts } = aggregateConcepts(document.chunks, extractions);

    const summarized = await summarizeDocument(document, this.models.summarizer, {
      summaryRatio: this.options.summaryRatio,
      maxInputWords: this.options.summarizerMaxInputWords,
    });

    const questionState = createQuestionState(
      concepts,
      document.chunks,
      this.options.questions.conceptSeedLimit,
    );
    const initialQuestions = await this.questionEngine.generate(
      questionState,
      initialQuestionCount,
    );

    console.error(
      `Processed ${document.name}: ${concepts.length} concepts, ${initialQuestions.returnedCount} questions`,
    );

    return {
      document,
      concepts,
      summary: summarized.summary,
      summaryDegraded: summarized.degraded,
      failedChunks,
      questionState,
      initialQuestions,
    };
  }

  async moreQuestions(state: QuestionState, count: number): Promise<QuestionBatch> {
    return this.questionEngine.generate(state, count);
  }
}
