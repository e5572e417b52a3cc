import {
  ConceptRecord,
  DocumentRecord,
  DocumentStats,
  Question,
  QuestionBatch,
} from "../domain/types.js";
import { QuestionState } from "../pipelines/questioning.js";
import {
  DocumentInput,
  ProcessedDocument,
  StudyGuideService,
} from "../services/studyGuideService.js";
import {
  formatConcepts,
  formatQuestionBatch,
  formatStats,
  GOODBYE_TEXT,
  HELP_TEXT,
  UNKNOWN_HINT,
} from "./chatResponses.js";
import { Intent, routeInput } from "./commandRouter.js";

export type SessionState = "idle" | "ready" | "awaiting_input" | "terminated";

export interface SessionOptions {
  initialQuestionCount: number;
  chatQuestionCount: number;
  topConcepts: number;
  maxQuestionRequest?: number;
}

export interface ProcessResult {
  summary: string;
  questions: Question[];
  concepts: ConceptRecord[];
  requestedQuestions: number;
  returnedCount: number;
}

export interface TurnResult {
  intent: Intent["kind"];
  response: string;
  state: SessionState;
}

interface LoadedDocument {
  document: DocumentRecord;
  concepts: ConceptRecord[];
  summary: string;
  questionState: QuestionState;
}

const DEFAULT_MAX_QUESTION_REQUEST = 50;

/**
 * Conversation state for one document. Not safe for concurrent turns: the
 * caller resolves one input before handing over the next.
 */
export class StudySession {
  private state: SessionState = "idle";

  private loaded: LoadedDocument | null = null;

  private turnCount = 0;

  private lastCommand: Intent["kind"] | null = null;

  constructor(
    private readonly service: StudyGuideService,
    private readonly options: SessionOptions,
  ) {}

  get currentState(): SessionState {
    return this.state;
  }

  get lastCommandKind(): Intent["kind"] | null {
    return this.lastCommand;
  }

  get documentName(): string | null {
    return this.loaded?.document.name ?? null;
  }

  /** Every question issued so far, in issue order. */
  get questions(): Question[] {
    return [...(this.loaded?.questionState.issued ?? [])];
  }

  async process(input: DocumentInput): Promise<ProcessResult> {
    if (this.state !== "idle") {
      throw new Error(`A document is already loaded (state: ${this.state}).`);
    }

    const processed: ProcessedDocument = await this.service.processDocument(
      input,
      this.options.initialQuestionCount,
    );
    this.loaded = {
      document: processed.document,
      concepts: processed.concepts,
      summary: processed.summary,
      questionState: processed.questionState,
    };
    this.state = "ready";

    return {
      summary: processed.summary,
      questions: processed.initialQuestions.questions,
      concepts: this.getConcepts(),
      requestedQuestions: processed.initialQuestions.requested,
      returnedCount: processed.initialQuestions.returnedCount,
    };
  }

  async moreQuestions(count: number = this.options.chatQuestionCount): Promise<QuestionBatch> {
    const loaded = this.requireDocument();
    return this.service.moreQuestions(loaded.questionState, count);
  }

  getSummary(): string {
    return this.requireDocument().summary;
  }

  getConcepts(topK: number = this.options.topConcepts): ConceptRecord[] {
    return this.requireDocument().concepts.slice(0, Math.max(0, topK));
  }

  getStats(): DocumentStats {
    const { document, concepts, questionState } = this.requireDocument();
    return {
      character_count: document.characterCount,
      word_count: document.wordCount,
      sentence_count: document.sentenceCount,
      chunk_count: document.chunks.length,
      concept_count: concepts.length,
      questions_issued: questionState.issued.length,
      generation_rounds: questionState.round,
      turn_count: this.turnCount,
    };
  }

  startChat(): void {
    if (this.state !== "ready") {
      throw new Error(`Chat can only start once a document is ready (state: ${this.state}).`);
    }
    this.state = "awaiting_input";
  }

  /** Ends a session: after non-chat output, or when the chat input runs out. */
  finish(): void {
    this.state = "terminated";
  }

  async handleTurn(raw: string): Promise<TurnResult> {
    if (this.state === "idle") {
      return { intent: "unknown", response: "No document is loaded yet.", state: this.state };
    }
    if (this.state === "terminated") {
      throw new Error("Session has terminated.");
    }
    const intent = routeInput(raw, {
      defaultQuestionCount: this.options.chatQuestionCount,
      maxQuestionCount: this.options.maxQuestionRequest ?? DEFAULT_MAX_QUESTION_REQUEST,
    });

    if (intent.kind === "unknown") {
      return { intent: intent.kind, response: `${UNKNOWN_HINT}\n\n${HELP_TEXT}`, state: this.state };
    }
    if (this.state === "ready") {
      this.startChat();
    }

    this.turnCount += 1;
    this.lastCommand = intent.kind;
    const response = await this.respond(intent);
    return { intent: intent.kind, response, state: this.state };
  }

  private async respond(intent: Exclude<Intent, { kind: "unknown" }>): Promise<string> {
    switch (intent.kind) {
      case "help":
        return HELP_TEXT;
      case "summary":
        return this.getSummary();
      case "concepts":
        return formatConcepts(this.getConcepts(intent.topK));
      case "stats":
        return formatStats(this.getStats());
      case "more_questions": {
        const alreadyIssued = this.requireDocument().questionState.issued.length;
        const batch = await this.moreQuestions(intent.count);
        return formatQuestionBatch(batch, alreadyIssued + 1);
      }
      case "exit":
        this.state = "terminated";
        return GOODBYE_TEXT;
    }
  }

  private requireDocument(): LoadedDocument {
    if (!this.loaded) {
      throw new Error("No document has been processed in this session.");
    }
    return this.loaded;
  }
}
