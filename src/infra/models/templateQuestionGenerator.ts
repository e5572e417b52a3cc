import { QuestionGenerator, QuestionSeed } from "../../domain/models.js";
import { ConceptRecord } from "../../domain/types.js";
import { splitSentences } from "../../utils/text.js";

const MIN_SENTENCE_CHARS = 20;

const PAST_TO_BASE: Record<string, string> = {
  created: "create",
  founded: "found",
  established: "establish",
  invented: "invent",
  wrote: "write",
  discovered: "discover",
  developed: "develop",
  introduced: "introduce",
};

type SentencePattern = (sentence: string) => string | null;

const SENTENCE_PATTERNS: SentencePattern[] = [
  (sentence) => {
    const match = /^([A-Z][a-z]+ [A-Z][a-z]+) served as\b/.exec(sentence);
    return match ? `What role did ${match[1]} serve?` : null;
  },
  (sentence) => {
    const match = /^([A-Z][a-z]+(?: [A-Z][a-z]+)*) (created|founded|established|invented|wrote|discovered|developed|introduced)\b/.exec(
      sentence,
    );
    return match ? `What did ${match[1]} ${PAST_TO_BASE[match[2]]}?` : null;
  },
  (sentence) => {
    const match = /^([A-Z][\w-]*(?: [\w-]+){0,4}) is known as\b/.exec(sentence);
    return match ? `What is ${match[1]} known as?` : null;
  },
  (sentence) => {
    const match = /^(?:The |An |A )?([A-Za-z][\w-]*(?: [\w-]+){0,4}?) (is|are|was|were) (?:a|an|the|one of)\b/.exec(
      sentence,
    );
    if (!match) {
      return null;
    }
    const [, subject, verb] = match;
    return /^[A-Z]/.test(subject) && (verb === "was" || verb === "were")
      ? `Who or what ${verb} ${subject}?`
      : `What ${verb} ${subject}?`;
  },
  (sentence) => {
    const match = /\bin (1[0-9]{3}|20[0-9]{2})\b/.exec(sentence);
    return match ? `What happened in ${match[1]}?` : null;
  },
  (sentence) => {
    const match = /^(.{10,80}?) because (.{5,})$/.exec(sentence.replace(/[.!?]+$/, ""));
    return match ? `Why ${questionClause(match[1])}?` : null;
  },
];

/**
 * Question generation from fixed sentence patterns and concept templates.
 * Output depends only on the seed, so asking again with a larger count
 * returns the earlier candidates first.
 */
export class TemplateQuestionGenerator implements QuestionGenerator {
  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async generate(seed: QuestionSeed, count: number): Promise<string[]> {
    const candidates =
      seed.kind === "concept"
        ? conceptQuestions(seed.concept, seed.context)
        : sentenceQuestions(splitSentences(seed.text));
    return dedupe(candidates).slice(0, Math.max(0, count));
  }
}

function conceptQuestions(concept: ConceptRecord, context: string): string[] {
  const name = concept.displayText;
  const needle = concept.canonicalText.split(" ")[0] ?? "";
  const related = splitSentences(context).filter((sentence) =>
    sentence.toLowerCase().includes(needle),
  );

  if (concept.label === "DATE") {
    return [`What happened in ${name}?`, ...sentenceQuestions(related)];
  }

  return [
    concept.label === "NAME" ? `Who or what is ${name}?` : `What is ${name}?`,
    ...sentenceQuestions(related),
    `Why is ${name} important?`,
    `Give an example of ${name}.`,
    `Explain ${name} to a classmate.`,
  ];
}

function sentenceQuestions(sentences: string[]): string[] {
  const questions: string[] = [];
  for (const sentence of sentences) {
    const trimmed = sentence.trim();
    if (trimmed.length < MIN_SENTENCE_CHARS) {
      continue;
    }
    for (const pattern of SENTENCE_PATTERNS) {
      const question = pattern(trimmed);
      if (question) {
        questions.push(question);
      }
    }
  }
  return questions;
}

function questionClause(clause: string): string {
  const match = /^(.+?) (is|are|was|were|can|will|does|do|did) (.+)$/.exec(clause);
  if (match) {
    return `${match[2]} ${lowerFirst(match[1])} ${match[3]}`;
  }
  return `does it hold that ${lowerFirst(clause)}`;
}

function lowerFirst(text: string): string {
  if (/^[A-Z][a-z]/.test(text)) {
    return text.charAt(0).toLowerCase() + text.slice(1);
  }
  return text;
}

function dedupe(values: string[]): string[] {
  const seen = new Set<string>();
  return values.filter((value) => {
    const key = value.toLowerCase();
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
