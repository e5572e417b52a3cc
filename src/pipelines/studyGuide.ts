import path from "node:path";
import { ConceptRecord, Question } from "../domain/types.js";

const RULE = "-".repeat(60);
const BANNER = "=".repeat(60);

export interface StudyGuideContent {
  documentName: string;
  generatedAt: Date;
  summary: string;
  questions: Array<Pick<Question, "text">>;
  concepts: Array<Pick<ConceptRecord, "displayText">>;
}

export function renderStudyGuide(content: StudyGuideContent): string {
  const lines = [
    BANNER,
    "  STUDY GUIDE",
    BANNER,
    "",
    `Document: ${content.documentName}`,
    `Generated: ${formatTimestamp(content.generatedAt)}`,
    "",
    "SUMMARY",
    RULE,
    content.summary,
    "",
    "STUDY QUESTIONS",
    RULE,
    ...content.questions.map((question, idx) => `${idx + 1}. ${question.text}`),
    "",
    "KEY CONCEPTS",
    RULE,
    ...content.concepts.map((concept, idx) => `${idx + 1}. ${concept.displayText}`),
    "",
  ];
  return lines.join("\n");
}

export function defaultStudyGuidePath(documentName: string): string {
  const base = path.basename(documentName, path.extname(documentName));
  return `${base}_study_guide.txt`;
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
