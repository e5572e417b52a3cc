import { ConceptRecord, DocumentStats, QuestionBatch } from "../domain/types.js";

export const HELP_TEXT = [
  "Here are the commands I understand:",
  "",
  "  summary            - Show the document summary",
  "  questions [n]      - Generate n more study questions (default: 5)",
  "  concepts [n]       - Show the key concepts",
  "  stats              - Show document statistics",
  "  help               - Show this help message",
  "  exit / quit        - Leave the session",
  "",
  "You can also ask naturally, like:",
  "  - Give me 10 more questions",
  "  - Summarize the main ideas",
  "  - What are the key concepts?",
].join("\n");

export const UNKNOWN_HINT = "I'm not sure what you mean. Type 'help' for available commands.";

export const GOODBYE_TEXT = "Thanks for studying! Good luck!";

export function formatQuestionBatch(batch: QuestionBatch, startNumber = 1): string {
  if (batch.returnedCount === 0) {
    return `No new questions could be generated (requested ${batch.requested}). The source material looks exhausted.`;
  }

  const lines = batch.questions.map((question, idx) => `${startNumber + idx}. ${question.text}`);
  if (batch.shortfall > 0) {
    lines.push("");
    lines.push(
      `Only ${batch.returnedCount} of ${batch.requested} requested questions were new; the source material is running out.`,
    );
  }
  return lines.join("\n");
}

export function formatConcepts(concepts: ConceptRecord[]): string {
  if (concepts.length === 0) {
    return "No key concepts were identified in this document.";
  }
  const width = String(concepts.length).length;
  return concepts
    .map((concept, idx) => `${String(idx + 1).padStart(width, " ")}. ${concept.displayText}`)
    .join("\n");
}

export function formatStats(stats: DocumentStats): string {
  return Object.entries(stats)
    .map(([key, value]) => `  ${titleCase(key)}: ${value}`)
    .join("\n");
}

function titleCase(key: string): string {
  return key
    .split("_")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}
