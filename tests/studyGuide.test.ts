import { describe, expect, it } from "vitest";
import { defaultStudyGuidePath, formatTimestamp, renderStudyGuide } from "../src/pipelines/studyGuide.js";

describe("study guide rendering", () => {
  it("writes the fixed sections with numbered lists", () => {
    const text = renderStudyGuide({
      documentName: "biology.pdf",
      generatedAt: new Date(2024, 0, 5, 9, 3, 7),
      summary: "Cells are the basic unit of life.",
      questions: [{ text: "What is a cell?" }, { text: "Why do cells divide?" }],
      concepts: [{ displayText: "cell" }, { displayText: "mitosis" }],
    });

    expect(text.split("\n")).toEqual([
      "=".repeat(60),
      "  STUDY GUIDE",
      "=".repeat(60),
      "",
      "Document: biology.pdf",
      "Generated: 2024-01-05 09:03:07",
      "",
      "SUMMARY",
      "-".repeat(60),
      "Cells are the basic unit of life.",
      "",
      "STUDY QUESTIONS",
      "-".repeat(60),
      "1. What is a cell?",
      "2. Why do cells divide?",
      "",
      "KEY CONCEPTS",
      "-".repeat(60),
      "1. cell",
      "2. mitosis",
      "",
    ]);
  });

  it("derives the output file name from the document", () => {
    expect(defaultStudyGuidePath("notes/biology.pdf")).toBe("biology_study_guide.txt");
    expect(formatTimestamp(new Date(2023, 10, 30, 23, 59, 0))).toBe("2023-11-30 23:59:00");
  });
});
