#!/usr/bin/env node
import { promises as fs } from "node:fs";
import path from "node:path";
import { parseArgs } from "node:util";
import "dotenv/config";
import { createStudyApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { loadDocumentText } from "./infra/parsers/documentLoader.js";
import { defaultStudyGuidePath, renderStudyGuide } from "./pipelines/studyGuide.js";
import { runChatLoop } from "./session/chatLoop.js";

const USAGE = `Usage: study-guide <file> [options]

Options:
  -n, --num-questions <n>  Number of questions to generate (default: 15)
  -o, --output <path>      Output file path
  -q, --quiet              Do not print the study guide
      --no-save            Do not write the study guide to a file
      --chat               Start an interactive chat after processing
  -h, --help               Show this message`;

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      "num-questions": { type: "string", short: "n" },
      output: { type: "string", short: "o" },
      quiet: { type: "boolean", short: "q", default: false },
      "no-save": { type: "boolean", default: false },
      chat: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const [filePath] = positionals;
  if (values.help || !filePath) {
    console.log(USAGE);
    process.exit(values.help ? 0 : 1);
  }

  const config = loadConfig();
  const requested = values["num-questions"];
  if (requested !== undefined) {
    const count = Number(requested);
    if (!Number.isInteger(count) || count <= 0) {
      throw new Error(`--num-questions must be a positive integer, got ${requested}.`);
    }
    config.questions.initialCount = count;
  }

  const app = await createStudyApp(config);
  try {
    const absolutePath = path.resolve(filePath);
    const text = await loadDocumentText(absolutePath);
    const session = app.createSession();
    const documentName = path.basename(absolutePath);
    const result = await session.process({ name: documentName, text });

    const guide = renderStudyGuide({
      documentName,
      generatedAt: new Date(),
      summary: result.summary,
      questions: result.questions,
      concepts: result.concepts,
    });

    if (!values.quiet) {
      console.log(guide);
    }
    if (result.returnedCount < result.requestedQuestions) {
      console.error(
        `Generated ${result.returnedCount} of ${result.requestedQuestions} requested questions.`,
      );
    }
    if (!values["no-save"]) {
      const outputPath = values.output ?? defaultStudyGuidePath(documentName);
      await fs.writeFile(outputPath, guide, "utf-8");
      console.error(`Study guide saved to ${outputPath}`);
    }

    if (values.chat) {
      await runChatLoop(session, process.stdin, process.stdout);
    } else {
      session.finish();
    }
  } finally {
    await app.close();
  }
}

main().catch((error) => {
  console.error("study-guide failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
