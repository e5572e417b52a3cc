import { createInterface } from "node:readline";
import { describeError } from "../domain/errors.js";
import { StudySession } from "./studySession.js";

const WELCOME = [
  "I've processed your document and prepared study materials.",
  "Type 'help' to see available commands, or 'exit' to quit.",
].join("\n");

/**
 * Reads one line at a time and answers it before reading the next. Ends on
 * `exit`/`quit` or when the input closes.
 */
export async function runChatLoop(
  session: StudySession,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Promise<void> {
  if (session.currentState === "ready") {
    session.startChat();
  }

  const rl = createInterface({ input, terminal: false });
  output.write(`${WELCOME}\n\n> `);

  try {
    for await (const line of rl) {
      const message = line.trim();
      if (!message) {
        output.write("> ");
        continue;
      }

      try {
        const turn = await session.handleTurn(message);
        output.write(`\n${turn.response}\n\n`);
        if (turn.state === "terminated") {
          break;
        }
      } catch (error) {
        output.write(`\nError: ${describeError(error)}\n\n`);
      }
      output.write("> ");
    }
  } finally {
    rl.close();
  }

  if (session.currentState !== "terminated") {
    session.finish();
  }
}
