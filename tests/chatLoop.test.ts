import { Readable, Writable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GOODBYE_TEXT } from "../src/session/chatResponses.js";
import { runChatLoop } from "../src/session/chatLoop.js";
import { createTestSession, PHOTOSYNTHESIS_TEXT } from "./helpers/session.js";

function collectingStream(): { stream: Writable; text: () => string } {
  const parts: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      parts.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => parts.join("") };
}

describe("chat loop", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers each line and stops on exit", async () => {
    const session = createTestSession();
    await session.process({ name: "plants.txt", text: PHOTOSYNTHESIS_TEXT });
    const output = collectingStream();

    await runChatLoop(session, Readable.from(["concepts\n", "\n", "exit\n", "summary\n"]), output.stream);

    expect(output.text()).toContain("\n1. photosynthesis\n\n> ");
    expect(output.text()).toContain(`\n${GOODBYE_TEXT}\n\n`);
    expect(output.text()).not.toContain("Photosynthesis lets plants");
    expect(session.currentState).toBe("terminated");
    expect(session.getStats().turn_count).toBe(2);
  });

  it("terminates the session when input runs out", async () => {
    const session = createTestSession();
    await session.process({ name: "plants.txt", text: PHOTOSYNTHESIS_TEXT });

    await runChatLoop(session, Readable.from(["stats\n"]), collectingStream().stream);

    expect(session.currentState).toBe("terminated");
    expect(session.lastCommandKind).toBe("stats");
  });
});
