import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SessionRegistry } from "../services/sessionRegistry.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerMoreQuestionsTool(server: McpServer, registry: SessionRegistry) {
  server.registerTool(
    "more_questions",
    {
      title: "More Questions",
      description: "Generates study questions that were not issued earlier in the session.",
      inputSchema: {
        session_id: z.string().describe("Session returned by process_document"),
        count: z.number().int().min(1).max(50).optional().describe("Questions to generate"),
      },
    },
    async ({ session_id, count }) => {
      try {
        const { session } = registry.get(session_id);
        const batch = await session.moreQuestions(count);
        return jsonResult({
          questions: batch.questions.map((question) => question.text),
          requested: batch.requested,
          returned_count: batch.returnedCount,
          round: batch.round,
        });
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
