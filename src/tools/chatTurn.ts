import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SessionRegistry } from "../services/sessionRegistry.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerChatTurnTool(server: McpServer, registry: SessionRegistry) {
  server.registerTool(
    "chat_turn",
    {
      title: "Chat Turn",
      description:
        "Sends one chat message (a command such as 'questions 5' or a request such as 'give me 10 more questions') to a session.",
      inputSchema: {
        session_id: z.string().describe("Session returned by process_document"),
        message: z.string().min(1).describe("User message"),
      },
    },
    async ({ session_id, message }) => {
      try {
        const entry = registry.get(session_id);
        const turn = await entry.session.handleTurn(message);
        if (turn.state === "terminated") {
          registry.remove(session_id);
        }
        return jsonResult({
          intent: turn.intent,
          response: turn.response,
          state: turn.state,
        });
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
