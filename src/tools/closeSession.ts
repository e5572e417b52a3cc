import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SessionRegistry } from "../services/sessionRegistry.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerCloseSessionTool(server: McpServer, registry: SessionRegistry) {
  server.registerTool(
    "close_session",
    {
      title: "Close Session",
      description: "Ends a session and releases its document, summary and issued questions.",
      inputSchema: {
        session_id: z.string().describe("Session returned by process_document"),
      },
    },
    async ({ session_id }) => {
      try {
        const { session } = registry.get(session_id);
        session.finish();
        registry.remove(session_id);
        return jsonResult({ session_id, closed: true, open_sessions: registry.list().length });
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
