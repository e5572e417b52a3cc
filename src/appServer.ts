import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SessionRegistry } from "./services/sessionRegistry.js";
import { registerChatTurnTool } from "./tools/chatTurn.js";
import { registerCloseSessionTool } from "./tools/closeSession.js";
import { registerMoreQuestionsTool } from "./tools/moreQuestions.js";
import { registerProcessDocumentTool } from "./tools/processDocument.js";
import { registerSessionQueryTools } from "./tools/sessionQueries.js";

export function createAppServer(registry: SessionRegistry): McpServer {
  const server = new McpServer({
    name: "study-guide-mcp",
    version: "0.1.0",
  });

  registerProcessDocumentTool(server, registry);
  registerMoreQuestionsTool(server, registry);
  registerSessionQueryTools(server, registry);
  registerChatTurnTool(server, registry);
  registerCloseSessionTool(server, registry);

  return server;
}
