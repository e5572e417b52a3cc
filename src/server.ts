import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createStudyApp } from "./app.js";
import { createAppServer } from "./appServer.js";
import { loadConfig } from "./config/env.js";
import { SessionRegistry } from "./services/sessionRegistry.js";

async function main() {
  const config = loadConfig();
  const app = await createStudyApp(config);
  const registry = new SessionRegistry(app.createSession);
  const server = createAppServer(registry);

  await server.connect(new StdioServerTransport());
  console.error(`study-guide-mcp running on stdio (provider: ${config.aiProvider})`);

  const shutdown = async () => {
    await server.close();
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});
