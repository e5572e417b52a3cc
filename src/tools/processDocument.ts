import path from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { loadDocumentText } from "../infra/parsers/documentLoader.js";
import { SessionRegistry } from "../services/sessionRegistry.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerProcessDocumentTool(server: McpServer, registry: SessionRegistry) {
  server.registerTool(
    "process_document",
    {
      title: "Process Document",
      description:
        "Builds a study guide (summary, study questions, key concepts) for one document and opens a session for follow-up requests.",
      inputSchema: {
        path: z.string().optional().describe("Path to a .txt, .md or .pdf file"),
        content: z.string().optional().describe("Raw document text, used when no path is given"),
        name: z.string().optional().describe("Display name for raw content"),
      },
    },
    async ({ path: filePath, content, name }) => {
      try {
        if (!filePath && !content) {
          throw new Error("Provide either path or content.");
        }
        const text = filePath ? await loadDocumentText(path.resolve(filePath)) : (content ?? "");
        const documentName = filePath ? path.basename(filePath) : name?.trim() || "document.txt";

        const entry = registry.create();
        try {
          const result = await entry.session.process({ name: documentName, text });
          return jsonResult({
            session_id: entry.id,
            document: documentName,
            summary: result.summary,
            questions: result.questions.map((question) => question.text),
            questions_requested: result.requestedQuestions,
            questions_returned: result.returnedCount,
            concepts: result.concepts.map((concept) => concept.displayText),
          });
        } catch (error) {
          registry.remove(entry.id);
          throw error;
        }
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
