import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { renderStudyGuide } from "../pipelines/studyGuide.js";
import { SessionRegistry } from "../services/sessionRegistry.js";
import { errorResult, jsonResult } from "./toolResult.js";

const sessionInput = {
  session_id: z.string().describe("Session returned by process_document"),
};

export function registerSessionQueryTools(server: McpServer, registry: SessionRegistry) {
  server.registerTool(
    "get_summary",
    {
      title: "Get Summary",
      description: "Returns the document summary of a session.",
      inputSchema: sessionInput,
    },
    async ({ session_id }) => {
      try {
        return jsonResult({ summary: registry.get(session_id).session.getSummary() });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  server.registerTool(
    "get_concepts",
    {
      title: "Get Concepts",
      description: "Returns the ranked key concepts of a session.",
      inputSchema: {
        ...sessionInput,
        top_k: z.number().int().min(1).max(100).optional().describe("Concepts to return"),
      },
    },
    async ({ session_id, top_k }) => {
      try {
        const concepts = registry.get(session_id).session.getConcepts(top_k);
        return jsonResult({
          concepts: concepts.map((concept) => ({
            text: concept.displayText,
            kind: concept.sourceKind,
            label: concept.label,
            occurrences: concept.occurrenceCount,
            score: Number(concept.aggregateScore.toFixed(4)),
          })),
        });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  server.registerTool(
    "get_stats",
    {
      title: "Get Stats",
      description: "Returns document and session counters.",
      inputSchema: sessionInput,
    },
    async ({ session_id }) => {
      try {
        return jsonResult(registry.get(session_id).session.getStats());
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  server.registerTool(
    "render_study_guide",
    {
      title: "Render Study Guide",
      description: "Returns the plain-text study guide with every question issued so far.",
      inputSchema: sessionInput,
    },
    async ({ session_id }) => {
      try {
        const { session } = registry.get(session_id);
        const text = renderStudyGuide({
          documentName: session.documentName ?? "document",
          generatedAt: new Date(),
          summary: session.getSummary(),
          questions: session.questions,
          concepts: session.getConcepts(),
        });
        return { content: [{ type: "text" as const, text }] };
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
