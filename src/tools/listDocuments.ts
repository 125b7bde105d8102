import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DocumentSearchService } from "../services/documentSearchService.js";
import { jsonResult } from "./toolResult.js";

export function registerListDocumentsTool(server: McpServer, service: DocumentSearchService) {
  server.registerTool(
    "list_documents",
    {
      title: "List Documents",
      description: "Lists indexed documents and their metadata.",
      inputSchema: {},
    },
    async () => {
      const documents = await service.listDocuments();
      return jsonResult({
        documents: documents.map((document) => ({
          document_id: document.id,
          name: document.name,
          source_path: document.sourcePath,
          page_count: document.pageCount,
          ingested_at: document.ingestedAt,
        })),
      });
    },
  );
}
