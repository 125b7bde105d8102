import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentContent } from "../domain/types.js";
import { DocumentSearchService } from "../services/documentSearchService.js";
import { jsonResult, runTool } from "./toolResult.js";

export function registerGetDocumentTool(server: McpServer, service: DocumentSearchService) {
  server.registerTool(
    "get_document",
    {
      title: "Get Document",
      description: "Returns the indexed text of one document page by page, with dates found on each chunk.",
      inputSchema: {
        document: z.string().describe("Document id from search results, or its source path"),
      },
    },
    async ({ document }) =>
      runTool(async () => jsonResult(serializeContent(await service.getDocumentContent(document)))),
  );
}

function serializeContent({ document, pages }: DocumentContent) {
  return {
    document_id: document.id,
    name: document.name,
    source_path: document.sourcePath,
    page_count: document.pageCount,
    ingested_at: document.ingestedAt,
    pages: pages.map((page) => ({
      page_number: page.pageNumber,
      chunks: page.chunks.map((chunk) => ({
        chunk_id: chunk.id,
        section: chunk.section,
        dates: chunk.dates,
        text: chunk.text,
      })),
    })),
  };
}
