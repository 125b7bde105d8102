import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SearchHit, SearchResult } from "../domain/types.js";
import { DocumentSearchService } from "../services/documentSearchService.js";
import { jsonResult, runTool } from "./toolResult.js";

export function registerSearchDocumentsTool(server: McpServer, service: DocumentSearchService) {
  server.registerTool(
    "search_documents",
    {
      title: "Search Documents",
      description:
        "Hybrid keyword + semantic search. Keyword hits come first, then semantic hits, grouped by document.",
      inputSchema: {
        query: z.string().describe("Search query"),
        top_k: z.number().int().optional().describe("Max hits across all documents"),
      },
    },
    async ({ query, top_k }) =>
      runTool(async () => jsonResult(serializeSearchResult(await service.search(query, top_k)))),
  );
}

function serializeSearchResult(result: SearchResult) {
  return {
    query: result.query,
    keywords: result.keywords,
    total_hits: result.totalHits,
    groups: result.groups.map((group) => ({
      document_id: group.documentId,
      document_name: group.documentName,
      source_path: group.sourcePath,
      hits: group.hits.map(serializeHit),
    })),
  };
}

function serializeHit(hit: SearchHit) {
  return {
    chunk_id: hit.chunkId,
    kind: hit.kind,
    score: roundScore(hit.score),
    keyword_score: hit.keywordScore === null ? null : roundScore(hit.keywordScore),
    semantic_score: hit.semanticScore === null ? null : roundScore(hit.semanticScore),
    matched_keywords: hit.matchedKeywords,
    keyword_dates: hit.keywordDates,
    dates: hit.dates,
    summary: hit.summary,
    highlights: hit.highlights,
    page_number: hit.pageNumber,
    section: hit.section,
    text: hit.text,
  };
}

function roundScore(score: number): number {
  return Number(score.toFixed(4));
}
