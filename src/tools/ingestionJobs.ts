import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentSearchService } from "../services/documentSearchService.js";
import { jsonResult, runTool, serializeJob } from "./toolResult.js";

export function registerIngestionJobTools(server: McpServer, service: DocumentSearchService) {
  server.registerTool(
    "get_ingestion_job",
    {
      title: "Get Ingestion Job",
      description: "Returns the status, counters and failed files of one ingestion job.",
      inputSchema: {
        job_id: z.string().describe("Id returned by start_ingestion"),
      },
    },
    async ({ job_id }) =>
      runTool(async () => jsonResult(serializeJob(await service.getJob(job_id)))),
  );

  server.registerTool(
    "list_ingestion_jobs",
    {
      title: "List Ingestion Jobs",
      description: "Lists ingestion jobs, newest first.",
      inputSchema: {
        page: z.number().int().optional().describe("1-based page number"),
        page_size: z.number().int().optional().describe("Jobs per page (1-100)"),
      },
    },
    async ({ page, page_size }) =>
      runTool(async () => {
        const result = await service.listJobs(page, page_size);
        return jsonResult({
          items: result.items.map(serializeJob),
          total: result.total,
          page: result.page,
          page_size: result.pageSize,
          total_pages: result.totalPages,
        });
      }),
  );
}
