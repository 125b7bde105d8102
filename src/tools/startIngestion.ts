import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentSearchService } from "../services/documentSearchService.js";
import { jsonResult, runTool } from "./toolResult.js";

export function registerStartIngestionTool(server: McpServer, service: DocumentSearchService) {
  server.registerTool(
    "start_ingestion",
    {
      title: "Start Ingestion",
      description:
        "Queues ingestion of a folder from the document store. Returns a job id immediately; poll get_ingestion_job for progress.",
      inputSchema: {
        folder_path: z.string().describe("Folder path relative to the document store root"),
      },
    },
    async ({ folder_path }) =>
      runTool(async () => {
        const jobId = await service.startIngestion(folder_path);
        return jsonResult({ job_id: jobId, status: "PENDING" });
      }),
  );
}
