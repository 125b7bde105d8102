import {
  describeError,
  IndexedDocumentNotFoundError,
  InputError,
  JobNotFoundError,
} from "../domain/errors.js";
import { IngestionJob } from "../domain/ingestionJob.js";

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function jsonResult(payload: unknown): ToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/**
 * Caller mistakes become tool errors the client can show; anything else is
 * rethrown for the server to report.
 */
export async function runTool(task: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await task();
  } catch (error) {
    if (
      error instanceof InputError ||
      error instanceof JobNotFoundError ||
      error instanceof IndexedDocumentNotFoundError
    ) {
      return {
        content: [{ type: "text", text: describeError(error) }],
        isError: true,
      };
    }
    throw error;
  }
}

export function serializeJob(job: IngestionJob) {
  return {
    job_id: job.id,
    folder_path: job.folderPath,
    status: job.status,
    created_at: job.createdAt,
    started_at: job.startedAt,
    completed_at: job.completedAt,
    processed_files: job.processedFiles,
    failed_files: job.failedFiles,
    error_message: job.errorMessage,
    artifact_ref: job.artifactRef,
  };
}
