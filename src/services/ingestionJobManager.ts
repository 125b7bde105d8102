import { DocumentStore, joinStorePath } from "../domain/documentStore.js";
import {
  CorruptContentError,
  describeError,
  DocumentNotFoundError,
  InputError,
  isTransientError,
  JobNotFoundError,
  RetryExhaustedError,
  UnsupportedFormatError,
} from "../domain/errors.js";
import {
  assertTransition,
  FailedFile,
  IngestionJob,
  IngestionJobFields,
  IngestionStatus,
  JobRepository,
  Paginated,
} from "../domain/ingestionJob.js";
import { IndexStore } from "../domain/indexStore.js";
import { DocumentRecord } from "../domain/types.js";
import type { Logger } from "../infra/logging/logger.js";
import { DocumentReaderRegistry } from "../infra/parsers/documentLoader.js";
import { exportChronology } from "../pipelines/chronology.js";
import { DocumentIngestionPipeline } from "../pipelines/ingestion.js";
import { JobScheduler } from "./jobScheduler.js";

export const MAX_PAGE_SIZE = 100;

export interface IngestionJobManagerDeps {
  jobs: JobRepository;
  documents: DocumentStore;
  indexStore: IndexStore;
  pipeline: DocumentIngestionPipeline;
  readers: DocumentReaderRegistry;
  scheduler: JobScheduler;
  logger: Logger;
  maxFolderDepth: number;
  /** When set, completed jobs write a chronology file into this directory. */
  chronologyDir?: string | null;
  now?: () => Date;
}

interface FolderFile {
  path: string;
}

/**
 * Owns the ingestion job lifecycle. `startIngestion` records a PENDING job and
 * hands it to the scheduler; progress and outcome are only visible through the
 * job repository.
 */
export class IngestionJobManager {
  private readonly now: () => Date;

  constructor(private readonly deps: IngestionJobManagerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async startIngestion(folderPath: string): Promise<string> {
    const normalized = normalizeFolderPath(folderPath);
    const jobId = await this.deps.jobs.create({ folderPath: normalized });
    this.deps.logger.info("Ingestion job created", { jobId, folderPath: normalized });

    this.deps.scheduler.submit({
      id: jobId,
      key: normalized,
      run: () => this.runJob(jobId, normalized),
    });
    return jobId;
  }

  async getJob(jobId: string): Promise<IngestionJob> {
    const job = await this.deps.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  async listJobs(page = 1, pageSize = 20): Promise<Paginated<IngestionJob>> {
    if (!Number.isInteger(page) || page < 1) {
      throw new InputError(`page must be an integer >= 1, got ${page}.`);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new InputError(`page_size must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${pageSize}.`);
    }
    return this.deps.jobs.list(page, pageSize);
  }

  private async runJob(jobId: string, folderPath: string): Promise<void> {
    const logger = this.deps.logger.child({ jobId });
    let status: IngestionStatus = "PENDING";

    const transition = async (to: IngestionStatus, fields?: IngestionJobFields) => {
      if (to !== status) {
        assertTransition(status, to);
      }
      await this.deps.jobs.updateStatus(jobId, to, fields);
      status = to;
    };

    try {
      await transition("PROCESSING", { startedAt: this.now().toISOString() });
    } catch (error) {
      // Nothing can be recorded when the repository rejects the first write;
      // the job stays PENDING.
      logger.error("Could not start ingestion job, job left PENDING", {
        folderPath,
        error: describeError(error),
      });
      throw error;
    }
    logger.info("Ingestion job started", { folderPath });

    const failedFiles: FailedFile[] = [];
    const indexed: DocumentRecord[] = [];

    try {
      const files = await this.collectFiles(folderPath);
      logger.info("Folder listed", { files: files.length });

      for (const file of files) {
        try {
          const bytes = await this.fetchFile(file.path);
          const { document } = await this.deps.pipeline.ingest(file.path, bytes);
          indexed.push(document);
        } catch (error) {
          if (!isPerFileError(error)) {
            throw error;
          }
          failedFiles.push({ path: file.path, reason: describeError(error) });
          logger.warn("Skipping file", { path: file.path, error: describeError(error) });
        }
        await transition("PROCESSING", { processedFiles: indexed.length, failedFiles });
      }

      let artifactRef: string | null = null;
      if (this.deps.chronologyDir) {
        artifactRef = await exportChronology({
          indexStore: this.deps.indexStore,
          artifactDir: this.deps.chronologyDir,
          jobId,
          folderPath,
          documents: indexed,
        });
      }

      await transition("COMPLETED", {
        completedAt: this.now().toISOString(),
        processedFiles: indexed.length,
        failedFiles,
        artifactRef,
      });
      logger.info("Ingestion job completed", {
        processedFiles: indexed.length,
        failedFiles: failedFiles.length,
        artifactRef,
      });
    } catch (error) {
      const message = describeError(error);
      logger.error("Ingestion job failed", { error: message, processedFiles: indexed.length });
      await transition("FAILED", {
        completedAt: this.now().toISOString(),
        processedFiles: indexed.length,
        failedFiles,
        errorMessage: message || "Ingestion failed.",
      });
    }
  }

  /**
   * Download errors on a single file (denied, missing, rejected) become
   * {@link FileDownloadError}. Transient failures and retry exhaustion stay
   * fatal.
   */
  private async fetchFile(filePath: string): Promise<Buffer> {
    try {
      return await this.deps.documents.fetch(filePath);
    } catch (error) {
      if (error instanceof RetryExhaustedError || isTransientError(error)) {
        throw error;
      }
      throw new FileDownloadError(filePath, error);
    }
  }

  /**
   * Depth-first walk of the folder, `maxFolderDepth` levels deep, keeping files
   * with a supported extension. Returned in path order.
   */
  private async collectFiles(folderPath: string): Promise<FolderFile[]> {
    const files: FolderFile[] = [];

    const walk = async (current: string, depth: number): Promise<void> => {
      const entries = await this.deps.documents.list(current);
      for (const entry of entries) {
        const entryPath = joinStorePath(current, entry.name);
        if (entry.isFolder) {
          if (depth < this.deps.maxFolderDepth) {
            await walk(entryPath, depth + 1);
          }
          continue;
        }
        if (this.deps.readers.isSupported(entryPath)) {
          files.push({ path: entryPath });
        } else {
          this.deps.logger.debug("Ignoring unsupported file", { path: entryPath });
        }
      }
    };

    await walk(folderPath, 1);
    return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }
}

class FileDownloadError extends Error {
  constructor(readonly path: string, cause: unknown) {
    super(describeError(cause), { cause });
    this.name = "FileDownloadError";
  }
}

function isPerFileError(error: unknown): boolean {
  return (
    error instanceof FileDownloadError ||
    error instanceof UnsupportedFormatError ||
    error instanceof CorruptContentError ||
    error instanceof DocumentNotFoundError
  );
}

/**
 * Canonical store path: slashes only, no leading or trailing slash. Rejects
 * empty input, `..` segments and control characters.
 */
export function normalizeFolderPath(raw: string): string {
  if (typeof raw !== "string" || raw.trim() === "") {
    throw new InputError("Folder path must not be empty.");
  }
  if (/[\u0000-\u001f\u007f]/.test(raw)) {
    throw new InputError("Folder path must not contain control characters.");
  }

  const segments = raw
    .trim()
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".");
  if (segments.includes("..")) {
    throw new InputError("Folder path must not contain '..' segments.");
  }
  return segments.join("/");
}
