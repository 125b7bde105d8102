import path from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AppConfig, ChunkingOptions, RetryPolicy } from "./config/env.js";
import { DocumentStore } from "./domain/documentStore.js";
import { IndexStore } from "./domain/indexStore.js";
import { JobRepository } from "./domain/ingestionJob.js";
import { createEmbeddingEngine } from "./infra/ai/createEmbeddingEngine.js";
import { EmbeddingEngine } from "./infra/ai/types.js";
import { createDocumentStore } from "./infra/documents/createDocumentStore.js";
import { createJobRepository } from "./infra/jobs/createJobRepository.js";
import { Logger, logger as rootLogger, moduleLogger } from "./infra/logging/logger.js";
import { DocumentReaderRegistry } from "./infra/parsers/documentLoader.js";
import { createIndexStore } from "./infra/store/createIndexStore.js";
import { DocumentIngestionPipeline } from "./pipelines/ingestion.js";
import { MetadataExtractor } from "./pipelines/metadata.js";
import { DocumentSearchService } from "./services/documentSearchService.js";
import { HybridSearchEngine } from "./services/hybridSearchEngine.js";
import { IngestionJobManager } from "./services/ingestionJobManager.js";
import { JobScheduler } from "./services/jobScheduler.js";
import { registerGetDocumentTool } from "./tools/getDocument.js";
import { registerIngestionJobTools } from "./tools/ingestionJobs.js";
import { registerListDocumentsTool } from "./tools/listDocuments.js";
import { registerSearchDocumentsTool } from "./tools/searchDocuments.js";
import { registerStartIngestionTool } from "./tools/startIngestion.js";
import { jsonResult } from "./tools/toolResult.js";

export const SERVER_NAME = "medical-doc-search";
export const SERVER_VERSION = "0.1.0";

export interface AppComponents {
  indexStore: IndexStore;
  jobs: JobRepository;
  documents: DocumentStore;
  embeddingEngine: EmbeddingEngine;
}

export interface AppSettings {
  retry: RetryPolicy;
  chunking: ChunkingOptions;
  dateWindowWords: number;
  maxConcurrentJobs: number;
  maxFolderDepth: number;
  defaultTopK: number;
  /** Directory for chronology files; null disables the export. */
  chronologyDir: string | null;
}

export interface App {
  service: DocumentSearchService;
  scheduler: JobScheduler;
  indexStore: IndexStore;
  /** Waits for running jobs, then releases the stores. */
  close: () => Promise<void>;
}

/**
 * Wires services on top of already-constructed infrastructure.
 */
export function buildApp(
  components: AppComponents,
  settings: AppSettings,
  options: { logger?: Logger; closeResources?: () => Promise<void>; now?: () => Date } = {},
): App {
  const logger = options.logger ?? rootLogger;
  const { indexStore, jobs, documents, embeddingEngine } = components;

  const readers = new DocumentReaderRegistry();
  const scheduler = new JobScheduler(settings.maxConcurrentJobs, moduleLogger("scheduler", logger));
  const pipeline = new DocumentIngestionPipeline({
    indexStore,
    embeddingEngine,
    readers,
    retry: settings.retry,
    chunking: settings.chunking,
    logger: moduleLogger("ingestion", logger),
    now: options.now,
  });
  const jobManager = new IngestionJobManager({
    jobs,
    documents,
    indexStore,
    pipeline,
    readers,
    scheduler,
    logger: moduleLogger("jobs", logger),
    maxFolderDepth: settings.maxFolderDepth,
    chronologyDir: settings.chronologyDir,
    now: options.now,
  });
  const searchEngine = new HybridSearchEngine({
    indexStore,
    embeddingEngine,
    metadata: new MetadataExtractor({ dateWindowWords: settings.dateWindowWords }),
    retry: settings.retry,
    logger: moduleLogger("search", logger),
  });
  const service = new DocumentSearchService({
    jobManager,
    searchEngine,
    indexStore,
    defaultTopK: settings.defaultTopK,
  });

  const closeResources = options.closeResources ?? (async () => {});

  return {
    service,
    scheduler,
    indexStore,
    close: async () => {
      await scheduler.whenIdle();
      await closeResources();
    },
  };
}

export async function createApp(config: AppConfig, logger: Logger = rootLogger): Promise<App> {
  const embeddingEngine = createEmbeddingEngine(config, logger);
  await embeddingEngine.initialize();

  const { indexStore, close: closeIndex } = await createIndexStore(config, logger);
  let jobRepository: Awaited<ReturnType<typeof createJobRepository>>;
  try {
    jobRepository = await createJobRepository(config, logger);
  } catch (error) {
    await closeIndex();
    throw error;
  }

  return buildApp(
    {
      indexStore,
      jobs: jobRepository.jobRepository,
      documents: createDocumentStore(config, logger),
      embeddingEngine,
    },
    {
      retry: config.retry,
      chunking: config.chunking,
      dateWindowWords: config.dateWindowWords,
      maxConcurrentJobs: config.maxConcurrentJobs,
      maxFolderDepth: config.maxFolderDepth,
      defaultTopK: config.defaultTopK,
      chronologyDir: config.exportChronology ? path.resolve(config.artifactDir) : null,
    },
    {
      logger,
      closeResources: async () => {
        await jobRepository.close();
        await closeIndex();
      },
    },
  );
}

export async function healthReport(app: App) {
  const documents = await app.indexStore.listDocuments();
  return {
    status: "ok",
    server: SERVER_NAME,
    indexed_documents: documents.length,
    running_jobs: app.scheduler.runningCount,
    queued_jobs: app.scheduler.pendingCount,
  };
}

export function createAppServer(app: App): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns server status, indexed document count and job queue depth.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) =>
      jsonResult({ ...(await healthReport(app)), caller: name?.trim() || "anonymous" }),
  );

  registerStartIngestionTool(server, app.service);
  registerIngestionJobTools(server, app.service);
  registerSearchDocumentsTool(server, app.service);
  registerListDocumentsTool(server, app.service);
  registerGetDocumentTool(server, app.service);

  return server;
}
