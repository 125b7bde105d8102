import { IndexedDocumentNotFoundError, InputError } from "../domain/errors.js";
import { IngestionJob, Paginated } from "../domain/ingestionJob.js";
import { IndexStore } from "../domain/indexStore.js";
import { DocumentContent, DocumentRecord, SearchResult } from "../domain/types.js";
import { documentIdFor } from "../pipelines/ingestion.js";
import { HybridSearchEngine } from "./hybridSearchEngine.js";
import { IngestionJobManager, normalizeFolderPath } from "./ingestionJobManager.js";

export interface DocumentSearchServiceDeps {
  jobManager: IngestionJobManager;
  searchEngine: HybridSearchEngine;
  indexStore: IndexStore;
  defaultTopK: number;
}

/** Entry point for the transport layer. */
export class DocumentSearchService {
  constructor(private readonly deps: DocumentSearchServiceDeps) {}

  startIngestion(folderPath: string): Promise<string> {
    return this.deps.jobManager.startIngestion(folderPath);
  }

  getJob(jobId: string): Promise<IngestionJob> {
    return this.deps.jobManager.getJob(jobId);
  }

  listJobs(page?: number, pageSize?: number): Promise<Paginated<IngestionJob>> {
    return this.deps.jobManager.listJobs(page, pageSize);
  }

  search(queryText: string, topK: number = this.deps.defaultTopK): Promise<SearchResult> {
    return this.deps.searchEngine.search(queryText, topK);
  }

  listDocuments(): Promise<DocumentRecord[]> {
    return this.deps.indexStore.listDocuments();
  }

  /**
   * Indexed chunks of one document grouped by page, every page from 1 to the
   * page count included. `reference` is a document id or a source path.
   */
  async getDocumentContent(reference: string): Promise<DocumentContent> {
    const ref = typeof reference === "string" ? reference.trim() : "";
    if (!ref) {
      throw new InputError("Document reference must not be empty.");
    }

    const { indexStore } = this.deps;
    const document =
      (await indexStore.getDocument(ref)) ??
      (await indexStore.getDocument(documentIdFor(normalizeFolderPath(ref))));
    if (!document) {
      throw new IndexedDocumentNotFoundError(ref);
    }

    const chunks = await indexStore.listChunks(document.id);
    const lastPage = chunks.reduce((max, chunk) => Math.max(max, chunk.pageNumber), document.pageCount);
    const pages = Array.from({ length: lastPage }, (_, index) => ({
      pageNumber: index + 1,
      chunks: chunks.filter((chunk) => chunk.pageNumber === index + 1),
    }));

    return { document, pages };
  }
}
