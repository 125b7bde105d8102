import { RetryPolicy } from "../../config/env.js";
import { IndexStore } from "../../domain/indexStore.js";
import { ChunkRecord, DocumentRecord, KeywordStoredHit, StoredHit } from "../../domain/types.js";
import { Sleep, withRetry } from "../../utils/retry.js";
import type { Logger } from "../logging/logger.js";

/**
 * Retries transient failures of the wrapped store. Callers only see an error
 * once the policy is exhausted.
 */
export class ResilientIndexStore implements IndexStore {
  constructor(
    private readonly inner: IndexStore,
    private readonly policy: RetryPolicy,
    private readonly logger?: Logger,
    private readonly sleep?: Sleep,
  ) {}

  upsertDocument(document: DocumentRecord): Promise<void> {
    return this.run("index.upsertDocument", () => this.inner.upsertDocument(document));
  }

  upsert(chunk: ChunkRecord): Promise<void> {
    return this.run("index.upsert", () => this.inner.upsert(chunk));
  }

  replaceDocument(document: DocumentRecord, chunks: ChunkRecord[]): Promise<void> {
    return this.run("index.replaceDocument", () => this.inner.replaceDocument(document, chunks));
  }

  deleteByDocument(documentId: string): Promise<number> {
    return this.run("index.deleteByDocument", () => this.inner.deleteByDocument(documentId));
  }

  keywordSearch(keywords: string[], topK: number): Promise<KeywordStoredHit[]> {
    return this.run("index.keywordSearch", () => this.inner.keywordSearch(keywords, topK));
  }

  vectorSearch(queryVector: number[], topK: number): Promise<StoredHit[]> {
    return this.run("index.vectorSearch", () => this.inner.vectorSearch(queryVector, topK));
  }

  getDocument(documentId: string): Promise<DocumentRecord | null> {
    return this.run("index.getDocument", () => this.inner.getDocument(documentId));
  }

  listDocuments(): Promise<DocumentRecord[]> {
    return this.run("index.listDocuments", () => this.inner.listDocuments());
  }

  listChunks(documentId: string): Promise<ChunkRecord[]> {
    return this.run("index.listChunks", () => this.inner.listChunks(documentId));
  }

  clear(): Promise<{ cleared_documents: number; cleared_chunks: number }> {
    return this.run("index.clear", () => this.inner.clear());
  }

  private run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    return withRetry(task, {
      policy: this.policy,
      operation,
      logger: this.logger,
      sleep: this.sleep,
    });
  }
}
