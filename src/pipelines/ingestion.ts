import { createHash } from "node:crypto";
import path from "node:path";
import { ChunkingOptions, RetryPolicy } from "../config/env.js";
import { IndexStore } from "../domain/indexStore.js";
import { ChunkRecord, DocumentRecord } from "../domain/types.js";
import { EmbeddingEngine } from "../infra/ai/types.js";
import type { Logger } from "../infra/logging/logger.js";
import { DocumentReaderRegistry } from "../infra/parsers/documentLoader.js";
import { Sleep, withRetry } from "../utils/retry.js";
import { DEFAULT_CHUNKING, segmentPages } from "./chunking.js";
import { extractDates } from "./metadata.js";

const EMBEDDING_BATCH_SIZE = 32;

export interface DocumentIngestionDeps {
  indexStore: IndexStore;
  embeddingEngine: EmbeddingEngine;
  readers: DocumentReaderRegistry;
  retry: RetryPolicy;
  logger: Logger;
  chunking?: ChunkingOptions;
  now?: () => Date;
  sleep?: Sleep;
}

export interface IngestedDocument {
  document: DocumentRecord;
  chunkCount: number;
}

export function documentIdFor(sourcePath: string): string {
  return `doc_${createHash("sha1").update(sourcePath).digest("hex").slice(0, 16)}`;
}

/**
 * Turns the bytes of one file into an indexed document: read pages, segment,
 * extract dates, embed, then replace whatever the index held for that path.
 */
export class DocumentIngestionPipeline {
  private readonly chunking: ChunkingOptions;

  private readonly now: () => Date;

  // Tail of the pending writes per document id.
  private readonly documentLocks = new Map<string, Promise<void>>();

  constructor(private readonly deps: DocumentIngestionDeps) {
    this.chunking = deps.chunking ?? DEFAULT_CHUNKING;
    this.now = deps.now ?? (() => new Date());
  }

  async ingest(sourcePath: string, bytes: Buffer): Promise<IngestedDocument> {
    const { readers, logger } = this.deps;

    const reader = readers.readerFor(sourcePath);
    const pages = await reader.extractPages(bytes);
    const segments = segmentPages(pages, this.chunking);
    const embeddings = await this.embed(segments.map((segment) => segment.text));

    const documentId = documentIdFor(sourcePath);
    const document: DocumentRecord = {
      id: documentId,
      name: path.posix.basename(sourcePath),
      sourcePath,
      pageCount: pages.length,
      ingestedAt: this.now().toISOString(),
    };
    const chunks: ChunkRecord[] = segments.map((segment, i) => ({
      id: `${documentId}:${segment.index}`,
      documentId,
      index: segment.index,
      pageNumber: segment.pageNumber,
      section: segment.section,
      text: segment.text,
      startOffset: segment.startOffset,
      endOffset: segment.endOffset,
      embedding: embeddings[i],
      dates: extractDates(segment.text),
    }));

    await this.withDocumentLock(documentId, () =>
      this.deps.indexStore.replaceDocument(document, chunks),
    );

    logger.info("Indexed document", {
      sourcePath,
      documentId,
      format: reader.format,
      pages: pages.length,
      chunks: chunks.length,
    });
    return { document, chunkCount: chunks.length };
  }

  private async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(start, start + EMBEDDING_BATCH_SIZE);
      const embedded = await withRetry(() => this.deps.embeddingEngine.embedBatch(batch), {
        policy: this.deps.retry,
        operation: "embedding.embedBatch",
        logger: this.deps.logger,
        sleep: this.deps.sleep,
      });
      vectors.push(...embedded);
    }
    return vectors;
  }

  /**
   * Runs `task` after every earlier task for the same document id has settled,
   * so two re-ingestions of one document never interleave.
   */
  private async withDocumentLock<T>(documentId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.documentLocks.get(documentId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.documentLocks.set(documentId, tail);

    try {
      return await run;
    } finally {
      if (this.documentLocks.get(documentId) === tail) {
        this.documentLocks.delete(documentId);
      }
    }
  }
}
