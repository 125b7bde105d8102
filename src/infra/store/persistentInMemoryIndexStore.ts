import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ChunkRecord, DocumentRecord, KeywordStoredHit, StoredHit } from "../../domain/types.js";
import { InMemoryIndexSnapshot, InMemoryIndexStore } from "./inMemoryIndexStore.js";

const CURRENT_FORMAT_VERSION = 1;

const documentSchema = z.object({
  id: z.string(),
  name: z.string(),
  sourcePath: z.string(),
  pageCount: z.number().int().nonnegative(),
  ingestedAt: z.string(),
});

const chunkSchema = z.object({
  id: z.string(),
  documentId: z.string(),
  index: z.number().int().nonnegative(),
  pageNumber: z.number().int().positive(),
  section: z.string().nullable(),
  text: z.string(),
  startOffset: z.number().int().nonnegative(),
  endOffset: z.number().int().nonnegative(),
  embedding: z.array(z.number()),
  dates: z.array(z.string()),
});

const persistedIndexSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  snapshot: z.object({
    documents: z.array(documentSchema),
    chunks: z.array(chunkSchema),
  }),
});

type PersistedIndex = z.infer<typeof persistedIndexSchema>;

export interface PersistentInMemoryOptions {
  maxBytes: number;
}

export interface InMemoryIndexStorageInfo {
  path: string;
  exists: boolean;
  format_version: number;
  max_bytes: number;
  size_bytes: number;
  utilization_ratio: number;
}

/**
 * In-memory index mirrored to a JSON snapshot. Every mutation rewrites the
 * snapshot through a temp file and a rename; writes are queued so they land
 * in mutation order.
 */
export class PersistentInMemoryIndexStore extends InMemoryIndexStore {
  private initPromise: Promise<void> | null = null;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly options: PersistentInMemoryOptions,
  ) {
    super();
    this.absolutePath = path.resolve(filePath);
  }

  initialize(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.load();
    }
    return this.initPromise;
  }

  async upsertDocument(document: DocumentRecord): Promise<void> {
    await this.initialize();
    await super.upsertDocument(document);
    await this.persist();
  }

  async upsert(chunk: ChunkRecord): Promise<void> {
    await this.initialize();
    await super.upsert(chunk);
    await this.persist();
  }

  async replaceDocument(document: DocumentRecord, chunks: ChunkRecord[]): Promise<void> {
    await this.initialize();
    await super.replaceDocument(document, chunks);
    await this.persist();
  }

  async deleteByDocument(documentId: string): Promise<number> {
    await this.initialize();
    const removed = await super.deleteByDocument(documentId);
    await this.persist();
    return removed;
  }

  async keywordSearch(keywords: string[], topK: number): Promise<KeywordStoredHit[]> {
    await this.initialize();
    return super.keywordSearch(keywords, topK);
  }

  async vectorSearch(queryVector: number[], topK: number): Promise<StoredHit[]> {
    await this.initialize();
    return super.vectorSearch(queryVector, topK);
  }

  async getDocument(documentId: string): Promise<DocumentRecord | null> {
    await this.initialize();
    return super.getDocument(documentId);
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    await this.initialize();
    return super.listDocuments();
  }

  async listChunks(documentId: string): Promise<ChunkRecord[]> {
    await this.initialize();
    return super.listChunks(documentId);
  }

  async clear(): Promise<{ cleared_documents: number; cleared_chunks: number }> {
    await this.initialize();
    const cleared = await super.clear();
    await this.persist();
    return cleared;
  }

  async getStorageInfo(): Promise<InMemoryIndexStorageInfo> {
    await this.initialize();
    const stats = await this.readStorageStat();
    return {
      path: this.absolutePath,
      exists: stats.exists,
      format_version: CURRENT_FORMAT_VERSION,
      max_bytes: this.options.maxBytes,
      size_bytes: stats.sizeBytes,
      utilization_ratio:
        this.options.maxBytes > 0 ? Number((stats.sizeBytes / this.options.maxBytes).toFixed(4)) : 0,
    };
  }

  async close(): Promise<void> {
    await this.initialize();
    await this.writeChain;
  }

  private async load(): Promise<void> {
    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.absolutePath, "utf-8");
    } catch (error) {
      if (isFileMissing(error)) {
        return;
      }
      throw error;
    }

    this.importSnapshot(parseSnapshotFromDisk(JSON.parse(raw)));
  }

  private persist(): Promise<void> {
    // Snapshot now so the queued write reflects this mutation, not a later one.
    const payload: PersistedIndex = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };
    const task = () => this.writeSnapshot(payload);
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  private async writeSnapshot(payload: PersistedIndex): Promise<void> {
    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `In-memory index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, this.absolutePath, serialized);
  }

  private async readStorageStat(): Promise<{ exists: boolean; sizeBytes: number }> {
    try {
      const stat = await fs.stat(this.absolutePath);
      return { exists: true, sizeBytes: stat.size };
    } catch (error) {
      if (isFileMissing(error)) {
        return { exists: false, sizeBytes: 0 };
      }
      throw error;
    }
  }
}

function parseSnapshotFromDisk(raw: unknown): InMemoryIndexSnapshot {
  const parsed = persistedIndexSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid in-memory index snapshot format: ${parsed.error.message}`);
  }
  if (parsed.data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new Error(
      `Unsupported in-memory index format version: ${parsed.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  return parsed.data.snapshot;
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Last fallback for Windows file-lock edge cases.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}
