import { ChunkRecord, DocumentRecord, KeywordStoredHit, StoredHit } from "./types.js";

/**
 * Dual index over chunks: an inverted keyword index and a vector index, both
 * addressed by chunk id.
 */
export interface IndexStore {
  upsertDocument(document: DocumentRecord): Promise<void>;
  /** Writes or overwrites one chunk; idempotent on the chunk id. */
  upsert(chunk: ChunkRecord): Promise<void>;
  /**
   * Deletes every chunk of the document and writes the new record and chunks
   * as one unit, so searches never see old and new chunks side by side.
   */
  replaceDocument(document: DocumentRecord, chunks: ChunkRecord[]): Promise<void>;
  /** Removes the document and all of its chunks. Returns the removed chunk count. */
  deleteByDocument(documentId: string): Promise<number>;
  keywordSearch(keywords: string[], topK: number): Promise<KeywordStoredHit[]>;
  vectorSearch(queryVector: number[], topK: number): Promise<StoredHit[]>;
  getDocument(documentId: string): Promise<DocumentRecord | null>;
  listDocuments(): Promise<DocumentRecord[]>;
  /** Chunks of one document in page/offset order. */
  listChunks(documentId: string): Promise<ChunkRecord[]>;
  clear(): Promise<{ cleared_documents: number; cleared_chunks: number }>;
}
