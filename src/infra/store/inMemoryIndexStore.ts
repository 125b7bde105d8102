import { IndexStore } from "../../domain/indexStore.js";
import { ChunkRecord, DocumentRecord, KeywordStoredHit, StoredHit } from "../../domain/types.js";
import { escapeRegExp, tokenizeForBm25 } from "../../utils/text.js";
import { cosineSimilarity } from "../../utils/vector.js";

export interface InMemoryIndexSnapshot {
  documents: DocumentRecord[];
  chunks: ChunkRecord[];
}

interface Bm25Document {
  chunk: ChunkRecord;
  tf: Map<string, number>;
  docLength: number;
}

interface Bm25Corpus {
  documents: Bm25Document[];
  docFreq: Map<string, number>;
  avgDocLength: number;
}

const BM25_K1 = 1.2;
const BM25_B = 0.75;

const MAX_HIGHLIGHTS = 3;
const HIGHLIGHT_RADIUS = 60;

export class InMemoryIndexStore implements IndexStore {
  protected documentsById = new Map<string, DocumentRecord>();

  protected chunksById = new Map<string, ChunkRecord>();

  private bm25DocsByChunkId = new Map<string, Bm25Document>();

  private bm25CorpusCache: Bm25Corpus | null = null;

  async upsertDocument(document: DocumentRecord): Promise<void> {
    this.documentsById.set(document.id, { ...document });
  }

  async upsert(chunk: ChunkRecord): Promise<void> {
    if (!this.documentsById.has(chunk.documentId)) {
      throw new Error(`Cannot index chunk ${chunk.id}: unknown document ${chunk.documentId}.`);
    }
    this.putChunk(chunk);
    this.bm25CorpusCache = null;
  }

  async replaceDocument(document: DocumentRecord, chunks: ChunkRecord[]): Promise<void> {
    // No await between delete and write: readers never observe a half-replaced document.
    this.removeDocument(document.id);
    this.documentsById.set(document.id, { ...document });
    for (const chunk of chunks) {
      this.putChunk(chunk);
    }
    this.bm25CorpusCache = null;
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const removed = this.removeDocument(documentId);
    this.bm25CorpusCache = null;
    return removed;
  }

  async keywordSearch(keywords: string[], topK: number): Promise<KeywordStoredHit[]> {
    const terms = [...new Set(keywords.flatMap((keyword) => tokenizeForBm25(keyword)))];
    if (terms.length === 0 || topK <= 0) {
      return [];
    }

    const corpus = this.resolveBm25Corpus();
    const scored: Array<{ chunk: ChunkRecord; score: number }> = [];
    for (const doc of corpus.documents) {
      const score = scoreBm25(doc, terms, corpus);
      if (score > 0) {
        scored.push({ chunk: doc.chunk, score });
      }
    }

    return scored
      .sort(compareByScore)
      .slice(0, topK)
      .flatMap(({ chunk, score }) => {
        const document = this.documentsById.get(chunk.documentId);
        if (!document) {
          return [];
        }
        return [{ chunk, document, score, highlights: highlightFragments(chunk.text, terms) }];
      });
  }

  async vectorSearch(queryVector: number[], topK: number): Promise<StoredHit[]> {
    if (topK <= 0) {
      return [];
    }

    const candidates: StoredHit[] = [];
    for (const chunk of this.chunksById.values()) {
      const document = this.documentsById.get(chunk.documentId);
      if (!document || chunk.embedding.length === 0) {
        continue;
      }
      candidates.push({ chunk, document, score: cosineSimilarity(queryVector, chunk.embedding) });
    }

    return candidates.sort(compareByScore).slice(0, topK);
  }

  async getDocument(documentId: string): Promise<DocumentRecord | null> {
    return this.documentsById.get(documentId) ?? null;
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    return [...this.documentsById.values()].sort((a, b) =>
      a.sourcePath.localeCompare(b.sourcePath),
    );
  }

  async listChunks(documentId: string): Promise<ChunkRecord[]> {
    return [...this.chunksById.values()]
      .filter((chunk) => chunk.documentId === documentId)
      .sort((a, b) => a.index - b.index);
  }

  async clear(): Promise<{ cleared_documents: number; cleared_chunks: number }> {
    const cleared = {
      cleared_documents: this.documentsById.size,
      cleared_chunks: this.chunksById.size,
    };

    this.documentsById.clear();
    this.chunksById.clear();
    this.bm25DocsByChunkId.clear();
    this.bm25CorpusCache = null;
    return cleared;
  }

  protected exportSnapshot(): InMemoryIndexSnapshot {
    return {
      documents: [...this.documentsById.values()].map((document) => ({ ...document })),
      chunks: [...this.chunksById.values()].map((chunk) => ({ ...chunk })),
    };
  }

  protected importSnapshot(snapshot: InMemoryIndexSnapshot): void {
    this.documentsById.clear();
    this.chunksById.clear();
    this.bm25DocsByChunkId.clear();
    this.bm25CorpusCache = null;

    for (const document of snapshot.documents) {
      this.documentsById.set(document.id, { ...document });
    }
    for (const chunk of snapshot.chunks) {
      this.putChunk(chunk);
    }
  }

  private putChunk(chunk: ChunkRecord): void {
    const stored = { ...chunk, dates: [...chunk.dates], embedding: [...chunk.embedding] };
    this.chunksById.set(stored.id, stored);
    this.bm25DocsByChunkId.set(stored.id, buildBm25Document(stored));
  }

  private removeDocument(documentId: string): number {
    let removed = 0;
    for (const chunk of [...this.chunksById.values()]) {
      if (chunk.documentId === documentId) {
        this.chunksById.delete(chunk.id);
        this.bm25DocsByChunkId.delete(chunk.id);
        removed += 1;
      }
    }
    this.documentsById.delete(documentId);
    return removed;
  }

  private resolveBm25Corpus(): Bm25Corpus {
    if (this.bm25CorpusCache) {
      return this.bm25CorpusCache;
    }

    const documents = [...this.bm25DocsByChunkId.values()].filter((doc) => doc.docLength > 0);
    const docFreq = new Map<string, number>();
    let totalDocLength = 0;
    for (const doc of documents) {
      totalDocLength += doc.docLength;
      for (const token of doc.tf.keys()) {
        docFreq.set(token, (docFreq.get(token) ?? 0) + 1);
      }
    }

    this.bm25CorpusCache = {
      documents,
      docFreq,
      avgDocLength: documents.length > 0 ? totalDocLength / documents.length : 0,
    };
    return this.bm25CorpusCache;
  }
}

function buildBm25Document(chunk: ChunkRecord): Bm25Document {
  const tokens = tokenizeForBm25(chunk.text);
  const tf = new Map<string, number>();
  for (const token of tokens) {
    tf.set(token, (tf.get(token) ?? 0) + 1);
  }
  return { chunk, tf, docLength: tokens.length };
}

function scoreBm25(doc: Bm25Document, terms: string[], corpus: Bm25Corpus): number {
  let score = 0;
  for (const term of terms) {
    const tf = doc.tf.get(term) ?? 0;
    if (tf <= 0) {
      continue;
    }
    const df = corpus.docFreq.get(term) ?? 0;
    const idf = Math.log(1 + (corpus.documents.length - df + 0.5) / (df + 0.5));
    const numerator = tf * (BM25_K1 + 1);
    const denominator =
      tf + BM25_K1 * (1 - BM25_B + BM25_B * (doc.docLength / Math.max(corpus.avgDocLength, 1e-9)));
    score += idf * (numerator / Math.max(denominator, 1e-9));
  }
  return score;
}

function compareByScore(
  a: { chunk: ChunkRecord; score: number },
  b: { chunk: ChunkRecord; score: number },
): number {
  return b.score - a.score || a.chunk.id.localeCompare(b.chunk.id);
}

/**
 * Up to three non-overlapping fragments around keyword matches, each matched
 * word wrapped in `<em>`.
 */
export function highlightFragments(
  text: string,
  keywords: string[],
  maxFragments = MAX_HIGHLIGHTS,
  radius = HIGHLIGHT_RADIUS,
): string[] {
  if (keywords.length === 0) {
    return [];
  }

  const alternatives = keywords.map(escapeRegExp).join("|");
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternatives})(?![\\p{L}\\p{N}])`, "giu");
  const fragments: string[] = [];
  let coveredUntil = 0;

  for (const match of text.matchAll(pattern)) {
    const matchStart = match.index ?? 0;
    if (matchStart < coveredUntil) {
      continue;
    }

    let start = Math.max(0, matchStart - radius);
    let end = Math.min(text.length, matchStart + match[0].length + radius);
    while (start > 0 && /\S/.test(text[start - 1])) {
      start -= 1;
    }
    while (end < text.length && /\S/.test(text[end])) {
      end += 1;
    }

    fragments.push(
      text
        .slice(start, end)
        .replace(pattern, "<em>$&</em>")
        .replace(/\s+/g, " ")
        .trim(),
    );
    coveredUntil = end;
    if (fragments.length >= maxFragments) {
      break;
    }
  }

  return fragments;
}
