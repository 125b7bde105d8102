export interface DocumentRecord {
  id: string;
  name: string;
  sourcePath: string;
  pageCount: number;
  ingestedAt: string;
}

export interface ChunkRecord {
  id: string;
  documentId: string;
  index: number;
  pageNumber: number;
  section: string | null;
  text: string;
  startOffset: number;
  endOffset: number;
  embedding: number[];
  dates: string[];
}

export interface DocumentPage {
  pageNumber: number;
  /** Chunks starting on this page; empty for blank pages. */
  chunks: ChunkRecord[];
}

export interface DocumentContent {
  document: DocumentRecord;
  pages: DocumentPage[];
}

export interface StoredHit {
  chunk: ChunkRecord;
  document: DocumentRecord;
  score: number;
}

export interface KeywordStoredHit extends StoredHit {
  /** Fragments of the chunk text with matched words wrapped in `<em>`. */
  highlights: string[];
}

export type HitKind = "keyword" | "semantic";

export interface SearchHit {
  chunkId: string;
  kind: HitKind;
  score: number;
  keywordScore: number | null;
  semanticScore: number | null;
  matchedKeywords: string[];
  keywordDates: Record<string, string | null>;
  dates: string[];
  summary: string | null;
  highlights: string[];
  pageNumber: number;
  section: string | null;
  text: string;
}

export interface SearchResultGroup {
  documentId: string;
  documentName: string;
  sourcePath: string;
  hits: SearchHit[];
}

export interface SearchResult {
  query: string;
  keywords: string[];
  totalHits: number;
  groups: SearchResultGroup[];
}
