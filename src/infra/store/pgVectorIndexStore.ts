import { Pool, PoolClient } from "pg";
import { IndexStore } from "../../domain/indexStore.js";
import { ChunkRecord, DocumentRecord, KeywordStoredHit, StoredHit } from "../../domain/types.js";
import { tokenizeForBm25 } from "../../utils/text.js";
import { withTransaction } from "../db/postgres.js";

interface PgChunkRow {
  chunk_id: string;
  document_id: string;
  chunk_index: number;
  page_number: number;
  section: string | null;
  content: string;
  start_offset: number;
  end_offset: number;
  dates: string[];
  embedding: string;
  name: string;
  source_path: string;
  page_count: number;
  ingested_at: Date;
}

interface PgScoredChunkRow extends PgChunkRow {
  score: number | string;
}

interface PgKeywordChunkRow extends PgScoredChunkRow {
  headline: string;
}

interface PgDocumentRow {
  id: string;
  name: string;
  source_path: string;
  page_count: number;
  ingested_at: Date;
}

const CHUNK_COLUMNS = `
  c.id AS chunk_id,
  c.document_id,
  c.chunk_index,
  c.page_number,
  c.section,
  c.content,
  c.start_offset,
  c.end_offset,
  c.dates,
  c.embedding::text AS embedding,
  d.name,
  d.source_path,
  d.page_count,
  d.ingested_at
`;

// ts_headline joins fragments with this delimiter; split on it to get a list.
const FRAGMENT_DELIMITER = " ... ";
const HEADLINE_OPTIONS =
  "StartSel=<em>, StopSel=</em>, MaxFragments=3, MaxWords=25, MinWords=8";

/**
 * Postgres-backed dual index: pgvector cosine distance for vectors, and a
 * generated `tsvector` column with a GIN index for keywords. The `simple` text
 * search configuration keeps tokens as lower-cased words, so Postgres matches
 * the same words the in-memory store does.
 */
export class PgVectorIndexStore implements IndexStore {
  private initPromise: Promise<void> | null = null;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
  ) {}

  initialize(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.createSchema().catch((error: unknown) => {
        this.initPromise = null;
        throw error;
      });
    }
    return this.initPromise;
  }

  async upsertDocument(document: DocumentRecord): Promise<void> {
    await this.initialize();
    await this.inTransaction((client) => writeDocument(client, document));
  }

  async upsert(chunk: ChunkRecord): Promise<void> {
    await this.initialize();
    await this.inTransaction((client) => writeChunk(client, chunk));
  }

  async replaceDocument(document: DocumentRecord, chunks: ChunkRecord[]): Promise<void> {
    await this.initialize();
    await this.inTransaction(async (client) => {
      await client.query(`DELETE FROM chunks WHERE document_id = $1`, [document.id]);
      await writeDocument(client, document);
      for (const chunk of chunks) {
        await writeChunk(client, chunk);
      }
    });
  }

  async deleteByDocument(documentId: string): Promise<number> {
    await this.initialize();
    return this.inTransaction(async (client) => {
      const deleted = await client.query(`DELETE FROM chunks WHERE document_id = $1`, [documentId]);
      await client.query(`DELETE FROM documents WHERE id = $1`, [documentId]);
      return deleted.rowCount ?? 0;
    });
  }

  async keywordSearch(keywords: string[], topK: number): Promise<KeywordStoredHit[]> {
    await this.initialize();
    const terms = [...new Set(keywords.flatMap((keyword) => tokenizeForBm25(keyword)))];
    if (terms.length === 0 || topK <= 0) {
      return [];
    }

    const result = await this.pool.query<PgKeywordChunkRow>(
      `
        SELECT
          ${CHUNK_COLUMNS},
          ts_rank_cd(c.content_tsv, q, 1) AS score,
          ts_headline('simple', c.content, q, $3) AS headline
        FROM chunks c
        JOIN documents d ON d.id = c.document_id,
          to_tsquery('simple', $1) q
        WHERE c.content_tsv @@ q
        ORDER BY score DESC, c.id ASC
        LIMIT $2
      `,
      [terms.join(" | "), topK, `${HEADLINE_OPTIONS}, FragmentDelimiter="${FRAGMENT_DELIMITER}"`],
    );

    return result.rows.map((row) => ({
      ...toStoredHit(row),
      highlights: row.headline
        .split(FRAGMENT_DELIMITER)
        .map((fragment) => fragment.replace(/\s+/g, " ").trim())
        .filter((fragment) => fragment.includes("<em>")),
    }));
  }

  async vectorSearch(queryVector: number[], topK: number): Promise<StoredHit[]> {
    await this.initialize();
    if (topK <= 0) {
      return [];
    }

    const result = await this.pool.query<PgScoredChunkRow>(
      `
        SELECT
          ${CHUNK_COLUMNS},
          (1 - (c.embedding <=> $1::vector)) AS score
        FROM chunks c
        JOIN documents d ON d.id = c.document_id
        ORDER BY c.embedding <=> $1::vector, c.id ASC
        LIMIT $2
      `,
      [toVectorLiteral(queryVector), topK],
    );

    return result.rows.map(toStoredHit);
  }

  async getDocument(documentId: string): Promise<DocumentRecord | null> {
    await this.initialize();
    const result = await this.pool.query<PgDocumentRow>(
      `SELECT id, name, source_path, page_count, ingested_at FROM documents WHERE id = $1`,
      [documentId],
    );
    const row = result.rows[0];
    return row ? toDocument(row) : null;
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    await this.initialize();
    const result = await this.pool.query<PgDocumentRow>(
      `SELECT id, name, source_path, page_count, ingested_at FROM documents ORDER BY source_path ASC`,
    );
    return result.rows.map(toDocument);
  }

  async listChunks(documentId: string): Promise<ChunkRecord[]> {
    await this.initialize();
    const result = await this.pool.query<PgChunkRow>(
      `
        SELECT ${CHUNK_COLUMNS}
        FROM chunks c
        JOIN documents d ON d.id = c.document_id
        WHERE c.document_id = $1
        ORDER BY c.chunk_index ASC
      `,
      [documentId],
    );
    return result.rows.map(toChunk);
  }

  async clear(): Promise<{ cleared_documents: number; cleared_chunks: number }> {
    await this.initialize();
    return this.inTransaction(async (client) => {
      const documentCount = await client.query<{ count: string }>(
        "SELECT COUNT(*)::text AS count FROM documents",
      );
      const chunkCount = await client.query<{ count: string }>(
        "SELECT COUNT(*)::text AS count FROM chunks",
      );

      await client.query("TRUNCATE TABLE chunks, documents");

      return {
        cleared_documents: Number(documentCount.rows[0]?.count ?? 0),
        cleared_chunks: Number(chunkCount.rows[0]?.count ?? 0),
      };
    });
  }

  private async createSchema(): Promise<void> {
    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS documents (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        source_path TEXT NOT NULL UNIQUE,
        page_count INTEGER NOT NULL,
        ingested_at TIMESTAMPTZ NOT NULL
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS chunks (
        id TEXT PRIMARY KEY,
        document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
        chunk_index INTEGER NOT NULL,
        page_number INTEGER NOT NULL,
        section TEXT,
        content TEXT NOT NULL,
        start_offset INTEGER NOT NULL,
        end_offset INTEGER NOT NULL,
        dates TEXT[] NOT NULL DEFAULT '{}',
        embedding VECTOR(${this.vectorDimension}) NOT NULL,
        content_tsv TSVECTOR GENERATED ALWAYS AS (to_tsvector('simple', content)) STORED
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_chunks_document_id ON chunks(document_id)`,
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_chunks_content_tsv ON chunks USING GIN (content_tsv)`,
    );
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_chunks_embedding
      ON chunks USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
    `);
  }

  private inTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    return withTransaction(() => this.pool.connect(), work);
  }
}

async function writeDocument(db: PoolClient, document: DocumentRecord): Promise<void> {
  await db.query(
    `
      INSERT INTO documents (id, name, source_path, page_count, ingested_at)
      VALUES ($1, $2, $3, $4, $5)
      ON CONFLICT (id)
      DO UPDATE SET
        name = EXCLUDED.name,
        source_path = EXCLUDED.source_path,
        page_count = EXCLUDED.page_count,
        ingested_at = EXCLUDED.ingested_at
    `,
    [document.id, document.name, document.sourcePath, document.pageCount, document.ingestedAt],
  );
}

async function writeChunk(db: PoolClient, chunk: ChunkRecord): Promise<void> {
  await db.query(
    `
      INSERT INTO chunks (
        id, document_id, chunk_index, page_number, section, content,
        start_offset, end_offset, dates, embedding
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10::vector)
      ON CONFLICT (id)
      DO UPDATE SET
        document_id = EXCLUDED.document_id,
        chunk_index = EXCLUDED.chunk_index,
        page_number = EXCLUDED.page_number,
        section = EXCLUDED.section,
        content = EXCLUDED.content,
        start_offset = EXCLUDED.start_offset,
        end_offset = EXCLUDED.end_offset,
        dates = EXCLUDED.dates,
        embedding = EXCLUDED.embedding
    `,
    [
      chunk.id,
      chunk.documentId,
      chunk.index,
      chunk.pageNumber,
      chunk.section,
      chunk.text,
      chunk.startOffset,
      chunk.endOffset,
      chunk.dates,
      toVectorLiteral(chunk.embedding),
    ],
  );
}

function toStoredHit(row: PgScoredChunkRow): StoredHit {
  return {
    chunk: toChunk(row),
    document: toDocument({
      id: row.document_id,
      name: row.name,
      source_path: row.source_path,
      page_count: row.page_count,
      ingested_at: row.ingested_at,
    }),
    score: Number(row.score),
  };
}

function toChunk(row: PgChunkRow): ChunkRecord {
  return {
    id: row.chunk_id,
    documentId: row.document_id,
    index: row.chunk_index,
    pageNumber: row.page_number,
    section: row.section,
    text: row.content,
    startOffset: row.start_offset,
    endOffset: row.end_offset,
    embedding: parseVectorLiteral(row.embedding),
    dates: row.dates,
  };
}

function toDocument(row: PgDocumentRow): DocumentRecord {
  return {
    id: row.id,
    name: row.name,
    sourcePath: row.source_path,
    pageCount: row.page_count,
    ingestedAt: row.ingested_at.toISOString(),
  };
}

export function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}

export function parseVectorLiteral(literal: string): number[] {
  const inner = literal.trim().replace(/^\[/, "").replace(/\]$/, "");
  return inner ? inner.split(",").map(Number) : [];
}
