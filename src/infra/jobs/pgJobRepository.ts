import { randomUUID } from "node:crypto";
import { Pool } from "pg";
import { JobNotFoundError } from "../../domain/errors.js";
import {
  FailedFile,
  INGESTION_STATUSES,
  IngestionJob,
  IngestionJobFields,
  IngestionStatus,
  JobRepository,
  Paginated,
  totalPagesFor,
} from "../../domain/ingestionJob.js";

interface PgJobRow {
  id: string;
  folder_path: string;
  status: string;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
  processed_files: number;
  failed_files: FailedFile[];
  error_message: string | null;
  artifact_ref: string | null;
}

const FIELD_COLUMNS: ReadonlyArray<[keyof IngestionJobFields, string]> = [
  ["startedAt", "started_at"],
  ["completedAt", "completed_at"],
  ["processedFiles", "processed_files"],
  ["failedFiles", "failed_files"],
  ["errorMessage", "error_message"],
  ["artifactRef", "artifact_ref"],
];

const JOB_COLUMNS = `
  id, folder_path, status, created_at, started_at, completed_at,
  processed_files, failed_files, error_message, artifact_ref
`;

/**
 * Ingestion history in the `folder_ingestions` table. Rows are never deleted.
 */
export class PgJobRepository implements JobRepository {
  private initPromise: Promise<void> | null = null;

  constructor(private readonly pool: Pool) {}

  initialize(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.createSchema().catch((error: unknown) => {
        this.initPromise = null;
        throw error;
      });
    }
    return this.initPromise;
  }

  async create({ folderPath }: { folderPath: string }): Promise<string> {
    await this.initialize();
    const id = randomUUID();
    await this.pool.query(
      `INSERT INTO folder_ingestions (id, folder_path, status) VALUES ($1, $2, 'PENDING')`,
      [id, folderPath],
    );
    return id;
  }

  async updateStatus(
    id: string,
    status: IngestionStatus,
    fields: IngestionJobFields = {},
  ): Promise<void> {
    await this.initialize();

    const assignments = ["status = $2"];
    const values: unknown[] = [id, status];
    for (const [key, column] of FIELD_COLUMNS) {
      const value = fields[key];
      if (value === undefined) {
        continue;
      }
      values.push(key === "failedFiles" ? JSON.stringify(value) : value);
      assignments.push(`${column} = $${values.length}`);
    }

    const result = await this.pool.query(
      `UPDATE folder_ingestions SET ${assignments.join(", ")} WHERE id = $1`,
      values,
    );
    if (result.rowCount === 0) {
      throw new JobNotFoundError(id);
    }
  }

  async get(id: string): Promise<IngestionJob | null> {
    await this.initialize();
    const result = await this.pool.query<PgJobRow>(
      `SELECT ${JOB_COLUMNS} FROM folder_ingestions WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? toJob(row) : null;
  }

  async list(page: number, pageSize: number): Promise<Paginated<IngestionJob>> {
    await this.initialize();
    const [countResult, rowsResult] = await Promise.all([
      this.pool.query<{ count: string }>(`SELECT COUNT(*)::text AS count FROM folder_ingestions`),
      this.pool.query<PgJobRow>(
        `
          SELECT ${JOB_COLUMNS}
          FROM folder_ingestions
          ORDER BY created_at DESC, seq DESC
          LIMIT $1 OFFSET $2
        `,
        [pageSize, (page - 1) * pageSize],
      ),
    ]);

    const total = Number(countResult.rows[0]?.count ?? 0);
    return {
      items: rowsResult.rows.map(toJob),
      total,
      page,
      pageSize,
      totalPages: totalPagesFor(total, pageSize),
    };
  }

  private async createSchema(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS folder_ingestions (
        id UUID PRIMARY KEY,
        seq BIGSERIAL,
        folder_path TEXT NOT NULL,
        status TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        started_at TIMESTAMPTZ,
        completed_at TIMESTAMPTZ,
        processed_files INTEGER NOT NULL DEFAULT 0,
        failed_files JSONB NOT NULL DEFAULT '[]'::jsonb,
        error_message TEXT,
        artifact_ref TEXT
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_folder_ingestions_created_at ON folder_ingestions(created_at DESC)`,
    );
  }
}

function toJob(row: PgJobRow): IngestionJob {
  return {
    id: row.id,
    folderPath: row.folder_path,
    status: parseStatus(row.status),
    createdAt: row.created_at.toISOString(),
    startedAt: row.started_at?.toISOString() ?? null,
    completedAt: row.completed_at?.toISOString() ?? null,
    processedFiles: row.processed_files,
    failedFiles: row.failed_files,
    errorMessage: row.error_message,
    artifactRef: row.artifact_ref,
  };
}

function parseStatus(value: string): IngestionStatus {
  const status = INGESTION_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown ingestion status in database: ${value}`);
  }
  return status;
}
