import { randomUUID } from "node:crypto";
import { JobNotFoundError } from "../../domain/errors.js";
import {
  IngestionJob,
  IngestionJobFields,
  IngestionStatus,
  JobRepository,
  Paginated,
  totalPagesFor,
} from "../../domain/ingestionJob.js";

export class InMemoryJobRepository implements JobRepository {
  private readonly jobs = new Map<string, IngestionJob>();

  // Insertion order breaks ties between jobs created in the same millisecond.
  private readonly order: string[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create({ folderPath }: { folderPath: string }): Promise<string> {
    const id = randomUUID();
    this.jobs.set(id, {
      id,
      folderPath,
      status: "PENDING",
      createdAt: this.now().toISOString(),
      startedAt: null,
      completedAt: null,
      processedFiles: 0,
      failedFiles: [],
      errorMessage: null,
      artifactRef: null,
    });
    this.order.push(id);
    return id;
  }

  async updateStatus(
    id: string,
    status: IngestionStatus,
    fields: IngestionJobFields = {},
  ): Promise<void> {
    const existing = this.jobs.get(id);
    if (!existing) {
      throw new JobNotFoundError(id);
    }
    this.jobs.set(id, {
      ...existing,
      ...fields,
      failedFiles: [...(fields.failedFiles ?? existing.failedFiles)],
      status,
    });
  }

  async get(id: string): Promise<IngestionJob | null> {
    const job = this.jobs.get(id);
    return job ? cloneJob(job) : null;
  }

  async list(page: number, pageSize: number): Promise<Paginated<IngestionJob>> {
    const newestFirst = [...this.order].reverse();
    const offset = (page - 1) * pageSize;
    const items = newestFirst
      .slice(offset, offset + pageSize)
      .flatMap((id) => {
        const job = this.jobs.get(id);
        return job ? [cloneJob(job)] : [];
      });

    return {
      items,
      total: newestFirst.length,
      page,
      pageSize,
      totalPages: totalPagesFor(newestFirst.length, pageSize),
    };
  }
}

function cloneJob(job: IngestionJob): IngestionJob {
  return { ...job, failedFiles: job.failedFiles.map((file) => ({ ...file })) };
}
