import { AppConfig, RetryPolicy } from "../../config/env.js";
import {
  IngestionJob,
  IngestionJobFields,
  IngestionStatus,
  JobRepository,
  Paginated,
} from "../../domain/ingestionJob.js";
import { withRetry } from "../../utils/retry.js";
import { createPostgresPool } from "../db/postgres.js";
import { Logger, moduleLogger } from "../logging/logger.js";
import { InMemoryJobRepository } from "./inMemoryJobRepository.js";
import { PgJobRepository } from "./pgJobRepository.js";

export interface JobRepositoryBootstrapResult {
  jobRepository: JobRepository;
  close: () => Promise<void>;
}

export async function createJobRepository(
  config: AppConfig,
  parent?: Logger,
): Promise<JobRepositoryBootstrapResult> {
  const logger = moduleLogger("job-repository", parent);

  if (config.jobRepository === "memory") {
    return { jobRepository: new InMemoryJobRepository(), close: async () => {} };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when JOB_REPOSITORY=postgres.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const repository = new PgJobRepository(pool);
  try {
    await withRetry(() => repository.initialize(), {
      policy: config.retry,
      operation: "jobs.initialize",
      logger,
    });
  } catch (error) {
    await pool.end();
    throw error;
  }

  return {
    jobRepository: new ResilientJobRepository(repository, config.retry, logger),
    close: async () => {
      await pool.end();
    },
  };
}

export class ResilientJobRepository implements JobRepository {
  constructor(
    private readonly inner: JobRepository,
    private readonly policy: RetryPolicy,
    private readonly logger?: Logger,
  ) {}

  create(input: { folderPath: string }): Promise<string> {
    return this.run("jobs.create", () => this.inner.create(input));
  }

  updateStatus(id: string, status: IngestionStatus, fields?: IngestionJobFields): Promise<void> {
    return this.run("jobs.updateStatus", () => this.inner.updateStatus(id, status, fields));
  }

  get(id: string): Promise<IngestionJob | null> {
    return this.run("jobs.get", () => this.inner.get(id));
  }

  list(page: number, pageSize: number): Promise<Paginated<IngestionJob>> {
    return this.run("jobs.list", () => this.inner.list(page, pageSize));
  }

  private run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    return withRetry(task, { policy: this.policy, operation, logger: this.logger });
  }
}
