import { InvalidTransitionError } from "./errors.js";

export const INGESTION_STATUSES = ["PENDING", "PROCESSING", "COMPLETED", "FAILED"] as const;

export type IngestionStatus = (typeof INGESTION_STATUSES)[number];

export interface FailedFile {
  path: string;
  reason: string;
}

export interface IngestionJob {
  id: string;
  folderPath: string;
  status: IngestionStatus;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  processedFiles: number;
  failedFiles: FailedFile[];
  errorMessage: string | null;
  artifactRef: string | null;
}

export type IngestionJobFields = Partial<
  Pick<
    IngestionJob,
    "startedAt" | "completedAt" | "processedFiles" | "failedFiles" | "errorMessage" | "artifactRef"
  >
>;

export interface Paginated<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

/**
 * Persistence for ingestion jobs. Status updates are last-writer-wins.
 */
export interface JobRepository {
  create(input: { folderPath: string }): Promise<string>;
  updateStatus(id: string, status: IngestionStatus, fields?: IngestionJobFields): Promise<void>;
  get(id: string): Promise<IngestionJob | null>;
  /** Newest first; `page` is 1-based. */
  list(page: number, pageSize: number): Promise<Paginated<IngestionJob>>;
}

const ALLOWED_TRANSITIONS: Record<IngestionStatus, readonly IngestionStatus[]> = {
  PENDING: ["PROCESSING"],
  PROCESSING: ["COMPLETED", "FAILED"],
  COMPLETED: [],
  FAILED: [],
};

export function assertTransition(from: IngestionStatus, to: IngestionStatus): void {
  if (!ALLOWED_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function totalPagesFor(total: number, pageSize: number): number {
  return Math.ceil(total / pageSize);
}
