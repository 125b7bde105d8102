import { describe, expect, it } from "vitest";
import {
  InputError,
  JobNotFoundError,
  RetryExhaustedError,
  TransientError,
  UnauthorizedError,
} from "../src/domain/errors.js";
import { IngestionStatus } from "../src/domain/ingestionJob.js";
import { InMemoryJobRepository } from "../src/infra/jobs/inMemoryJobRepository.js";
import { normalizeFolderPath } from "../src/services/ingestionJobManager.js";
import { documentIdFor } from "../src/pipelines/ingestion.js";
import { InMemoryDocumentStore } from "./helpers/fakes.js";
import { createTestApp, PATIENT_RECORD } from "./helpers/testApp.js";

class RestrictedDocumentStore extends InMemoryDocumentStore {
  constructor(
    files: Record<string, string>,
    private readonly failure: (filePath: string) => Error | null,
  ) {
    super(files);
  }

  async fetch(filePath: string): Promise<Buffer> {
    const error = this.failure(filePath);
    if (error) {
      throw error;
    }
    return super.fetch(filePath);
  }
}

class UnavailableJobRepository extends InMemoryJobRepository {
  async updateStatus(id: string, status: IngestionStatus): Promise<void> {
    throw new RetryExhaustedError("jobs.updateStatus", 1, {
      cause: new TransientError(`cannot move ${id} to ${status}`),
    });
  }
}

describe("IngestionJobManager", () => {
  it("ingests a folder and records a completed job", async () => {
    const { app, indexStore } = createTestApp({ "records/patient.txt": PATIENT_RECORD });

    const jobId = await app.service.startIngestion("records");
    await app.scheduler.whenIdle();

    const job = await app.service.getJob(jobId);
    expect(job).toMatchObject({
      id: jobId,
      folderPath: "records",
      status: "COMPLETED",
      processedFiles: 1,
      failedFiles: [],
      errorMessage: null,
      artifactRef: null,
    });
    expect(job.startedAt).not.toBeNull();
    expect(job.completedAt).not.toBeNull();

    const [document] = await indexStore.listDocuments();
    expect(document).toMatchObject({
      id: documentIdFor("records/patient.txt"),
      name: "patient.txt",
      sourcePath: "records/patient.txt",
      pageCount: 3,
    });
    const chunks = await indexStore.listChunks(document.id);
    expect(chunks.map((chunk) => [chunk.id, chunk.pageNumber])).toEqual([
      [`${document.id}:0`, 1],
      [`${document.id}:1`, 2],
      [`${document.id}:2`, 3],
    ]);
    expect(chunks[0].dates).toEqual(["2019-05-01"]);
  });

  it("fails the job when the folder does not exist", async () => {
    const { app } = createTestApp({});

    const jobId = await app.service.startIngestion("missing");
    await app.scheduler.whenIdle();

    expect(await app.service.getJob(jobId)).toMatchObject({
      status: "FAILED",
      processedFiles: 0,
      errorMessage: "Not found in document store: missing",
    });
  });

  it("skips unreadable files and ignores unsupported ones", async () => {
    const { app } = createTestApp({
      "mixed/bad.txt": Buffer.from([0xff, 0xfe, 0xfd]),
      "mixed/good.md": "# Notes\nBiopsy scheduled.",
      "mixed/sheet.xlsx": "cells",
    });

    const jobId = await app.service.startIngestion("mixed");
    await app.scheduler.whenIdle();

    expect(await app.service.getJob(jobId)).toMatchObject({
      status: "COMPLETED",
      processedFiles: 1,
      failedFiles: [{ path: "mixed/bad.txt", reason: "Text file is not valid UTF-8." }],
    });
  });

  it("skips a file whose download is denied and keeps going", async () => {
    const documents = new RestrictedDocumentStore(
      { "r/a.txt": "Alpha note.", "r/secret.txt": "Hidden note.", "r/z.txt": "Zulu note." },
      (filePath) => (filePath === "r/secret.txt" ? new UnauthorizedError("Access denied: r/secret.txt") : null),
    );
    const { app } = createTestApp({}, {}, { documents });

    const jobId = await app.service.startIngestion("r");
    await app.scheduler.whenIdle();

    expect(await app.service.getJob(jobId)).toMatchObject({
      status: "COMPLETED",
      processedFiles: 2,
      failedFiles: [{ path: "r/secret.txt", reason: "Access denied: r/secret.txt" }],
    });
  });

  it("fails the job when a download exhausts its retries", async () => {
    const documents = new RestrictedDocumentStore({ "r/a.txt": "Alpha note." }, (filePath) =>
      new RetryExhaustedError("documents.fetch", 3, { cause: new TransientError(`timeout: ${filePath}`) }),
    );
    const { app } = createTestApp({}, {}, { documents });

    const jobId = await app.service.startIngestion("r");
    await app.scheduler.whenIdle();

    expect(await app.service.getJob(jobId)).toMatchObject({
      status: "FAILED",
      processedFiles: 0,
      failedFiles: [],
      errorMessage: "documents.fetch failed after 3 attempt(s): timeout: r/a.txt",
    });
  });

  it("leaves the job pending when the repository rejects the start", async () => {
    const jobs = new UnavailableJobRepository();
    const { app, indexStore } = createTestApp({ "records/patient.txt": PATIENT_RECORD }, {}, { jobs });

    const jobId = await app.service.startIngestion("records");
    await app.scheduler.whenIdle();

    expect((await app.service.getJob(jobId)).status).toBe("PENDING");
    expect(await indexStore.listDocuments()).toEqual([]);
  });

  it("walks subfolders up to the configured depth", async () => {
    const { app, indexStore } = createTestApp(
      {
        "deep/a.txt": "Level one.",
        "deep/sub/b.txt": "Level two.",
        "deep/sub/inner/c.txt": "Level three.",
      },
      { maxFolderDepth: 2 },
    );

    await app.service.startIngestion("deep");
    await app.scheduler.whenIdle();

    const documents = await indexStore.listDocuments();
    expect(documents.map((document) => document.sourcePath)).toEqual(["deep/a.txt", "deep/sub/b.txt"]);
  });

  it("replaces the chunks of a re-ingested document", async () => {
    const { app, documents, indexStore } = createTestApp({ "records/patient.txt": PATIENT_RECORD });

    await app.service.startIngestion("records");
    await app.scheduler.whenIdle();

    documents.put("records/patient.txt", "Follow-up visit on 2019-06-01.");
    await app.service.startIngestion("records");
    await app.scheduler.whenIdle();

    const documentId = documentIdFor("records/patient.txt");
    expect(await indexStore.listDocuments()).toHaveLength(1);
    expect((await indexStore.listChunks(documentId)).map((chunk) => chunk.text)).toEqual([
      "Follow-up visit on 2019-06-01.",
    ]);
    expect((await app.service.search("nephrectomy")).groups[0].hits.map((hit) => hit.kind)).toEqual([
      "semantic",
    ]);
  });

  it("runs jobs for the same folder one after another", async () => {
    const { app } = createTestApp({ "records/patient.txt": PATIENT_RECORD });

    const first = await app.service.startIngestion("records");
    const second = await app.service.startIngestion("/records/");
    await app.scheduler.whenIdle();

    const firstJob = await app.service.getJob(first);
    const secondJob = await app.service.getJob(second);
    expect(firstJob.status).toBe("COMPLETED");
    expect(secondJob.status).toBe("COMPLETED");
    expect(secondJob.folderPath).toBe("records");
    expect(String(secondJob.startedAt) > String(firstJob.completedAt)).toBe(true);
  });

  it("rejects invalid folder paths without creating a job", async () => {
    const { app } = createTestApp({});

    await expect(app.service.startIngestion("records/../secrets")).rejects.toThrow(
      "Folder path must not contain '..' segments.",
    );
    await expect(app.service.startIngestion("   ")).rejects.toBeInstanceOf(InputError);
    expect((await app.service.listJobs()).total).toBe(0);
  });

  it("lists jobs newest first and validates paging", async () => {
    const { app } = createTestApp({ "a/x.txt": "alpha", "b/y.txt": "beta" });

    const older = await app.service.startIngestion("a");
    const newer = await app.service.startIngestion("b");
    await app.scheduler.whenIdle();

    const page = await app.service.listJobs(1, 1);
    expect(page.items.map((job) => job.id)).toEqual([newer]);
    expect(page).toMatchObject({ total: 2, page: 1, pageSize: 1, totalPages: 2 });
    expect((await app.service.listJobs(2, 1)).items.map((job) => job.id)).toEqual([older]);

    await expect(app.service.listJobs(0)).rejects.toThrow("page must be an integer >= 1, got 0.");
    await expect(app.service.listJobs(1, 101)).rejects.toThrow(
      "page_size must be an integer between 1 and 100, got 101.",
    );
  });

  it("reports unknown job ids", async () => {
    const { app } = createTestApp({});
    await expect(app.service.getJob("nope")).rejects.toBeInstanceOf(JobNotFoundError);
  });
});

describe("normalizeFolderPath", () => {
  it("canonicalizes separators and trims slashes", () => {
    expect(normalizeFolderPath("\\records\\2024\\")).toBe("records/2024");
    expect(normalizeFolderPath("./records//notes/")).toBe("records/notes");
    expect(normalizeFolderPath("/")).toBe("");
  });

  it("rejects control characters", () => {
    expect(() => normalizeFolderPath("records\u0000")).toThrow(
      "Folder path must not contain control characters.",
    );
  });
});
