import { describe, expect, it, vi } from "vitest";
import { buildApp } from "../src/app.js";
import { TransientError } from "../src/domain/errors.js";
import { ChunkRecord, DocumentRecord } from "../src/domain/types.js";
import { ResilientDocumentStore } from "../src/infra/documents/resilientDocumentStore.js";
import { InMemoryJobRepository } from "../src/infra/jobs/inMemoryJobRepository.js";
import { logger } from "../src/infra/logging/logger.js";
import { InMemoryIndexStore } from "../src/infra/store/inMemoryIndexStore.js";
import { ResilientIndexStore } from "../src/infra/store/resilientIndexStore.js";
import { HashingEmbeddingEngine, InMemoryDocumentStore } from "./helpers/fakes.js";
import { PATIENT_RECORD, TEST_SETTINGS } from "./helpers/testApp.js";

const POLICY = { maxRetries: 2, intervalMs: 10, backoff: "fixed" as const };

class FlakyIndexStore extends InMemoryIndexStore {
  constructor(private failuresLeft: number) {
    super();
  }

  async replaceDocument(document: DocumentRecord, chunks: ChunkRecord[]): Promise<void> {
    if (this.failuresLeft > 0) {
      this.failuresLeft -= 1;
      throw new TransientError("index offline");
    }
    await super.replaceDocument(document, chunks);
  }
}

function appWithIndex(indexStore: ResilientIndexStore) {
  return buildApp(
    {
      indexStore,
      jobs: new InMemoryJobRepository(),
      documents: new InMemoryDocumentStore({ "records/patient.txt": PATIENT_RECORD }),
      embeddingEngine: new HashingEmbeddingEngine(),
    },
    TEST_SETTINGS,
    { logger },
  );
}

describe("ResilientIndexStore", () => {
  it("recovers from transient failures within the retry policy", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const app = appWithIndex(new ResilientIndexStore(new FlakyIndexStore(2), POLICY, logger, sleep));

    const jobId = await app.service.startIngestion("records");
    await app.scheduler.whenIdle();

    expect((await app.service.getJob(jobId)).status).toBe("COMPLETED");
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 10]);
    expect(await app.service.listDocuments()).toHaveLength(1);
  });

  it("fails the job once retries are exhausted", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const app = appWithIndex(new ResilientIndexStore(new FlakyIndexStore(5), POLICY, logger, sleep));

    const jobId = await app.service.startIngestion("records");
    await app.scheduler.whenIdle();

    expect(await app.service.getJob(jobId)).toMatchObject({
      status: "FAILED",
      processedFiles: 0,
      errorMessage: "index.replaceDocument failed after 3 attempt(s): index offline",
    });
  });
});

describe("ResilientDocumentStore", () => {
  it("retries transient fetch failures", async () => {
    const inner = new InMemoryDocumentStore({ "a.txt": "alpha" });
    const fetchSpy = vi
      .spyOn(inner, "fetch")
      .mockRejectedValueOnce(new TransientError("throttled"));
    const sleep = vi.fn(async (_ms: number) => {});
    const store = new ResilientDocumentStore(inner, POLICY, logger, sleep);

    expect((await store.fetch("a.txt")).toString("utf-8")).toBe("alpha");
    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});
