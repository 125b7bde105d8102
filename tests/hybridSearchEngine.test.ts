import { beforeAll, describe, expect, it } from "vitest";
import { InputError, RetryExhaustedError, TransientError } from "../src/domain/errors.js";
import { EmbeddingEngine } from "../src/infra/ai/types.js";
import { logger } from "../src/infra/logging/logger.js";
import { InMemoryIndexStore } from "../src/infra/store/inMemoryIndexStore.js";
import { MetadataExtractor } from "../src/pipelines/metadata.js";
import { HybridSearchEngine } from "../src/services/hybridSearchEngine.js";
import { buildPdf } from "./helpers/pdf.js";
import { makeChunk, makeDocument } from "./helpers/records.js";
import { createTestApp, PATIENT_RECORD } from "./helpers/testApp.js";

describe("HybridSearchEngine", () => {
  const harness = createTestApp({ "records/patient.txt": PATIENT_RECORD });
  const { app } = harness;

  beforeAll(async () => {
    await app.service.startIngestion("records");
    await app.scheduler.whenIdle();
  });

  it("returns the keyword hit first, then semantic hits, grouped by document", async () => {
    const result = await app.service.search("When was the nephrectomy performed?");

    expect(result.keywords).toEqual(["nephrectomy", "performed"]);
    expect(result.groups).toHaveLength(1);
    expect(result.groups[0].sourcePath).toBe("records/patient.txt");

    const hits = result.groups[0].hits;
    expect(hits.map((hit) => hit.kind)).toEqual(["keyword", "semantic", "semantic"]);
    expect(result.totalHits).toBe(3);

    const [keywordHit] = hits;
    expect(keywordHit).toMatchObject({
      kind: "keyword",
      pageNumber: 2,
      matchedKeywords: ["nephrectomy", "performed"],
      keywordDates: { nephrectomy: "2019-05-12", performed: "2019-05-12" },
      dates: ["2019-05-12"],
      summary: "Left nephrectomy performed on 2019-05-12 without complications.",
      highlights: [
        "Left <em>nephrectomy</em> <em>performed</em> on 2019-05-12 without complications.",
      ],
    });
    expect(keywordHit.keywordScore).toBe(keywordHit.score);
    expect(keywordHit.semanticScore).not.toBeNull();
    expect(hits.slice(1).map((hit) => hit.pageNumber).sort()).toEqual([1, 3]);
  });

  it("marks semantic hits without keyword metadata", async () => {
    const result = await app.service.search("nephrectomy");
    const semantic = result.groups[0].hits.filter((hit) => hit.kind === "semantic");

    expect(semantic).toHaveLength(2);
    for (const hit of semantic) {
      expect(hit.keywordScore).toBeNull();
      expect(hit.matchedKeywords).toEqual([]);
      expect(hit.keywordDates).toEqual({});
      expect(hit.summary).toBeNull();
      expect(hit.highlights).toEqual([]);
    }
  });

  it("falls back to semantic hits when the query has no keywords", async () => {
    const result = await app.service.search("what is the");

    expect(result.keywords).toEqual([]);
    expect(result.groups[0].hits.map((hit) => hit.kind)).toEqual(["semantic", "semantic", "semantic"]);
  });

  it("never returns more than top_k hits", async () => {
    const result = await app.service.search("nephrectomy", 2);

    expect(result.totalHits).toBe(2);
    expect(result.groups[0].hits[0].kind).toBe("keyword");
  });

  it("rejects an empty query before embedding anything", async () => {
    const before = harness.embeddingEngine.embedCalls;

    await expect(app.service.search("   ")).rejects.toThrow(InputError);
    await expect(app.service.search("")).rejects.toThrow("Query text must not be empty.");
    expect(harness.embeddingEngine.embedCalls).toBe(before);
  });

  it("rejects a non-positive top_k", async () => {
    await expect(app.service.search("nephrectomy", 0)).rejects.toThrow(
      "top_k must be a positive integer, got 0.",
    );
  });
});

class FlakyEmbeddingEngine implements EmbeddingEngine {
  readonly dimension = 3;
  attempts = 0;

  constructor(private failures: number) {}

  async initialize(): Promise<void> {}

  async embed(): Promise<number[]> {
    this.attempts += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      throw new TransientError("ollama 503");
    }
    return [1, 0, 0];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map(() => this.embed()));
  }
}

describe("HybridSearchEngine query embedding", () => {
  async function engineWith(embeddingEngine: EmbeddingEngine) {
    const indexStore = new InMemoryIndexStore();
    await indexStore.replaceDocument(makeDocument("doc-1", "imaging/us.txt"), [
      makeChunk("doc-1", 0, "Renal ultrasound was normal."),
    ]);
    return new HybridSearchEngine({
      indexStore,
      embeddingEngine,
      metadata: new MetadataExtractor(),
      retry: { maxRetries: 2, intervalMs: 10, backoff: "fixed" },
      logger,
      sleep: async () => {},
    });
  }

  it("retries a transient embedding failure", async () => {
    const embeddingEngine = new FlakyEmbeddingEngine(1);
    const engine = await engineWith(embeddingEngine);

    const result = await engine.search("ultrasound", 5);

    expect(embeddingEngine.attempts).toBe(2);
    expect(result.totalHits).toBe(1);
    expect(result.groups[0].hits[0]).toMatchObject({ kind: "keyword", chunkId: "doc-1:0" });
  });

  it("surfaces RetryExhaustedError once the retries run out", async () => {
    const embeddingEngine = new FlakyEmbeddingEngine(10);
    const engine = await engineWith(embeddingEngine);

    const search = engine.search("ultrasound", 5);

    await expect(search).rejects.toThrow(RetryExhaustedError);
    await expect(search).rejects.toThrow("embedding.embed failed after 3 attempt(s): ollama 503");
    expect(embeddingEngine.attempts).toBe(3);
  });
});

describe("HybridSearchEngine over an ingested PDF", () => {
  it("finds the keyword on the PDF page that holds it", async () => {
    const { app, indexStore } = createTestApp({
      "records/patient.pdf": buildPdf(PATIENT_RECORD.split("\f")),
    });
    const jobId = await app.service.startIngestion("records");
    await app.scheduler.whenIdle();

    expect(await app.service.getJob(jobId)).toMatchObject({ status: "COMPLETED", processedFiles: 1 });
    expect((await indexStore.listDocuments())[0].pageCount).toBe(3);

    const result = await app.service.search("nephrectomy");
    expect(result.groups).toHaveLength(1);
    expect(result.groups[0].sourcePath).toBe("records/patient.pdf");

    const keywordHits = result.groups[0].hits.filter((hit) => hit.kind === "keyword");
    expect(keywordHits).toHaveLength(1);
    expect(keywordHits[0]).toMatchObject({
      pageNumber: 2,
      text: "Left nephrectomy performed on 2019-05-12 without complications.",
    });
  });
});
