import { beforeAll, describe, expect, it } from "vitest";
import { IndexedDocumentNotFoundError, InputError } from "../src/domain/errors.js";
import { documentIdFor } from "../src/pipelines/ingestion.js";
import { createTestApp } from "./helpers/testApp.js";

describe("DocumentSearchService.getDocumentContent", () => {
  const { app } = createTestApp({
    "records/visit.txt": "Intake notes.\f\fFollow-up on 2020-01-02.",
  });
  const documentId = documentIdFor("records/visit.txt");

  beforeAll(async () => {
    await app.service.startIngestion("records");
    await app.scheduler.whenIdle();
  });

  it("groups chunks by page and keeps blank pages", async () => {
    const { document, pages } = await app.service.getDocumentContent(documentId);

    expect(document).toMatchObject({ id: documentId, sourcePath: "records/visit.txt", pageCount: 3 });
    expect(pages.map((page) => [page.pageNumber, page.chunks.map((chunk) => chunk.text)])).toEqual([
      [1, ["Intake notes."]],
      [2, []],
      [3, ["Follow-up on 2020-01-02."]],
    ]);
    expect(pages[2].chunks[0].dates).toEqual(["2020-01-02"]);
  });

  it("looks documents up by source path", async () => {
    const { document } = await app.service.getDocumentContent("/records/visit.txt");
    expect(document.id).toBe(documentId);
  });

  it("rejects empty and unknown references", async () => {
    await expect(app.service.getDocumentContent("  ")).rejects.toBeInstanceOf(InputError);
    await expect(app.service.getDocumentContent("records/other.txt")).rejects.toThrow(
      IndexedDocumentNotFoundError,
    );
  });
});
