import { promises as fs } from "node:fs";
import path from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { InMemoryIndexStore } from "../src/infra/store/inMemoryIndexStore.js";
import {
  collectChronology,
  parseDocumentDate,
  renderChronologyMarkdown,
} from "../src/pipelines/chronology.js";
import { makeChunk, makeDocument } from "./helpers/records.js";
import { createTestApp, PATIENT_RECORD } from "./helpers/testApp.js";

const ARTIFACT_DIR = path.resolve(".tmp-tests-chronology");

describe("parseDocumentDate", () => {
  it("reads the supported date shapes", () => {
    expect(parseDocumentDate("2021-3-7")).toBe("2021-03-07");
    expect(parseDocumentDate("03/15/2021")).toBe("2021-03-15");
    expect(parseDocumentDate("12-01-99")).toBe("1999-12-01");
    expect(parseDocumentDate("15.03.21")).toBe("2021-03-15");
    expect(parseDocumentDate("March 5, 2022")).toBe("2022-03-05");
    expect(parseDocumentDate("Sept. 3rd, 2020")).toBe("2020-09-03");
    expect(parseDocumentDate("5 Mar 2022")).toBe("2022-03-05");
  });

  it("returns null for impossible dates", () => {
    expect(parseDocumentDate("2021-02-30")).toBeNull();
    expect(parseDocumentDate("13/01/2021")).toBeNull();
  });
});

describe("collectChronology", () => {
  it("orders entries by date and puts unparsed dates last", async () => {
    const store = new InMemoryIndexStore();
    const document = makeDocument("doc_a", "records/a.txt", 2);
    await store.replaceDocument(document, [
      { ...makeChunk("doc_a", 0, "Seen 2021-02-30 and 2020-01-05."), dates: ["2021-02-30", "2020-01-05"] },
      { ...makeChunk("doc_a", 1, "Seen 12/01/2019 and 2020-01-05.", [1, 0, 0], 2), dates: ["12/01/2019", "2020-01-05"] },
      { ...makeChunk("doc_a", 2, "Again 12/01/2019.", [1, 0, 0], 2), dates: ["12/01/2019"] },
    ]);

    const entries = await collectChronology(store, [document]);
    expect(entries.map((entry) => [entry.date, entry.pageNumber])).toEqual([
      ["12/01/2019", 2],
      ["2020-01-05", 1],
      ["2020-01-05", 2],
      ["2021-02-30", 1],
    ]);
    expect(entries[3].isoDate).toBeNull();
  });
});

describe("renderChronologyMarkdown", () => {
  it("renders an empty chronology", () => {
    expect(renderChronologyMarkdown("job-1", "", [])).toBe(
      "# Chronology: /\n\nJob `job-1`, 0 dated entries.\n\nNo dates found.\n",
    );
  });

  it("escapes table cells and shows the parsed date", () => {
    const markdown = renderChronologyMarkdown("job-2", "records", [
      {
        date: "03/15/2021",
        isoDate: "2021-03-15",
        documentName: "a|b.txt",
        sourcePath: "records/a|b.txt",
        pageNumber: 2,
        section: "HISTORY",
        excerpt: "x  y",
      },
    ]);

    expect(markdown.split("\n")).toEqual([
      "# Chronology: records",
      "",
      "Job `job-2`, 1 dated entry.",
      "",
      "| Date | Document | Page | Section | Excerpt |",
      "| --- | --- | --- | --- | --- |",
      "| 2021-03-15 (03/15/2021) | a\\|b.txt | 2 | HISTORY | x y |",
      "",
    ]);
  });
});

describe("chronology export", () => {
  afterAll(async () => {
    await fs.rm(ARTIFACT_DIR, { recursive: true, force: true });
  });

  it("writes a chronology file for a completed job", async () => {
    const { app } = createTestApp(
      { "records/patient.txt": PATIENT_RECORD },
      { chronologyDir: ARTIFACT_DIR },
    );

    const jobId = await app.service.startIngestion("records");
    await app.scheduler.whenIdle();

    const job = await app.service.getJob(jobId);
    expect(job.artifactRef).toBe(path.join(ARTIFACT_DIR, `${jobId}-chronology.md`));

    const markdown = await fs.readFile(path.join(ARTIFACT_DIR, `${jobId}-chronology.md`), "utf-8");
    expect(markdown.split("\n")).toEqual([
      "# Chronology: records",
      "",
      `Job \`${jobId}\`, 2 dated entries.`,
      "",
      "| Date | Document | Page | Section | Excerpt |",
      "| --- | --- | --- | --- | --- |",
      "| 2019-05-01 | patient.txt | 1 |  | Patient admitted with flank pain on 2019-05-01. |",
      "| 2019-05-12 | patient.txt | 2 |  | Left nephrectomy performed on 2019-05-12 without complications. |",
      "",
    ]);
  });
});
