import { promises as fs } from "node:fs";
import path from "node:path";
import { IndexStore } from "../domain/indexStore.js";
import { DocumentRecord } from "../domain/types.js";
import { cleanDisplayText } from "../utils/text.js";
import { summarize } from "./metadata.js";

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

export interface ChronologyEntry {
  date: string;
  /** ISO calendar date, or null when the text could not be parsed. */
  isoDate: string | null;
  documentName: string;
  sourcePath: string;
  pageNumber: number;
  section: string | null;
  excerpt: string;
}

/**
 * Every dated chunk of the given documents, oldest first. Entries whose date
 * cannot be parsed go last in document order. Overlapping chunks repeat a
 * date; those repeats are collapsed per document page.
 */
export async function collectChronology(
  indexStore: IndexStore,
  documents: DocumentRecord[],
): Promise<ChronologyEntry[]> {
  const entries: Array<ChronologyEntry & { order: number }> = [];
  const seen = new Set<string>();

  for (const document of documents) {
    for (const chunk of await indexStore.listChunks(document.id)) {
      for (const date of chunk.dates) {
        const key = `${document.id}|${chunk.pageNumber}|${date}`;
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
        entries.push({
          date,
          isoDate: parseDocumentDate(date),
          documentName: document.name,
          sourcePath: document.sourcePath,
          pageNumber: chunk.pageNumber,
          section: chunk.section,
          excerpt: cleanDisplayText(summarize(chunk.text, [date]) ?? date),
          order: entries.length,
        });
      }
    }
  }

  return entries
    .sort((a, b) => {
      if (a.isoDate && b.isoDate && a.isoDate !== b.isoDate) {
        return a.isoDate < b.isoDate ? -1 : 1;
      }
      if (a.isoDate && !b.isoDate) {
        return -1;
      }
      if (!a.isoDate && b.isoDate) {
        return 1;
      }
      return a.order - b.order;
    })
    .map(({ order: _order, ...entry }) => entry);
}

export function renderChronologyMarkdown(
  jobId: string,
  folderPath: string,
  entries: ChronologyEntry[],
): string {
  const lines = [
    `# Chronology: ${folderPath || "/"}`,
    "",
    `Job \`${jobId}\`, ${entries.length} dated entr${entries.length === 1 ? "y" : "ies"}.`,
    "",
  ];

  if (entries.length === 0) {
    lines.push("No dates found.");
    return `${lines.join("\n")}\n`;
  }

  lines.push("| Date | Document | Page | Section | Excerpt |", "| --- | --- | --- | --- | --- |");
  for (const entry of entries) {
    const date = entry.isoDate && entry.isoDate !== entry.date ? `${entry.isoDate} (${entry.date})` : entry.date;
    lines.push(
      `| ${cell(date)} | ${cell(entry.documentName)} | ${entry.pageNumber} | ${cell(entry.section ?? "")} | ${cell(entry.excerpt)} |`,
    );
  }
  return `${lines.join("\n")}\n`;
}

/** Writes `<artifactDir>/<jobId>-chronology.md` and returns its path. */
export async function exportChronology(options: {
  indexStore: IndexStore;
  artifactDir: string;
  jobId: string;
  folderPath: string;
  documents: DocumentRecord[];
}): Promise<string> {
  const entries = await collectChronology(options.indexStore, options.documents);
  const target = path.resolve(options.artifactDir, `${options.jobId}-chronology.md`);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(
    target,
    renderChronologyMarkdown(options.jobId, options.folderPath, entries),
    "utf-8",
  );
  return target;
}

/**
 * Parses the date shapes the metadata extractor finds. Slash and dash dates
 * are month first; dotted dates are day first. Two-digit years below 50 are
 * read as 20xx.
 */
export function parseDocumentDate(value: string): string | null {
  const text = value.trim();
  let match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(text);
  if (match) {
    return toIsoDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = /^(\d{1,2})[/-](\d{1,2})[/-](\d{2,4})$/.exec(text);
  if (match) {
    return toIsoDate(expandYear(match[3]), Number(match[1]), Number(match[2]));
  }

  match = /^(\d{1,2})\.(\d{1,2})\.(\d{2,4})$/.exec(text);
  if (match) {
    return toIsoDate(expandYear(match[3]), Number(match[2]), Number(match[1]));
  }

  match = /^([a-z]+)\.? (\d{1,2})(?:st|nd|rd|th)?,? (\d{4})$/i.exec(text);
  if (match) {
    return toIsoDate(Number(match[3]), monthNumber(match[1]), Number(match[2]));
  }

  match = /^(\d{1,2}) ([a-z]+)\.?,? (\d{4})$/i.exec(text);
  if (match) {
    return toIsoDate(Number(match[3]), monthNumber(match[2]), Number(match[1]));
  }

  return null;
}

function expandYear(raw: string): number {
  const year = Number(raw);
  if (raw.length === 2) {
    return year < 50 ? 2000 + year : 1900 + year;
  }
  return year;
}

function monthNumber(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase()) + 1;
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function cell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\s+/g, " ").trim();
}
