import path from "node:path";
import mammoth from "mammoth";
// The package entry point runs a self-test when loaded without a parent module.
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import type { PdfPage, PdfParseOptions, PdfParseResult, PdfTextItem } from "pdf-parse/lib/pdf-parse.js";
import { CorruptContentError, describeError, UnsupportedFormatError } from "../../domain/errors.js";
import { normalizeText } from "../../utils/text.js";

export const WORDS_PER_PAGE = 500;

/** A line holding only a page label such as `Page 4`, or a bare page number. */
const PAGE_MARKER_LINE = /^[ \t]*(?:page[ \t]+)?\d+[ \t]*$/i;

const UTF8_DECODER = new TextDecoder("utf-8", { fatal: true });

export type DocumentFormat = "pdf" | "docx" | "text";

/** File-format reader: raw bytes in, per-page raw text out. */
export interface DocumentReader {
  readonly format: DocumentFormat;
  readonly extensions: readonly string[];
  extractPages(bytes: Buffer): Promise<string[]>;
}

export type PdfParseFn = (dataBuffer: Buffer, options: PdfParseOptions) => Promise<PdfParseResult>;

export class PdfReader implements DocumentReader {
  readonly format = "pdf";

  readonly extensions = [".pdf"];

  constructor(private readonly parse: PdfParseFn = pdfParse) {}

  async extractPages(bytes: Buffer): Promise<string[]> {
    const pages: string[] = [];
    let result: PdfParseResult;

    try {
      result = await this.parse(bytes, {
        pagerender: async (page: PdfPage) => {
          const content = await page.getTextContent({
            normalizeWhitespace: false,
            disableCombineTextItems: false,
          });
          const text = joinTextItems(content.items);
          pages[page.pageIndex] = text;
          return text;
        },
      });
    } catch (error) {
      throw new CorruptContentError(`Unreadable PDF: ${describeError(error)}`, { cause: error });
    }

    // pdf-parse swallows per-page failures; those pages stay empty.
    const pageCount = Math.max(result.numpages, pages.length);
    return Array.from({ length: pageCount }, (_, index) => pages[index] ?? "");
  }
}

export class DocxReader implements DocumentReader {
  readonly format = "docx";

  readonly extensions = [".docx"];

  async extractPages(bytes: Buffer): Promise<string[]> {
    let raw: string;
    try {
      const result = await mammoth.extractRawText({ buffer: bytes });
      raw = result.value;
    } catch (error) {
      throw new CorruptContentError(`Unreadable DOCX: ${describeError(error)}`, { cause: error });
    }
    return paginateText(raw);
  }
}

export class PlainTextReader implements DocumentReader {
  readonly format = "text";

  readonly extensions = [".txt", ".md"];

  async extractPages(bytes: Buffer): Promise<string[]> {
    let text: string;
    try {
      text = UTF8_DECODER.decode(bytes);
    } catch (error) {
      throw new CorruptContentError("Text file is not valid UTF-8.", { cause: error });
    }
    return paginateText(text);
  }
}

/**
 * Looks readers up by the format tag of a file extension.
 */
export class DocumentReaderRegistry {
  private readonly byFormat = new Map<DocumentFormat, DocumentReader>();

  private readonly formatByExtension = new Map<string, DocumentFormat>();

  constructor(readers: DocumentReader[] = defaultReaders()) {
    for (const reader of readers) {
      this.register(reader);
    }
  }

  register(reader: DocumentReader): void {
    this.byFormat.set(reader.format, reader);
    for (const extension of reader.extensions) {
      this.formatByExtension.set(extension.toLowerCase(), reader.format);
    }
  }

  supportedExtensions(): string[] {
    return [...this.formatByExtension.keys()].sort();
  }

  isSupported(filePath: string): boolean {
    return this.formatByExtension.has(extensionOf(filePath));
  }

  formatOf(filePath: string): DocumentFormat {
    const extension = extensionOf(filePath);
    const format = this.formatByExtension.get(extension);
    if (!format) {
      throw new UnsupportedFormatError(extension, this.supportedExtensions());
    }
    return format;
  }

  readerFor(filePath: string): DocumentReader {
    const format = this.formatOf(filePath);
    const reader = this.byFormat.get(format);
    if (!reader) {
      throw new UnsupportedFormatError(extensionOf(filePath), this.supportedExtensions());
    }
    return reader;
  }

  extractPages(filePath: string, bytes: Buffer): Promise<string[]> {
    return this.readerFor(filePath).extractPages(bytes);
  }
}

export function defaultReaders(): DocumentReader[] {
  return [new PdfReader(), new DocxReader(), new PlainTextReader()];
}

/**
 * Splits text on form feeds. Without them, page-marker lines (`Page 4`, or a
 * bare number) separate pages; text with neither is cut into pages of
 * `wordsPerPage` words at word boundaries.
 */
export function paginateText(text: string, wordsPerPage = WORDS_PER_PAGE): string[] {
  const normalized = normalizeText(text);
  if (!normalized) {
    return [];
  }

  if (normalized.includes("\f")) {
    return normalized.split("\f").map((page) => page.trim());
  }

  const marked = splitOnPageMarkers(normalized);
  if (marked.length > 1) {
    return marked;
  }
  return paginateByWords(marked[0], wordsPerPage);
}

/**
 * Marker lines are dropped. A marker starts a new page only when text sits on
 * both sides of it, so headers and footers never produce empty pages.
 */
function splitOnPageMarkers(text: string): string[] {
  const pages: string[] = [];
  let current: string[] = [];

  for (const line of text.split("\n")) {
    if (!PAGE_MARKER_LINE.test(line)) {
      current.push(line);
      continue;
    }
    const page = current.join("\n").trim();
    if (page) {
      pages.push(page);
    }
    current = [];
  }

  const rest = current.join("\n").trim();
  if (rest || pages.length === 0) {
    pages.push(rest);
  }
  return pages;
}

function paginateByWords(text: string, wordsPerPage: number): string[] {
  if (!text) {
    return [];
  }

  const pages: string[] = [];
  let pageStart = 0;
  let wordsInPage = 0;

  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    if (wordsInPage === wordsPerPage) {
      pages.push(text.slice(pageStart, start).trim());
      pageStart = start;
      wordsInPage = 0;
    }
    wordsInPage += 1;
  }
  pages.push(text.slice(pageStart).trim());

  return pages;
}

function joinTextItems(items: PdfTextItem[]): string {
  let text = "";
  let lastY: number | null = null;

  for (const item of items) {
    const y = item.transform[5];
    if (lastY !== null && y !== lastY) {
      text += "\n";
    }
    text += item.str;
    lastY = y;
  }

  return text;
}

function extensionOf(filePath: string): string {
  return path.posix.extname(filePath.replace(/\\/g, "/")).toLowerCase();
}
