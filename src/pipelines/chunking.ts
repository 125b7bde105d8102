import { ChunkingOptions } from "../config/env.js";
import { normalizeText } from "../utils/text.js";

export const DEFAULT_CHUNKING: ChunkingOptions = {
  maxChars: 1000,
  stride: 150,
  lookahead: 120,
};

const MAX_HEADING_CHARS = 80;
const MAX_HEADING_WORDS = 8;

export interface SegmentedChunk {
  index: number;
  pageNumber: number;
  section: string | null;
  text: string;
  /** Offsets into the normalized page text, end exclusive. */
  startOffset: number;
  endOffset: number;
}

interface Heading {
  offset: number;
  label: string;
}

/**
 * Splits per-page document text into overlapping chunks.
 *
 * Chunks never cross a page boundary and never exceed `maxChars`. Adjacent
 * chunks on one page share exactly `stride` characters.
 */
export function segmentPages(
  pages: string[],
  options: ChunkingOptions = DEFAULT_CHUNKING,
): SegmentedChunk[] {
  assertChunkingOptions(options);

  const chunks: SegmentedChunk[] = [];
  let runningSection: string | null = null;

  pages.forEach((rawPage, pageIndex) => {
    const page = normalizeText(rawPage);
    if (!page) {
      return;
    }

    const headings = findHeadings(page);
    for (const span of splitPage(page, options)) {
      chunks.push({
        index: chunks.length,
        pageNumber: pageIndex + 1,
        section: resolveSection(headings, span.start) ?? runningSection,
        text: page.slice(span.start, span.end),
        startOffset: span.start,
        endOffset: span.end,
      });
    }

    if (headings.length > 0) {
      runningSection = headings[headings.length - 1].label;
    }
  });

  return chunks;
}

export function assertChunkingOptions({ maxChars, stride, lookahead }: ChunkingOptions): void {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new Error(`maxChars must be a positive integer, got ${maxChars}.`);
  }
  if (!Number.isInteger(stride) || stride < 0 || stride >= maxChars) {
    throw new Error(`stride must be in [0, maxChars), got ${stride}.`);
  }
  if (!Number.isInteger(lookahead) || lookahead < 0 || lookahead >= maxChars - stride) {
    throw new Error(`lookahead must be in [0, maxChars - stride), got ${lookahead}.`);
  }
}

function splitPage(
  page: string,
  { maxChars, stride, lookahead }: ChunkingOptions,
): Array<{ start: number; end: number }> {
  const spans: Array<{ start: number; end: number }> = [];
  let start = 0;

  while (start < page.length) {
    const hardEnd = Math.min(start + maxChars, page.length);
    let end = hardEnd;

    if (hardEnd < page.length) {
      // The window never reaches back into the overlap, so every chunk advances.
      const windowStart = Math.max(hardEnd - lookahead, start + stride + 1);
      const boundary = findLastSentenceBoundary(page, windowStart, hardEnd);
      if (boundary !== null) {
        end = boundary;
      }
    }

    spans.push({ start, end });
    if (end >= page.length) {
      break;
    }
    start = end - stride;
  }

  return spans;
}

/**
 * Position just after the last sentence end (`.`, `!`, `?` followed by
 * whitespace) or line break inside `[from, to)`, or null.
 */
function findLastSentenceBoundary(text: string, from: number, to: number): number | null {
  for (let i = to - 1; i >= from; i -= 1) {
    const char = text[i];
    if (char === "\n") {
      return i + 1;
    }
    if ((char === "." || char === "!" || char === "?") && i + 1 < text.length && /\s/.test(text[i + 1])) {
      return i + 1;
    }
  }
  return null;
}

function findHeadings(page: string): Heading[] {
  const headings: Heading[] = [];
  let offset = 0;

  for (const line of page.split("\n")) {
    const trimmed = line.trim();
    if (isHeadingLine(trimmed)) {
      headings.push({ offset: offset + line.indexOf(trimmed), label: cleanHeading(trimmed) });
    }
    offset += line.length + 1;
  }

  return headings;
}

function resolveSection(headings: Heading[], chunkStart: number): string | null {
  let label: string | null = null;
  for (const heading of headings) {
    if (heading.offset > chunkStart) {
      break;
    }
    label = heading.label;
  }
  return label;
}

export function isHeadingLine(line: string): boolean {
  if (line.length < 3 || line.length > MAX_HEADING_CHARS || !/\p{L}/u.test(line)) {
    return false;
  }
  if (/^#{1,6}\s+\S/.test(line)) {
    return true;
  }

  const letters = line.replace(/[^\p{L}]/gu, "");
  if (letters.length >= 2 && letters === letters.toUpperCase()) {
    return true;
  }

  const words = line.split(/\s+/);
  if (words.length > MAX_HEADING_WORDS) {
    return false;
  }
  if (/^\p{Lu}[^:]*:$/u.test(line)) {
    return true;
  }
  return /^\p{Lu}/u.test(line) && !/[.!?,;:]$/.test(line) && !/\d$/.test(line);
}

function cleanHeading(line: string): string {
  return line
    .replace(/^#{1,6}\s+/, "")
    .replace(/:$/, "")
    .trim();
}
