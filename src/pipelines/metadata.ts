import { wholeWordPattern } from "../utils/text.js";

const MONTH = "(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\\.?";

const DATE_REGEX = new RegExp(
  [
    "\\b\\d{4}-\\d{1,2}-\\d{1,2}\\b",
    "\\b\\d{1,2}/\\d{1,2}/\\d{2,4}\\b",
    "\\b\\d{1,2}-\\d{1,2}-\\d{2,4}\\b",
    "\\b\\d{1,2}\\.\\d{1,2}\\.\\d{2,4}\\b",
    `\\b${MONTH} \\d{1,2}(?:st|nd|rd|th)?,? \\d{4}\\b`,
    `\\b\\d{1,2} ${MONTH},? \\d{4}\\b`,
  ].join("|"),
  "gi",
);

const WORD_SPAN_REGEX = /\S+/g;

export const DEFAULT_DATE_WINDOW_WORDS = 25;
export const DEFAULT_SUMMARY_WORDS = 10;

export interface Span {
  start: number;
  end: number;
}

export interface DateMatch extends Span {
  value: string;
}

export interface ChunkAnalysis {
  matchedKeywords: string[];
  keywordDates: Record<string, string | null>;
  summary: string | null;
}

export interface MetadataExtractorOptions {
  dateWindowWords?: number;
  summaryWords?: number;
}

/**
 * Annotates chunk text against query keywords: which keywords occur, the date
 * closest to each of them and a short display window around the first match.
 */
export class MetadataExtractor {
  private readonly dateWindowWords: number;
  private readonly summaryWords: number;

  constructor(options: MetadataExtractorOptions = {}) {
    this.dateWindowWords = options.dateWindowWords ?? DEFAULT_DATE_WINDOW_WORDS;
    this.summaryWords = options.summaryWords ?? DEFAULT_SUMMARY_WORDS;
  }

  findKeywords(text: string, keywords: string[]): string[] {
    return findKeywords(text, keywords);
  }

  extractDates(text: string): string[] {
    return extractDates(text);
  }

  findDateNearKeyword(text: string, keyword: string): string | null {
    return findDateNearKeyword(text, keyword, this.dateWindowWords);
  }

  summarize(text: string, keywords: string[]): string | null {
    return summarize(text, keywords, this.summaryWords);
  }

  analyze(text: string, keywords: string[]): ChunkAnalysis {
    const matchedKeywords = findKeywords(text, keywords);
    const keywordDates: Record<string, string | null> = {};
    for (const keyword of matchedKeywords) {
      keywordDates[keyword] = findDateNearKeyword(text, keyword, this.dateWindowWords);
    }

    return {
      matchedKeywords,
      keywordDates,
      summary: summarize(text, matchedKeywords, this.summaryWords),
    };
  }
}

export function findKeywords(text: string, keywords: string[]): string[] {
  return keywords.filter((keyword) => keyword.length > 0 && wholeWordPattern(keyword, "iu").test(text));
}

export function extractDates(text: string): string[] {
  return findDateMatches(text).map((match) => match.value);
}

export function findDateMatches(text: string): DateMatch[] {
  return [...text.matchAll(DATE_REGEX)].map((match) => ({
    value: match[0],
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));
}

/**
 * Date closest (by characters) to any occurrence of `keyword`, considering only
 * dates within `windowWords` words of that occurrence. Ties go to the date that
 * appears first.
 */
export function findDateNearKeyword(
  text: string,
  keyword: string,
  windowWords = DEFAULT_DATE_WINDOW_WORDS,
): string | null {
  const occurrences = findOccurrences(text, keyword);
  if (occurrences.length === 0) {
    return null;
  }

  const wordStarts = wordSpans(text).map((span) => span.start);
  let best: { value: string; distance: number } | null = null;

  for (const date of findDateMatches(text)) {
    const dateFirstWord = wordIndexAt(wordStarts, date.start);
    const dateLastWord = wordIndexAt(wordStarts, date.end - 1);

    for (const occurrence of occurrences) {
      const keywordFirstWord = wordIndexAt(wordStarts, occurrence.start);
      const keywordLastWord = wordIndexAt(wordStarts, occurrence.end - 1);
      if (spanGap(dateFirstWord, dateLastWord, keywordFirstWord, keywordLastWord) > windowWords) {
        continue;
      }

      const distance = spanGap(date.start, date.end, occurrence.start, occurrence.end);
      if (!best || distance < best.distance) {
        best = { value: date.value, distance };
      }
    }
  }

  return best?.value ?? null;
}

/**
 * `maxWords` words of `text` around the earliest whole-word match of any
 * keyword, shifted at either edge of the text so the window stays full.
 */
export function summarize(
  text: string,
  keywords: string[],
  maxWords = DEFAULT_SUMMARY_WORDS,
): string | null {
  let firstMatch: number | null = null;
  for (const keyword of keywords) {
    const [occurrence] = findOccurrences(text, keyword);
    if (occurrence && (firstMatch === null || occurrence.start < firstMatch)) {
      firstMatch = occurrence.start;
    }
  }
  if (firstMatch === null) {
    return null;
  }

  const words = wordSpans(text);
  const anchor = wordIndexAt(
    words.map((span) => span.start),
    firstMatch,
  );

  let start = Math.max(0, anchor - Math.floor((maxWords - 1) / 2));
  let end = start + maxWords;
  if (end > words.length) {
    end = words.length;
    start = Math.max(0, end - maxWords);
  }

  return words
    .slice(start, end)
    .map((span) => text.slice(span.start, span.end))
    .join(" ");
}

function findOccurrences(text: string, keyword: string): Span[] {
  if (!keyword) {
    return [];
  }
  return [...text.matchAll(wholeWordPattern(keyword))].map((match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));
}

function wordSpans(text: string): Span[] {
  return [...text.matchAll(WORD_SPAN_REGEX)].map((match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));
}

/** Index of the whitespace-delimited word containing `offset`. */
function wordIndexAt(wordStarts: number[], offset: number): number {
  let index = 0;
  for (let i = 0; i < wordStarts.length; i += 1) {
    if (wordStarts[i] > offset) {
      break;
    }
    index = i;
  }
  return index;
}

/** Gap between two closed or half-open ranges; zero when they overlap. */
function spanGap(aStart: number, aEnd: number, bStart: number, bEnd: number): number {
  if (aEnd <= bStart) {
    return bStart - aEnd;
  }
  if (bEnd <= aStart) {
    return aStart - bEnd;
  }
  return 0;
}
