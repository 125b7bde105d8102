import { readFileSync } from "node:fs";

const WORD_REGEX = /[\p{L}\p{N}]+/gu;

const STOPWORDS_URL = new URL("../../data/stopwords-en.txt", import.meta.url);

let stopwordCache: Set<string> | null = null;

export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/\t/g, " ").trim();
}

export function tokenize(text: string): string[] {
  return [...new Set(tokenizeForBm25(text))];
}

/** Lower-cased word tokens in order, repeats kept. */
export function tokenizeForBm25(text: string): string[] {
  return text.toLowerCase().match(WORD_REGEX) ?? [];
}

export function getStopwords(): Set<string> {
  if (!stopwordCache) {
    const raw = readFileSync(STOPWORDS_URL, "utf-8");
    stopwordCache = new Set(
      raw
        .split("\n")
        .map((line) => line.trim().toLowerCase())
        .filter((line) => line.length > 0),
    );
  }
  return stopwordCache;
}

/**
 * Query keywords used for exact matching: lower-cased words with stopwords and
 * tokens of three characters or fewer removed, first occurrence order kept.
 */
export function extractQueryKeywords(query: string, minLength = 4): string[] {
  const stopwords = getStopwords();
  const words = query.toLowerCase().match(WORD_REGEX) ?? [];
  const keywords: string[] = [];

  for (const word of words) {
    if (word.length < minLength || stopwords.has(word) || keywords.includes(word)) {
      continue;
    }
    keywords.push(word);
  }
  return keywords;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-word, case-insensitive pattern for a keyword. */
export function wholeWordPattern(keyword: string, flags = "giu"): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}])`, flags);
}

/** Strips highlight markup and collapses whitespace for display. */
export function cleanDisplayText(text: string): string {
  return text
    .replace(/<\/?(?:em|mark|b)>/gi, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
