import { RetryPolicy } from "../config/env.js";
import { InputError } from "../domain/errors.js";
import { IndexStore } from "../domain/indexStore.js";
import {
  KeywordStoredHit,
  SearchHit,
  SearchResult,
  SearchResultGroup,
  StoredHit,
} from "../domain/types.js";
import { EmbeddingEngine } from "../infra/ai/types.js";
import type { Logger } from "../infra/logging/logger.js";
import { MetadataExtractor } from "../pipelines/metadata.js";
import { Sleep, withRetry } from "../utils/retry.js";
import { cleanDisplayText, extractQueryKeywords } from "../utils/text.js";

export interface HybridSearchEngineDeps {
  indexStore: IndexStore;
  embeddingEngine: EmbeddingEngine;
  metadata: MetadataExtractor;
  /** Applied to the query embedding, the same policy ingestion uses. */
  retry: RetryPolicy;
  logger: Logger;
  sleep?: Sleep;
}

/**
 * Hybrid retrieval by classification: chunks found by keyword search are
 * keyword hits, chunks found only by vector search are semantic hits. Scores
 * from the two sides are never combined.
 */
export class HybridSearchEngine {
  constructor(private readonly deps: HybridSearchEngineDeps) {}

  async search(queryText: string, topK: number): Promise<SearchResult> {
    const query = validateQuery(queryText);
    validateTopK(topK);

    const { indexStore, logger } = this.deps;
    const keywords = extractQueryKeywords(query);

    const [keywordHits, semanticHits] = await Promise.all([
      keywords.length > 0 ? indexStore.keywordSearch(keywords, topK) : Promise.resolve([]),
      this.embedQuery(query).then((vector) => indexStore.vectorSearch(vector, topK)),
    ]);

    const hits = this.classify(keywordHits, semanticHits, keywords).slice(0, topK);
    const groups = groupByDocument(hits);

    logger.debug("Search completed", {
      keywords,
      keywordHits: keywordHits.length,
      semanticHits: semanticHits.length,
      returned: hits.length,
    });

    return { query, keywords, totalHits: hits.length, groups };
  }

  private embedQuery(query: string): Promise<number[]> {
    const { embeddingEngine, retry, logger, sleep } = this.deps;
    return withRetry(() => embeddingEngine.embed(query), {
      policy: retry,
      operation: "embedding.embed",
      logger,
      sleep,
    });
  }

  private classify(
    keywordHits: KeywordStoredHit[],
    semanticHits: StoredHit[],
    keywords: string[],
  ): Array<{ hit: SearchHit; stored: StoredHit }> {
    const semanticScores = new Map(semanticHits.map((hit) => [hit.chunk.id, hit.score]));
    const seen = new Set<string>();

    const keywordResults = [...keywordHits]
      .sort((a, b) => b.score - a.score)
      .flatMap((stored) => {
        if (seen.has(stored.chunk.id)) {
          return [];
        }
        seen.add(stored.chunk.id);
        const analysis = this.deps.metadata.analyze(stored.chunk.text, keywords);
        const hit: SearchHit = {
          ...baseHit(stored),
          kind: "keyword",
          score: stored.score,
          keywordScore: stored.score,
          semanticScore: semanticScores.get(stored.chunk.id) ?? null,
          matchedKeywords: analysis.matchedKeywords,
          keywordDates: analysis.keywordDates,
          summary: analysis.summary,
          highlights: stored.highlights,
        };
        return [{ hit, stored }];
      });

    const semanticResults = [...semanticHits]
      .sort((a, b) => b.score - a.score)
      .flatMap((stored) => {
        if (seen.has(stored.chunk.id)) {
          return [];
        }
        seen.add(stored.chunk.id);
        const hit: SearchHit = {
          ...baseHit(stored),
          kind: "semantic",
          score: stored.score,
          keywordScore: null,
          semanticScore: stored.score,
          matchedKeywords: [],
          keywordDates: {},
          summary: null,
          highlights: [],
        };
        return [{ hit, stored }];
      });

    return [...keywordResults, ...semanticResults];
  }
}

function baseHit(stored: StoredHit): Pick<SearchHit, "chunkId" | "dates" | "pageNumber" | "section" | "text"> {
  return {
    chunkId: stored.chunk.id,
    dates: [...stored.chunk.dates],
    pageNumber: stored.chunk.pageNumber,
    section: stored.chunk.section,
    text: cleanDisplayText(stored.chunk.text),
  };
}

function groupByDocument(
  hits: Array<{ hit: SearchHit; stored: StoredHit }>,
): SearchResultGroup[] {
  const groups = new Map<string, SearchResultGroup>();
  for (const { hit, stored } of hits) {
    let group = groups.get(stored.document.id);
    if (!group) {
      group = {
        documentId: stored.document.id,
        documentName: stored.document.name,
        sourcePath: stored.document.sourcePath,
        hits: [],
      };
      groups.set(stored.document.id, group);
    }
    group.hits.push(hit);
  }
  return [...groups.values()];
}

export function validateQuery(queryText: string): string {
  const query = typeof queryText === "string" ? queryText.trim() : "";
  if (!query) {
    throw new InputError("Query text must not be empty.");
  }
  return query;
}

export function validateTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InputError(`top_k must be a positive integer, got ${topK}.`);
  }
}
