import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      transport: "stdio",
      documentStore: "local",
      enablePgvector: false,
      jobRepository: "memory",
      embeddingProvider: "ollama",
      ollamaEmbeddingModel: "all-minilm",
      vectorDimension: 384,
      chunking: { maxChars: 1000, stride: 150, lookahead: 120 },
      retry: { maxRetries: 5, intervalMs: 1000, backoff: "exponential" },
      maxConcurrentJobs: 2,
      defaultTopK: 20,
      exportChronology: false,
      graph: null,
    });
  });

  it("parses numeric and boolean settings", () => {
    const config = loadConfig({
      MCP_TRANSPORT: "http",
      MCP_PORT: "8080",
      EXPORT_CHRONOLOGY: "true",
      RETRY_BACKOFF: "fixed",
      MAX_RETRIES: "0",
    });

    expect(config.transport).toBe("http");
    expect(config.port).toBe(8080);
    expect(config.exportChronology).toBe(true);
    expect(config.retry).toEqual({ maxRetries: 0, intervalMs: 1000, backoff: "fixed" });
  });

  it("rejects incomplete backend settings", () => {
    expect(() => loadConfig({ ENABLE_PGVECTOR: "true" })).toThrow(
      "ENABLE_PGVECTOR=true requires DATABASE_URL.",
    );
    expect(() => loadConfig({ EMBEDDING_PROVIDER: "openai" })).toThrow(
      "EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.",
    );
    expect(() => loadConfig({ DOCUMENT_STORE: "graph", GRAPH_TENANT_ID: "tenant-1" })).toThrow(
      "DOCUMENT_STORE=graph requires GRAPH_TENANT_ID, GRAPH_CLIENT_ID, GRAPH_CLIENT_SECRET and GRAPH_SITE_ID.",
    );
    expect(() => loadConfig({ CHUNK_MAX_CHARS: "100", CHUNK_STRIDE: "100" })).toThrow(
      "CHUNK_STRIDE must be smaller than CHUNK_MAX_CHARS.",
    );
  });
});
