import { afterEach, describe, expect, it, vi } from "vitest";
import { TransientError } from "../src/domain/errors.js";
import { OllamaEmbeddingEngine } from "../src/infra/ai/ollamaEmbeddingEngine.js";
import { OpenAiEmbeddingEngine } from "../src/infra/ai/openAiEmbeddingEngine.js";
import { logger } from "../src/infra/logging/logger.js";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function ollamaFetch() {
  return vi.fn(async (_url: string, init?: RequestInit) => {
    const body: { prompt: string } = JSON.parse(String(init?.body));
    return json({ embedding: [body.prompt.length, 1, 0] });
  });
}

function ollamaEngine(dimension = 3) {
  return new OllamaEmbeddingEngine({
    dimension,
    maxInputChars: 5,
    logger,
    baseUrl: "http://ollama.test/",
    model: "all-minilm",
  });
}

describe("OllamaEmbeddingEngine", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("probes once, truncates long inputs and keeps input order", async () => {
    const fetchMock = ollamaFetch();
    vi.stubGlobal("fetch", fetchMock);
    const engine = ollamaEngine();

    expect(await engine.embedBatch(["abcdefgh", "ab"])).toEqual([
      [5, 1, 0],
      [2, 1, 0],
    ]);
    expect(await engine.embed("x")).toEqual([1, 1, 0]);

    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(fetchMock.mock.calls[0][0]).toBe("http://ollama.test/api/embeddings");
  });

  it("returns the same vector for the same text", async () => {
    vi.stubGlobal("fetch", ollamaFetch());
    const engine = ollamaEngine();

    const [first, second] = await engine.embedBatch(["renal", "renal"]);
    expect(first).toEqual(second);
    expect(await engine.embed("renal")).toEqual(first);
  });

  it("returns no vectors for no input without calling the backend", async () => {
    const fetchMock = ollamaFetch();
    vi.stubGlobal("fetch", fetchMock);

    expect(await ollamaEngine().embedBatch([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("fails initialization on a dimension mismatch", async () => {
    vi.stubGlobal("fetch", ollamaFetch());

    await expect(ollamaEngine(4).initialize()).rejects.toThrow(
      "Embedding dimension mismatch: expected 4, got 3. Check VECTOR_DIMENSION and the embedding model.",
    );
  });

  it("probes again after a failed initialization", async () => {
    const healthy = ollamaFetch();
    const fetchMock = vi
      .fn(healthy)
      .mockImplementationOnce(async () => new Response("overloaded", { status: 503 }));
    vi.stubGlobal("fetch", fetchMock);
    const engine = ollamaEngine();

    await expect(engine.initialize()).rejects.toBeInstanceOf(TransientError);
    await expect(engine.initialize()).resolves.toBeUndefined();
  });
});

describe("OpenAiEmbeddingEngine", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends the key and dimension and orders vectors by index", async () => {
    const fetchMock = vi.fn(async (_url: string, init?: RequestInit) => {
      const body: { input: string[] } = JSON.parse(String(init?.body));
      const data = body.input.map((text, index) => ({ embedding: [text.length, index], index }));
      return json({ data: data.reverse() });
    });
    vi.stubGlobal("fetch", fetchMock);

    const engine = new OpenAiEmbeddingEngine({
      dimension: 2,
      maxInputChars: 100,
      logger,
      apiKey: "test-secret",
      model: "text-embedding-3-small",
      baseUrl: "http://openai.test",
    });

    expect(await engine.embedBatch(["abc", "de"])).toEqual([
      [3, 0],
      [2, 1],
    ]);

    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe("http://openai.test/v1/embeddings");
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "text-embedding-3-small",
      input: ["abc", "de"],
      dimensions: 2,
    });
  });
});
