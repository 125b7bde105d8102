import { z } from "zod";
import { BaseEmbeddingEngine, EmbeddingEngineOptions, responseError } from "./types.js";

interface OllamaEmbeddingEngineOptions extends EmbeddingEngineOptions {
  baseUrl: string;
  model: string;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaEmbeddingEngine extends BaseEmbeddingEngine {
  private readonly baseUrl: string;

  private readonly model: string;

  constructor(options: OllamaEmbeddingEngineOptions) {
    super(options);
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
  }

  protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedOne(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  private async embedOne(text: string): Promise<number[]> {
    const response = await fetch(`${this.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        prompt: text,
      }),
    });

    if (!response.ok) {
      throw await responseError("Ollama embeddings", response);
    }

    const data = embeddingsResponseSchema.parse(await response.json());
    if (data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }
}
