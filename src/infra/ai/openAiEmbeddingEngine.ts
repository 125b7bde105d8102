import { z } from "zod";
import { BaseEmbeddingEngine, EmbeddingEngineOptions, responseError } from "./types.js";

interface OpenAiEmbeddingEngineOptions extends EmbeddingEngineOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

export class OpenAiEmbeddingEngine extends BaseEmbeddingEngine {
  private readonly apiKey: string;

  private readonly model: string;

  private readonly baseUrl: string;

  constructor(options: OpenAiEmbeddingEngineOptions) {
    super(options);
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = (options.baseUrl ?? "https://api.openai.com").replace(/\/+$/, "");
  }

  protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
    const response = await fetch(`${this.baseUrl}/v1/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        input: texts,
        dimensions: this.dimension,
      }),
    });

    if (!response.ok) {
      throw await responseError("OpenAI embeddings", response);
    }

    const data = embeddingResponseSchema.parse(await response.json());
    return data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
