import { describeError, TransientError } from "../../domain/errors.js";
import type { Logger } from "../logging/logger.js";

/**
 * Text to fixed-dimension vector. One instance is created at start-up and
 * shared by ingestion and search so chunks and queries land in the same space.
 */
export interface EmbeddingEngine {
  readonly dimension: number;
  /** Probes the backend once per process; concurrent callers share the probe. */
  initialize(): Promise<void>;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingEngineOptions {
  dimension: number;
  maxInputChars: number;
  logger: Logger;
}

const PROBE_TEXT = "embedding dimension probe";

/**
 * Shared lifecycle for HTTP-backed engines: memoized initialization with a
 * dimension check, and silent truncation of long inputs.
 */
export abstract class BaseEmbeddingEngine implements EmbeddingEngine {
  readonly dimension: number;

  protected readonly logger: Logger;

  private readonly maxInputChars: number;

  private initPromise: Promise<void> | null = null;

  constructor(options: EmbeddingEngineOptions) {
    this.dimension = options.dimension;
    this.maxInputChars = options.maxInputChars;
    this.logger = options.logger;
  }

  protected abstract requestEmbeddings(texts: string[]): Promise<number[][]>;

  initialize(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.probe().catch((error: unknown) => {
        // A failed probe is not cached, the next caller probes again.
        this.initPromise = null;
        throw error;
      });
    }
    return this.initPromise;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    await this.initialize();

    const vectors = await this.requestEmbeddings(texts.map((text) => this.truncate(text)));
    if (vectors.length !== texts.length) {
      throw new Error(
        `Embedding backend returned ${vectors.length} vector(s) for ${texts.length} input(s).`,
      );
    }
    for (const vector of vectors) {
      this.assertDimension(vector);
    }
    return vectors;
  }

  private async probe(): Promise<void> {
    const [vector] = await this.requestEmbeddings([PROBE_TEXT]);
    this.assertDimension(vector);
    this.logger.info("Embedding engine ready", { dimension: this.dimension });
  }

  private truncate(text: string): string {
    if (text.length <= this.maxInputChars) {
      return text;
    }
    this.logger.debug("Truncating embedding input", {
      length: text.length,
      maxInputChars: this.maxInputChars,
    });
    return text.slice(0, this.maxInputChars);
  }

  private assertDimension(vector: number[] | undefined): void {
    if (!vector || vector.length !== this.dimension) {
      throw new Error(
        `Embedding dimension mismatch: expected ${this.dimension}, got ${vector?.length ?? 0}. Check VECTOR_DIMENSION and the embedding model.`,
      );
    }
  }
}

/**
 * Maps a failed backend response to an error: 5xx and 429 are transient,
 * everything else is permanent.
 */
export async function responseError(service: string, response: Response): Promise<Error> {
  const body = await response.text().catch((error: unknown) => describeError(error));
  const message = `${service} failed (${response.status}): ${body}`;
  if (response.status >= 500 || response.status === 429) {
    return new TransientError(message);
  }
  return new Error(message);
}
