import { AppConfig } from "../../config/env.js";
import { Logger, moduleLogger } from "../logging/logger.js";
import { OllamaEmbeddingEngine } from "./ollamaEmbeddingEngine.js";
import { OpenAiEmbeddingEngine } from "./openAiEmbeddingEngine.js";
import { EmbeddingEngine } from "./types.js";

export function createEmbeddingEngine(config: AppConfig, parent?: Logger): EmbeddingEngine {
  const logger = moduleLogger("embedding", parent);
  const base = {
    dimension: config.vectorDimension,
    maxInputChars: config.embeddingMaxInputChars,
    logger,
  };

  if (config.embeddingProvider === "openai") {
    if (!config.openaiApiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI embeddings.");
    }
    return new OpenAiEmbeddingEngine({
      ...base,
      apiKey: config.openaiApiKey,
      model: config.openaiEmbeddingModel,
    });
  }

  return new OllamaEmbeddingEngine({
    ...base,
    baseUrl: config.ollamaBaseUrl,
    model: config.ollamaEmbeddingModel,
  });
}
