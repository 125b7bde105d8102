import { AppConfig } from "../../config/env.js";
import { IndexStore } from "../../domain/indexStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { Logger, moduleLogger } from "../logging/logger.js";
import { InMemoryIndexStore } from "./inMemoryIndexStore.js";
import { PersistentInMemoryIndexStore } from "./persistentInMemoryIndexStore.js";
import { PgVectorIndexStore } from "./pgVectorIndexStore.js";
import { ResilientIndexStore } from "./resilientIndexStore.js";

export interface IndexStoreBootstrapResult {
  indexStore: IndexStore;
  close: () => Promise<void>;
}

export async function createIndexStore(
  config: AppConfig,
  parent?: Logger,
): Promise<IndexStoreBootstrapResult> {
  const logger = moduleLogger("index-store", parent);

  if (!config.enablePgvector) {
    if (config.persistInMemoryIndex) {
      const store = new PersistentInMemoryIndexStore(config.inMemoryIndexPath, {
        maxBytes: config.maxInMemoryIndexBytes,
      });
      await store.initialize();
      logger.info("Using persistent in-memory index", { path: config.inMemoryIndexPath });
      return {
        indexStore: new ResilientIndexStore(store, config.retry, logger),
        close: async () => {
          await store.close();
        },
      };
    }

    logger.info("Using in-memory index");
    return {
      indexStore: new InMemoryIndexStore(),
      close: async () => {},
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const store = new PgVectorIndexStore(pool, config.vectorDimension);
  const indexStore = new ResilientIndexStore(store, config.retry, logger);
  // Schema creation goes through the same retry policy as every other call.
  try {
    await indexStore.listDocuments();
  } catch (error) {
    await pool.end();
    throw error;
  }
  logger.info("Using pgvector index", { dimension: config.vectorDimension });

  return {
    indexStore,
    close: async () => {
      await pool.end();
    },
  };
}
