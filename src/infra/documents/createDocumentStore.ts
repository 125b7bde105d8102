import { AppConfig } from "../../config/env.js";
import { DocumentStore } from "../../domain/documentStore.js";
import { Logger, moduleLogger } from "../logging/logger.js";
import { GraphDocumentStore } from "./graphDocumentStore.js";
import { LocalDocumentStore } from "./localDocumentStore.js";
import { ResilientDocumentStore } from "./resilientDocumentStore.js";

export function createDocumentStore(config: AppConfig, parent?: Logger): DocumentStore {
  const logger = moduleLogger("document-store", parent);

  if (config.documentStore === "graph") {
    if (!config.graph) {
      throw new Error("Microsoft Graph credentials are required when DOCUMENT_STORE=graph.");
    }
    logger.info("Using Microsoft Graph document store", { siteId: config.graph.siteId });
    return new ResilientDocumentStore(new GraphDocumentStore(config.graph), config.retry, logger);
  }

  logger.info("Using local document store", { root: config.documentsRoot });
  return new ResilientDocumentStore(
    new LocalDocumentStore(config.documentsRoot),
    config.retry,
    logger,
  );
}
