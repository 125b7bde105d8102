import { RetryPolicy } from "../../config/env.js";
import { DocumentStore, DocumentStoreEntry } from "../../domain/documentStore.js";
import { Sleep, withRetry } from "../../utils/retry.js";
import type { Logger } from "../logging/logger.js";

export class ResilientDocumentStore implements DocumentStore {
  constructor(
    private readonly inner: DocumentStore,
    private readonly policy: RetryPolicy,
    private readonly logger?: Logger,
    private readonly sleep?: Sleep,
  ) {}

  list(path: string): Promise<DocumentStoreEntry[]> {
    return withRetry(() => this.inner.list(path), {
      policy: this.policy,
      operation: "documents.list",
      logger: this.logger,
      sleep: this.sleep,
    });
  }

  fetch(path: string): Promise<Buffer> {
    return withRetry(() => this.inner.fetch(path), {
      policy: this.policy,
      operation: "documents.fetch",
      logger: this.logger,
      sleep: this.sleep,
    });
  }
}
