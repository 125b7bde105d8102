import { promises as fs } from "node:fs";
import path from "node:path";
import { DocumentStore, DocumentStoreEntry } from "../../domain/documentStore.js";
import {
  DocumentNotFoundError,
  TransientError,
  UnauthorizedError,
} from "../../domain/errors.js";

const NOT_FOUND_CODES = new Set(["ENOENT", "ENOTDIR", "EISDIR"]);
const DENIED_CODES = new Set(["EACCES", "EPERM"]);
const TRANSIENT_CODES = new Set(["EBUSY", "EMFILE", "ENFILE", "EAGAIN", "EIO"]);

/**
 * Document store over a directory on the local file system. Store paths are
 * resolved against the root and may not leave it.
 */
export class LocalDocumentStore implements DocumentStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async list(storePath: string): Promise<DocumentStoreEntry[]> {
    const absolute = this.resolve(storePath);
    try {
      const entries = await fs.readdir(absolute, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory() || entry.isFile())
        .map((entry) => ({ name: entry.name, isFolder: entry.isDirectory() }));
    } catch (error) {
      throw mapFsError(error, storePath);
    }
  }

  async fetch(storePath: string): Promise<Buffer> {
    const absolute = this.resolve(storePath);
    try {
      return await fs.readFile(absolute);
    } catch (error) {
      throw mapFsError(error, storePath);
    }
  }

  private resolve(storePath: string): string {
    const absolute = path.resolve(this.root, storePath.replace(/^\/+/, ""));
    if (absolute !== this.root && !absolute.startsWith(`${this.root}${path.sep}`)) {
      throw new UnauthorizedError(`Path escapes the document root: ${storePath}`);
    }
    return absolute;
  }
}

function mapFsError(error: unknown, storePath: string): Error {
  const code = error instanceof Error && "code" in error ? String(error.code) : "";
  if (NOT_FOUND_CODES.has(code)) {
    return new DocumentNotFoundError(storePath);
  }
  if (DENIED_CODES.has(code)) {
    return new UnauthorizedError(`Access denied: ${storePath || "/"}`);
  }
  if (TRANSIENT_CODES.has(code)) {
    return new TransientError(`File system busy (${code}): ${storePath || "/"}`, { cause: error });
  }
  return error instanceof Error ? error : new Error(String(error));
}
