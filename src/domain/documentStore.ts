export interface DocumentStoreEntry {
  name: string;
  isFolder: boolean;
}

/**
 * Remote (or local) file tree the ingestion jobs read from. Paths are
 * slash-separated and relative to the store root; `""` is the root itself.
 */
export interface DocumentStore {
  list(path: string): Promise<DocumentStoreEntry[]>;
  fetch(path: string): Promise<Buffer>;
}

export function joinStorePath(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}
