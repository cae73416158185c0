export interface StoredDocument {
  path: string;
  hash: string;
  size: number;
}

export interface DocumentStorage {
  /** Persists text extracted from `sourcePath` and returns where it went. */
  save(sourcePath: string, text: string): Promise<StoredDocument>;
  outputPathFor(sourcePath: string): string;
}
