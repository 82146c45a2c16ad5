export type StorageReadOptions = {
  writeIfMissing?: boolean;
};

export interface StoragePort {
  /**
   * Parsed JSON at `path`, or `fallback` when the file is missing or not
   * valid JSON. `writeIfMissing` persists the fallback only when the file
   * does not exist; an unreadable file is never overwritten.
   */
  readJson<T>(path: string, fallback: T, options?: StorageReadOptions): Promise<T>;
  list(path: string): Promise<string[]>;
  /** Returns false when there was nothing to remove. */
  remove(path: string): Promise<boolean>;
}
