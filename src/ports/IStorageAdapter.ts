/**
 * Port interface for persistent key-value storage
 * Each key holds one JSON-compatible document (e.g. a tier's question history)
 */
export interface IStorageAdapter {
  /**
   * Read a document
   * @returns Promise resolving to stored data, or null if not found
   */
  read<T>(key: string): Promise<T | null>;

  /**
   * Replace a document
   */
  write<T>(key: string, data: T): Promise<void>;

  /**
   * Delete a document (no-op when absent)
   */
  delete(key: string): Promise<void>;
}
