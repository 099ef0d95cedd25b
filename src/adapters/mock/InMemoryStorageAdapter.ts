import type { IStorageAdapter } from '@/ports/IStorageAdapter';

/**
 * In-memory implementation of IStorageAdapter for tests and dry runs.
 * Documents are stored as JSON text so callers never share references
 * with the store.
 */
export class InMemoryStorageAdapter implements IStorageAdapter {
  private storage: Map<string, string> = new Map();

  async read<T>(key: string): Promise<T | null> {
    const value = this.storage.get(key);
    if (value === undefined) {
      return null;
    }
    return JSON.parse(value) as T;
  }

  async write<T>(key: string, data: T): Promise<void> {
    this.storage.set(key, JSON.stringify(data));
  }

  async delete(key: string): Promise<void> {
    this.storage.delete(key);
  }

  /**
   * Seed a document directly (for testing)
   */
  _setDocument(key: string, data: unknown): void {
    this.storage.set(key, JSON.stringify(data));
  }

  /**
   * Keys of the stored documents, in insertion order (for testing)
   */
  _getKeys(): string[] {
    return Array.from(this.storage.keys());
  }
}
