/**
 * Question History Store
 *
 * Persists, per unit, the fingerprints of every question already emitted
 * for one tier. One store (one storage key) per tier; entries are never
 * evicted.
 */

import type { IStorageAdapter } from '@/ports/IStorageAdapter';

/**
 * Unit short name -> fingerprints in the order they were accepted
 */
export type HistoryDocument = Record<string, string[]>;

export class QuestionHistoryStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly storage: IStorageAdapter,
    readonly key: string,
  ) {}

  /**
   * Load the full document. A missing document is an empty history;
   * malformed entries are dropped.
   */
  async load(): Promise<HistoryDocument> {
    const raw = await this.storage.read<unknown>(this.key);
    return sanitizeHistory(raw);
  }

  /**
   * Replace the full document
   */
  async save(document: HistoryDocument): Promise<void> {
    await this.storage.write(this.key, document);
  }

  /**
   * Fingerprints recorded for one unit
   */
  async getUnitHistory(unitName: string): Promise<string[]> {
    const document = await this.load();
    return document[unitName] ?? [];
  }

  /**
   * Read-modify-write one unit's history.
   * `update` receives the unit's list and may mutate it; the document is
   * saved only when its length changed. Calls on the same store
   * run one at a time.
   */
  updateUnit<T>(unitName: string, update: (history: string[]) => Promise<T> | T): Promise<T> {
    const run = async (): Promise<T> => {
      const document = await this.load();
      const history = document[unitName] ?? [];
      const before = history.length;

      const result = await update(history);

      if (history.length !== before) {
        document[unitName] = history;
        await this.save(document);
      }
      return result;
    };

    const next = this.queue.then(run, run);
    this.queue = next.catch(() => undefined);
    return next;
  }

  /**
   * Forget every recorded question for this tier
   */
  async clear(): Promise<void> {
    await this.storage.delete(this.key);
  }
}

function sanitizeHistory(raw: unknown): HistoryDocument {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return {};
  }

  const document: HistoryDocument = {};
  for (const [unitName, value] of Object.entries(raw)) {
    if (!Array.isArray(value)) continue;
    document[unitName] = value.filter((entry): entry is string => typeof entry === 'string');
  }
  return document;
}
