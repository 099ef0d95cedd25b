import { InMemoryStorageAdapter } from '@/adapters/mock/InMemoryStorageAdapter';
import { QuestionHistoryStore, fingerprintQuestion } from '@/domain/history';
import { beforeEach, describe, expect, it } from 'vitest';

describe('fingerprintQuestion', () => {
  it('ignores surrounding whitespace and case', () => {
    expect(fingerprintQuestion('  What is X?  ')).toBe(fingerprintQuestion('what is x?'));
  });

  it('produces a sha256 hex digest', () => {
    expect(fingerprintQuestion('')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });

  it('distinguishes rephrasings', () => {
    expect(fingerprintQuestion('What is X?')).not.toBe(fingerprintQuestion('Define X.'));
  });
});

describe('QuestionHistoryStore', () => {
  let storage: InMemoryStorageAdapter;
  let store: QuestionHistoryStore;

  beforeEach(() => {
    storage = new InMemoryStorageAdapter();
    store = new QuestionHistoryStore(storage, 'six_mark_history');
  });

  describe('load', () => {
    it('returns an empty history when nothing is stored', async () => {
      await expect(store.load()).resolves.toEqual({});
    });

    it('drops malformed entries', async () => {
      storage._setDocument('six_mark_history', {
        'UNIT I': ['a', 7, 'b'],
        'UNIT II': 'not-a-list',
      });

      await expect(store.load()).resolves.toEqual({ 'UNIT I': ['a', 'b'] });
    });

    it('ignores documents that are not objects', async () => {
      storage._setDocument('six_mark_history', ['a', 'b']);

      await expect(store.load()).resolves.toEqual({});
    });
  });

  describe('updateUnit', () => {
    it('persists fingerprints added by the update', async () => {
      await store.updateUnit('UNIT I', (history) => {
        history.push('f1', 'f2');
      });

      await expect(store.getUnitHistory('UNIT I')).resolves.toEqual(['f1', 'f2']);
      await expect(storage.read('six_mark_history')).resolves.toEqual({ 'UNIT I': ['f1', 'f2'] });
    });

    it('keeps other units untouched', async () => {
      storage._setDocument('six_mark_history', { 'UNIT II': ['old'] });

      await store.updateUnit('UNIT I', (history) => {
        history.push('new');
      });

      await expect(store.load()).resolves.toEqual({ 'UNIT II': ['old'], 'UNIT I': ['new'] });
    });

    it('does not write when nothing changed', async () => {
      await store.updateUnit('UNIT I', () => 'nothing');

      expect(storage._getKeys()).toEqual([]);
    });

    it('returns the update result', async () => {
      const result = await store.updateUnit('UNIT I', (history) => {
        history.push('f1');
        return history.length;
      });

      expect(result).toBe(1);
    });

    it('serializes concurrent updates without losing writes', async () => {
      await Promise.all(
        ['a', 'b', 'c'].map((fingerprint) =>
          store.updateUnit('UNIT I', async (history) => {
            await Promise.resolve();
            history.push(fingerprint);
          }),
        ),
      );

      await expect(store.getUnitHistory('UNIT I')).resolves.toEqual(['a', 'b', 'c']);
    });

    it('keeps working after a failed update', async () => {
      await expect(
        store.updateUnit('UNIT I', () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      await store.updateUnit('UNIT I', (history) => {
        history.push('f1');
      });
      await expect(store.getUnitHistory('UNIT I')).resolves.toEqual(['f1']);
    });
  });

  describe('clear', () => {
    it('removes the stored document', async () => {
      await store.save({ 'UNIT I': ['f1'] });
      await store.clear();

      await expect(store.load()).resolves.toEqual({});
    });
  });
});
