import { InMemoryStorageAdapter } from '@/adapters/mock/InMemoryStorageAdapter';
import { beforeEach, describe, expect, it } from 'vitest';

describe('InMemoryStorageAdapter', () => {
  let adapter: InMemoryStorageAdapter;

  beforeEach(() => {
    adapter = new InMemoryStorageAdapter();
  });

  describe('read/write', () => {
    it('should write and read object data', async () => {
      const data = { 'UNIT I': ['a', 'b'] };
      await adapter.write('history', data);
      const result = await adapter.read<typeof data>('history');
      expect(result).toEqual(data);
    });

    it('should return copies rather than stored references', async () => {
      const data = { 'UNIT I': ['a'] };
      await adapter.write('history', data);
      data['UNIT I'].push('b');

      const result = await adapter.read<typeof data>('history');
      expect(result).toEqual({ 'UNIT I': ['a'] });
    });

    it('should return null for non-existent key', async () => {
      const result = await adapter.read('non-existent');
      expect(result).toBeNull();
    });

    it('should overwrite existing data', async () => {
      await adapter.write('key', 'first');
      await adapter.write('key', 'second');
      const result = await adapter.read<string>('key');
      expect(result).toBe('second');
    });
  });

  describe('delete', () => {
    it('should remove only the given document', async () => {
      await adapter.write('one', 1);
      adapter._setDocument('two', 2);
      expect(adapter._getKeys()).toEqual(['one', 'two']);

      await adapter.delete('one');
      await adapter.delete('one');
      expect(await adapter.read('one')).toBeNull();
      expect(adapter._getKeys()).toEqual(['two']);
    });
  });
});
