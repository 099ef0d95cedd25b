import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileStorageAdapter } from '@/adapters/filesystem/FileStorageAdapter';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

describe('FileStorageAdapter', () => {
  let baseDir: string;
  let adapter: FileStorageAdapter;

  beforeEach(() => {
    baseDir = mkdtempSync(join(tmpdir(), 'paper-storage-'));
    adapter = new FileStorageAdapter(baseDir);
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
  });

  it('writes documents as <key>.json', async () => {
    await adapter.write('six_mark_history', { 'UNIT I': ['abc'] });

    const content = readFileSync(join(baseDir, 'six_mark_history.json'), 'utf-8');
    expect(content).toBe('{"UNIT I":["abc"]}');
  });

  it('reads back written documents', async () => {
    await adapter.write('question_history', { 'UNIT II': ['x', 'y'] });

    await expect(adapter.read('question_history')).resolves.toEqual({ 'UNIT II': ['x', 'y'] });
  });

  it('returns null for missing documents', async () => {
    await expect(adapter.read('missing')).resolves.toBeNull();
  });

  it('treats unreadable JSON as absent', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    writeFileSync(join(baseDir, 'broken.json'), '{not json');

    await expect(adapter.read('broken')).resolves.toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('deletes documents and ignores missing ones', async () => {
    await adapter.write('a', 1);
    await adapter.write('b', 2);

    await adapter.delete('a');
    await adapter.delete('a');

    expect(existsSync(join(baseDir, 'a.json'))).toBe(false);
    await expect(adapter.read('b')).resolves.toBe(2);
  });
});
