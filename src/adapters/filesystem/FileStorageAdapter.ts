/**
 * File-based storage adapter
 *
 * Stores each document as a JSON file in a base directory.
 * Keys map to file paths (e.g., "six_mark_history" -> "six_mark_history.json").
 */

import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { IStorageAdapter } from '@/ports/IStorageAdapter';

/**
 * File-based implementation of IStorageAdapter
 */
export class FileStorageAdapter implements IStorageAdapter {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
    if (!existsSync(baseDir)) {
      mkdirSync(baseDir, { recursive: true });
    }
  }

  private getFilePath(key: string): string {
    return join(this.baseDir, `${key}.json`);
  }

  async read<T>(key: string): Promise<T | null> {
    const filePath = this.getFilePath(key);
    if (!existsSync(filePath)) {
      return null;
    }
    try {
      const content = readFileSync(filePath, 'utf-8');
      return JSON.parse(content) as T;
    } catch (error) {
      // Unreadable documents are treated as absent and overwritten on next save
      console.warn(`Ignoring unreadable storage file ${filePath}:`, error);
      return null;
    }
  }

  async write<T>(key: string, data: T): Promise<void> {
    const filePath = this.getFilePath(key);
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(filePath, JSON.stringify(data));
  }

  async delete(key: string): Promise<void> {
    const filePath = this.getFilePath(key);
    if (existsSync(filePath)) {
      unlinkSync(filePath);
    }
  }
}
