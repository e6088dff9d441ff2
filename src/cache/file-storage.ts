import { CacheEntry, CacheStorage } from '../types/index.js';
import { mkdir, readFile, writeFile, unlink, rm, rename } from 'node:fs/promises';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { ParseError } from '../core/errors.js';
import { parseCacheEntry } from './entry.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per entry, named by the SHA-256 of the key.
 * Writes go through a temporary file and a rename, so readers never see a
 * half-written entry.
 */
export class FileStorage implements CacheStorage {
  private dir: string;

  constructor(baseDir: string = '.freshgate/cache') {
    this.dir = baseDir;
  }

  private getHash(key: string): string {
    return createHash('sha256').update(key).digest('hex');
  }

  private getPath(key: string): string {
    return join(this.dir, `${this.getHash(key)}.json`);
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    let content: string;
    try {
      content = await readFile(this.getPath(key), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new ParseError(`Cache file for "${key}" is not valid JSON`, { format: 'json' });
    }
    return parseCacheEntry(data);
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const path = this.getPath(key);
    const tmp = `${path}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(entry), 'utf-8');
    await rename(tmp, path);
  }

  async delete(key: string): Promise<void> {
    try {
      await unlink(this.getPath(key));
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  async clear(): Promise<void> {
    await rm(this.dir, { recursive: true, force: true });
  }
}
