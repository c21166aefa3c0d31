import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { CacheStore } from '@main/services/cache/CacheStore';

interface PersistedCacheFile {
  key: string;
  expiresAt: string;
  value: unknown;
}

/**
 * One JSON file per key under `{baseDir}/cache`. Expired or unreadable files
 * are removed on read and reported as a miss.
 */
export class FileCacheStore implements CacheStore {
  private readonly cacheDir: string;

  constructor(
    baseDir: string,
    private readonly now: () => number = Date.now
  ) {
    this.cacheDir = path.join(baseDir, 'cache');
    fs.mkdirSync(this.cacheDir, { recursive: true });
  }

  async get(key: string): Promise<unknown | null> {
    const filePath = this.filePathFor(key);
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf-8');
    } catch {
      return null;
    }

    const file = parseCacheFile(raw);
    if (!file || file.key !== key || Date.parse(file.expiresAt) <= this.now()) {
      await fs.promises.rm(filePath, { force: true });
      return null;
    }

    return file.value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const file: PersistedCacheFile = {
      key,
      expiresAt: new Date(this.now() + Math.max(0, ttlSeconds) * 1000).toISOString(),
      value
    };

    const filePath = this.filePathFor(key);
    // temp unico por escrita; o ultimo rename vence
    const tempPath = `${filePath}.${process.pid}.${crypto.randomUUID()}.tmp`;
    try {
      await fs.promises.writeFile(tempPath, JSON.stringify(file), 'utf-8');
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    await fs.promises.rm(this.filePathFor(key), { force: true });
  }

  private filePathFor(key: string): string {
    const digest = crypto.createHash('sha256').update(key).digest('hex').slice(0, 16);
    return path.join(this.cacheDir, `${sanitizeKey(key)}-${digest}.json`);
  }
}

function parseCacheFile(raw: string): PersistedCacheFile | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== 'object') {
      return null;
    }

    if (!('key' in parsed) || !('expiresAt' in parsed) || !('value' in parsed)) {
      return null;
    }

    const { key, expiresAt, value } = parsed;
    if (typeof key !== 'string' || typeof expiresAt !== 'string') {
      return null;
    }

    return { key, expiresAt, value };
  } catch {
    return null;
  }
}

function sanitizeKey(key: string): string {
  const safe = key.replace(/[^a-zA-Z0-9._-]+/g, '_');
  return safe || 'entry';
}
