import { describeError, type UpdaterLogger } from '@main/services/logging/Logger';

export interface CacheStore {
  get(key: string): Promise<unknown | null>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

export type CacheEntryKind = 'release' | 'json' | 'archive';

export const CACHE_ENTRY_KINDS: readonly CacheEntryKind[] = ['release', 'json', 'archive'];

export function cacheKey(kind: CacheEntryKind, slug: string): string {
  return `${kind}:${slug}`;
}

/** Writes through to the store; a rejected write is logged as `cache.write.failed`. */
export async function writeCache(
  cache: CacheStore,
  logger: UpdaterLogger,
  key: string,
  value: unknown,
  ttlSeconds: number
): Promise<void> {
  try {
    await cache.set(key, value, ttlSeconds);
  } catch (error) {
    logger.error('cache.write.failed', { key, error: describeError(error) });
  }
}
