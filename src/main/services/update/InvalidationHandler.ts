import type { UpdateTarget } from '@shared/contracts';
import { CACHE_ENTRY_KINDS, cacheKey, type CacheStore } from '@main/services/cache/CacheStore';
import { describeError, type UpdaterLogger } from '@main/services/logging/Logger';

export class InvalidationHandler {
  constructor(
    private readonly cache: CacheStore,
    private readonly logger: UpdaterLogger
  ) {}

  /**
   * Purges the cached release, JSON and archive entries once the host reports
   * this target among the packages it just updated. Returns whether it matched.
   */
  async onUpdateApplied(target: UpdateTarget, appliedPackageFiles: string | readonly string[]): Promise<boolean> {
    const applied = typeof appliedPackageFiles === 'string' ? [appliedPackageFiles] : appliedPackageFiles;
    if (!applied.includes(target.packageFile)) {
      return false;
    }

    for (const kind of CACHE_ENTRY_KINDS) {
      const key = cacheKey(kind, target.slug);
      try {
        await this.cache.delete(key);
      } catch (error) {
        this.logger.error('cache.invalidate.failed', { key, error: describeError(error) });
      }
    }

    this.logger.info('cache.invalidated', {
      packageFile: target.packageFile,
      repository: target.repository
    });
    return true;
  }
}
