import { FileCacheStore } from '@main/services/cache/FileCacheStore';
import { TargetConfigStore } from '@main/services/config/TargetConfigStore';
import { Logger, type LogLevel } from '@main/services/logging/Logger';
import { UpdaterRegistry, type UpdaterRegistryOptions } from '@main/services/update/UpdaterRegistry';

export type * from '@shared/contracts';
export { MemoryCacheStore } from '@main/services/cache/MemoryCacheStore';
export { FileCacheStore } from '@main/services/cache/FileCacheStore';
export type { CacheStore } from '@main/services/cache/CacheStore';
export { DEFAULT_UPDATER_CONFIG, UpdaterConfigError, resolveUpdaterSetup } from '@main/services/config/UpdaterConfig';
export { TargetConfigStore } from '@main/services/config/TargetConfigStore';
export { FetchHttpClient, HttpResponseTooLargeError, HttpTransportError } from '@main/services/http/HttpClient';
export type { HttpClient, HttpRequestOptions, HttpResponse } from '@main/services/http/HttpClient';
export { Logger } from '@main/services/logging/Logger';
export type { LogEntry, LogLevel, UpdaterLogger } from '@main/services/logging/Logger';
export { AdmZipArchiveExtractor, ArchiveExtractionError } from '@main/services/update/ArchiveExtractor';
export type { ArchiveExtractor } from '@main/services/update/ArchiveExtractor';
export { ArchiveValidator } from '@main/services/update/ArchiveValidator';
export type { ArchiveIntegrityChecker, MimeSniffer } from '@main/services/update/ArchiveValidator';
export { resolveDownloadLink } from '@main/services/update/DownloadLinkResolver';
export { SanitizeHtmlSanitizer } from '@main/services/update/HtmlSanitizer';
export type { HtmlSanitizer } from '@main/services/update/HtmlSanitizer';
export { PackageUpdater } from '@main/services/update/PackageUpdater';
export { UpdaterRegistry } from '@main/services/update/UpdaterRegistry';
export type { UpdaterRegistryOptions } from '@main/services/update/UpdaterRegistry';
export { compareVersions } from '@main/services/update/VersionComparator';
export type { VersionComparator } from '@main/services/update/VersionComparator';

export interface CreateUpdaterRegistryOptions extends Omit<UpdaterRegistryOptions, 'logger' | 'cache'> {
  /** Directory holding `logs/`, `cache/` and `config/updater.targets.json`. */
  baseDir: string;
  logLevel?: LogLevel;
}

/**
 * Wires the file-backed logger and cache under `baseDir` and registers every
 * target listed in the registration file.
 */
export function createUpdaterRegistry(options: CreateUpdaterRegistryOptions): UpdaterRegistry {
  const { baseDir, logLevel, ...rest } = options;
  const logger = new Logger(baseDir, { minLevel: logLevel ?? 'info' });
  const registry = new UpdaterRegistry({
    ...rest,
    logger,
    cache: new FileCacheStore(baseDir)
  });

  registry.registerAll(new TargetConfigStore(baseDir, logger).list());
  return registry;
}
