import type { TargetRegistration } from '@shared/contracts';
import { resolveUpdaterSetup } from '@main/services/config/UpdaterConfig';
import type { CacheStore } from '@main/services/cache/CacheStore';
import { MemoryCacheStore } from '@main/services/cache/MemoryCacheStore';
import { FetchHttpClient, type HttpClient } from '@main/services/http/HttpClient';
import { describeError, type UpdaterLogger } from '@main/services/logging/Logger';
import { AdmZipArchiveExtractor, type ArchiveExtractor } from '@main/services/update/ArchiveExtractor';
import { ArchiveValidator, type ArchiveIntegrityChecker, type MimeSniffer } from '@main/services/update/ArchiveValidator';
import { SanitizeHtmlSanitizer, type HtmlSanitizer } from '@main/services/update/HtmlSanitizer';
import { InvalidationHandler } from '@main/services/update/InvalidationHandler';
import { MetadataResolver } from '@main/services/update/MetadataResolver';
import { PackageUpdater, type PackageUpdaterServices } from '@main/services/update/PackageUpdater';
import { ReleaseFetcher } from '@main/services/update/ReleaseFetcher';
import { UpdateGate } from '@main/services/update/UpdateGate';
import { compareVersions, type VersionComparator } from '@main/services/update/VersionComparator';

export interface UpdaterRegistryOptions {
  logger: UpdaterLogger;
  cache?: CacheStore;
  http?: HttpClient;
  extractor?: ArchiveExtractor;
  integrityChecker?: ArchiveIntegrityChecker | null;
  mimeSniffer?: MimeSniffer | null;
  sanitizer?: HtmlSanitizer;
  compare?: VersionComparator;
  tempRoot?: string;
}

/**
 * Keeps at most one updater per package file for the lifetime of the process.
 */
export class UpdaterRegistry {
  private readonly updaters = new Map<string, PackageUpdater>();
  private readonly services: PackageUpdaterServices;
  private readonly logger: UpdaterLogger;

  constructor(options: UpdaterRegistryOptions) {
    const adm = new AdmZipArchiveExtractor();
    const cache = options.cache ?? new MemoryCacheStore();
    const http = options.http ?? new FetchHttpClient();
    const sanitizer = options.sanitizer ?? new SanitizeHtmlSanitizer();
    const integrityChecker = options.integrityChecker === undefined ? adm : options.integrityChecker;

    const resolver = new MetadataResolver({
      releaseFetcher: new ReleaseFetcher(http, cache, options.logger),
      http,
      cache,
      archiveValidator: new ArchiveValidator({
        mimeSniffer: options.mimeSniffer ?? null,
        integrityChecker
      }),
      extractor: options.extractor ?? adm,
      sanitizer,
      logger: options.logger,
      tempRoot: options.tempRoot
    });

    this.logger = options.logger;
    this.services = {
      resolver,
      gate: new UpdateGate(resolver, options.compare ?? compareVersions, options.logger),
      invalidation: new InvalidationHandler(cache, options.logger),
      sanitizer,
      logger: options.logger
    };
  }

  /** Throws `UpdaterConfigError` when the file, repository or options are invalid. */
  getOrCreate(packageFile: string, repository: string, options: unknown = {}): PackageUpdater {
    const key = packageFile.trim();
    const existing = this.updaters.get(key);
    if (existing) {
      if (existing.target.repository !== repository.trim()) {
        this.logger.warn('registry.repository_mismatch', {
          packageFile: key,
          registered: existing.target.repository,
          requested: repository
        });
      }
      return existing;
    }

    const setup = resolveUpdaterSetup(packageFile, repository, options);
    const updater = new PackageUpdater(setup.target, setup.config, this.services);
    this.updaters.set(setup.target.packageFile, updater);
    this.logger.debug('registry.created', {
      packageFile: setup.target.packageFile,
      repository: setup.target.repository,
      slug: setup.target.slug
    });
    return updater;
  }

  registerAll(registrations: readonly TargetRegistration[]): PackageUpdater[] {
    const created: PackageUpdater[] = [];
    for (const registration of registrations) {
      try {
        created.push(this.getOrCreate(registration.packageFile, registration.repository, registration.config));
      } catch (error) {
        this.logger.error('registry.registration_invalid', {
          packageFile: registration.packageFile,
          repository: registration.repository,
          error: describeError(error)
        });
      }
    }
    return created;
  }

  get(packageFile: string): PackageUpdater | null {
    return this.updaters.get(packageFile.trim()) ?? null;
  }

  list(): PackageUpdater[] {
    return Array.from(this.updaters.values());
  }

  /** Forgets every updater; cached entries stay in the cache store. */
  clear(): void {
    this.updaters.clear();
  }

  /** Forwards a host "update applied" report to every registered updater. */
  async onUpdateApplied(appliedPackageFiles: string | readonly string[]): Promise<number> {
    let matched = 0;
    for (const updater of this.updaters.values()) {
      if (await updater.onUpdateApplied(appliedPackageFiles)) {
        matched += 1;
      }
    }
    return matched;
  }
}
