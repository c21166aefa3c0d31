import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { MetadataSource, RawRelease, ReleaseAsset, ResolvedMetadata, UpdateTarget, UpdaterConfig } from '@shared/contracts';
import { cacheKey, writeCache, type CacheStore } from '@main/services/cache/CacheStore';
import {
  buildRequestHeaders,
  HttpResponseTooLargeError,
  type HttpClient,
  type HttpResponse
} from '@main/services/http/HttpClient';
import { describeError, type UpdaterLogger } from '@main/services/logging/Logger';
import type { ArchiveExtractor } from '@main/services/update/ArchiveExtractor';
import type { ArchiveValidator } from '@main/services/update/ArchiveValidator';
import { resolveDownloadLink } from '@main/services/update/DownloadLinkResolver';
import type { HtmlSanitizer } from '@main/services/update/HtmlSanitizer';
import { parsePackageHeader } from '@main/services/update/PackageHeaderParser';
import {
  PackageJsonMetadataValidator,
  type PackageJsonMetadata
} from '@main/services/update/PackageJsonMetadataValidator';
import type { ReleaseFetcher } from '@main/services/update/ReleaseFetcher';
import { readSections } from '@main/services/update/SectionReader';

const JSON_METADATA_ASSET = 'plugin.json';

const resolvedMetadataSchema = z.object({
  name: z.string(),
  slug: z.string(),
  version: z.string(),
  testedUpTo: z.string(),
  minimumHostVersion: z.string(),
  minimumRuntimeVersion: z.string(),
  author: z.string(),
  authorProfileUrl: z.string(),
  lastUpdated: z.string(),
  downloadUrl: z.string(),
  trunkUrl: z.string(),
  sections: z.record(z.string(), z.string()),
  banners: z.record(z.string(), z.string()),
  icons: z.record(z.string(), z.string()),
  upgradeNotice: z.string()
});

export interface MetadataResolverDeps {
  releaseFetcher: ReleaseFetcher;
  http: HttpClient;
  cache: CacheStore;
  archiveValidator: ArchiveValidator;
  extractor: ArchiveExtractor;
  sanitizer: HtmlSanitizer;
  logger: UpdaterLogger;
  /** Directory that receives the per-call work directories. Defaults to `os.tmpdir()`. */
  tempRoot?: string;
  jsonValidator?: PackageJsonMetadataValidator;
}

export interface ResolvedRelease {
  metadata: ResolvedMetadata;
  release: RawRelease;
  source: MetadataSource;
}

export class MetadataResolver {
  private readonly releaseFetcher: ReleaseFetcher;
  private readonly http: HttpClient;
  private readonly cache: CacheStore;
  private readonly archiveValidator: ArchiveValidator;
  private readonly extractor: ArchiveExtractor;
  private readonly sanitizer: HtmlSanitizer;
  private readonly logger: UpdaterLogger;
  private readonly tempRoot: string;
  private readonly jsonValidator: PackageJsonMetadataValidator;

  constructor(deps: MetadataResolverDeps) {
    this.releaseFetcher = deps.releaseFetcher;
    this.http = deps.http;
    this.cache = deps.cache;
    this.archiveValidator = deps.archiveValidator;
    this.extractor = deps.extractor;
    this.sanitizer = deps.sanitizer;
    this.logger = deps.logger;
    this.tempRoot = deps.tempRoot ?? os.tmpdir();
    this.jsonValidator = deps.jsonValidator ?? new PackageJsonMetadataValidator();
  }

  async resolveMetadata(target: UpdateTarget, config: UpdaterConfig): Promise<ResolvedMetadata | null> {
    const resolved = await this.resolveRelease(target, config);
    return resolved?.metadata ?? null;
  }

  async resolveRelease(target: UpdateTarget, config: UpdaterConfig): Promise<ResolvedRelease | null> {
    try {
      return await this.resolve(target, config);
    } catch (error) {
      this.logger.error('metadata.resolve.unexpected', {
        repository: target.repository,
        slug: target.slug,
        error: describeError(error)
      });
      return null;
    }
  }

  private async resolve(target: UpdateTarget, config: UpdaterConfig): Promise<ResolvedRelease | null> {
    const fetched = await this.releaseFetcher.fetchLatestRelease(target, config);
    if (!fetched.ok) {
      this.logger.warn('metadata.resolve.no_release', {
        repository: target.repository,
        cause: fetched.failure.cause
      });
      return null;
    }

    const release = fetched.release;

    if (config.preferJsonMetadata) {
      this.logger.debug('metadata.json.attempt', { slug: target.slug });
      const fromJson = await this.resolveFromJson(target, config, release);
      if (fromJson) {
        this.logger.info('metadata.json.loaded', { slug: target.slug, version: fromJson.version });
        return { metadata: fromJson, release, source: 'json' };
      }
      this.logger.info('metadata.json.unavailable', { slug: target.slug, fallback: 'archive' });
    }

    const downloadUrl = resolveDownloadLink(release, target.slug);
    if (downloadUrl) {
      this.logger.debug('metadata.archive.attempt', { slug: target.slug, downloadUrl });
      const fromArchive = await this.resolveFromArchive(target, config, downloadUrl);
      if (fromArchive) {
        const metadata: ResolvedMetadata = { ...fromArchive, lastUpdated: release.publishedAt };
        this.logger.info('metadata.archive.loaded', { slug: target.slug, version: metadata.version });
        return { metadata, release, source: 'archive' };
      }
      this.logger.error('metadata.archive.failed', { slug: target.slug, downloadUrl });
    } else {
      this.logger.error('metadata.archive.no_download_link', {
        slug: target.slug,
        tagName: release.tagName,
        availableAssets: release.assets.map((asset) => asset.name)
      });
    }

    // JSON so entra como ultimo recurso quando nao era o caminho preferido
    if (!config.preferJsonMetadata) {
      this.logger.debug('metadata.json.last_resort', { slug: target.slug });
      const fromJson = await this.resolveFromJson(target, config, release);
      if (fromJson) {
        this.logger.info('metadata.json.loaded', { slug: target.slug, version: fromJson.version, lastResort: true });
        return { metadata: fromJson, release, source: 'json' };
      }
    }

    this.logger.error('metadata.resolve.failed', {
      repository: target.repository,
      slug: target.slug,
      preferJsonMetadata: config.preferJsonMetadata
    });
    return null;
  }

  private async resolveFromJson(
    target: UpdateTarget,
    config: UpdaterConfig,
    release: RawRelease
  ): Promise<ResolvedMetadata | null> {
    const key = cacheKey('json', target.slug);
    const cached = resolvedMetadataSchema.safeParse(await this.cache.get(key));
    if (cached.success) {
      this.logger.debug('metadata.json.cache_hit', { slug: target.slug });
      return cached.data;
    }

    const assets = release.assets.filter((asset) => asset.name.toLowerCase() === JSON_METADATA_ASSET);
    if (assets.length === 0) {
      this.logger.warn('metadata.json.not_found', {
        slug: target.slug,
        availableAssets: release.assets.map((asset) => asset.name)
      });
      return null;
    }

    for (const asset of assets) {
      const published = await this.loadJsonAsset(asset, config);
      if (!published) {
        continue;
      }

      const metadata = this.fromPackageJson(published, target, release);
      await writeCache(this.cache, this.logger, key, metadata, config.cacheDurationSeconds);
      return metadata;
    }

    return null;
  }

  private async loadJsonAsset(asset: ReleaseAsset, config: UpdaterConfig): Promise<PackageJsonMetadata | null> {
    let response: HttpResponse;
    try {
      response = await this.http.get(asset.downloadUrl, {
        headers: buildRequestHeaders({
          accept: 'application/json',
          userAgent: config.userAgent,
          authToken: config.authToken
        }),
        timeoutSeconds: config.requestTimeoutSeconds
      });
    } catch (error) {
      this.logger.error('metadata.json.fetch_failed', {
        assetUrl: asset.downloadUrl,
        responseCode: null,
        error: describeError(error)
      });
      return null;
    }

    if (response.statusCode !== 200) {
      this.logger.error('metadata.json.fetch_failed', {
        assetUrl: asset.downloadUrl,
        responseCode: response.statusCode,
        error: 'HTTP error'
      });
      return null;
    }

    const text = response.body.toString('utf-8');
    if (!text.trim()) {
      this.logger.error('metadata.json.empty', { assetUrl: asset.downloadUrl });
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      this.logger.error('metadata.json.malformed', {
        assetUrl: asset.downloadUrl,
        jsonError: describeError(error),
        rawContent: text.slice(0, 500)
      });
      return null;
    }

    const validated = this.jsonValidator.validate(json);
    if (!validated.ok) {
      this.logger.error('metadata.json.invalid', {
        assetUrl: asset.downloadUrl,
        error: validated.error,
        missingFields: validated.missingFields,
        availableFields: validated.availableFields
      });
      return null;
    }

    return validated.metadata;
  }

  private fromPackageJson(published: PackageJsonMetadata, target: UpdateTarget, release: RawRelease): ResolvedMetadata {
    const sections: Record<string, string> = {};
    for (const [name, html] of Object.entries(published.sections)) {
      const safe = this.sanitizer.sanitize(html);
      if (safe) {
        sections[name] = safe;
      }
    }

    return {
      name: published.name,
      slug: published.slug,
      version: published.version,
      testedUpTo: published.tested ?? '',
      minimumHostVersion: published.requires ?? '',
      minimumRuntimeVersion: published.requires_php ?? '',
      author: published.author ?? '',
      authorProfileUrl: published.author_profile ?? '',
      lastUpdated: nonBlank(published.last_updated) ?? release.publishedAt,
      downloadUrl: nonBlank(published.download_link) ?? resolveDownloadLink(release, target.slug),
      trunkUrl: published.trunk ?? '',
      sections,
      banners: { ...published.banners },
      icons: { ...published.icons },
      upgradeNotice: published.upgrade_notice ?? ''
    };
  }

  private async resolveFromArchive(
    target: UpdateTarget,
    config: UpdaterConfig,
    downloadUrl: string
  ): Promise<ResolvedMetadata | null> {
    const key = cacheKey('archive', target.slug);
    const cached = resolvedMetadataSchema.safeParse(await this.cache.get(key));
    if (cached.success) {
      this.logger.debug('metadata.archive.cache_hit', { slug: target.slug });
      return cached.data;
    }

    let workDir: string;
    try {
      await fs.promises.mkdir(this.tempRoot, { recursive: true });
      workDir = await fs.promises.mkdtemp(path.join(this.tempRoot, `plugin-extract-${safeSegment(target.slug)}-`));
    } catch (error) {
      this.logger.error('archive.workdir.failed', { tempRoot: this.tempRoot, error: describeError(error) });
      return null;
    }

    try {
      const metadata = await this.extractMetadata(target, config, downloadUrl, workDir);
      if (metadata) {
        await writeCache(this.cache, this.logger, key, metadata, config.cacheDurationSeconds);
      }
      return metadata;
    } finally {
      await this.removePath(workDir);
    }
  }

  private async extractMetadata(
    target: UpdateTarget,
    config: UpdaterConfig,
    downloadUrl: string,
    workDir: string
  ): Promise<ResolvedMetadata | null> {
    const archivePath = path.join(workDir, 'package.zip');
    const extractDir = path.join(workDir, 'extract');

    if (!(await this.download(downloadUrl, archivePath, config))) {
      await this.removePath(archivePath);
      return null;
    }

    const validation = await this.archiveValidator.validate(archivePath, config.maxArchiveBytes);
    if (!validation.ok) {
      await this.removePath(archivePath);
      this.logger.error('archive.validation.failed', {
        downloadLink: downloadUrl,
        code: validation.code,
        validationError: validation.message
      });
      return null;
    }

    try {
      await fs.promises.mkdir(extractDir, { recursive: true });
      await this.extractor.extract(archivePath, extractDir);
    } catch (error) {
      await this.removePath(archivePath);
      await this.removePath(extractDir);
      this.logger.error('archive.extract.failed', {
        downloadLink: downloadUrl,
        extractDir,
        error: describeError(error)
      });
      return null;
    }

    await this.removePath(archivePath);

    const packageFilePath = path.resolve(extractDir, target.packageFile);
    if (!isInside(extractDir, packageFilePath) || !(await isFile(packageFilePath))) {
      this.logger.error('archive.layout.mismatch', {
        expectedPackageFile: target.packageFile,
        extractDir,
        extractedEntries: await listEntries(extractDir)
      });
      await this.removePath(extractDir);
      return null;
    }

    const header = parsePackageHeader(await fs.promises.readFile(packageFilePath, 'utf-8'));
    const sections = await readSections(path.dirname(packageFilePath), this.sanitizer);

    await this.removePath(extractDir);

    return {
      name: header.name,
      slug: target.slug,
      version: header.version,
      testedUpTo: header.testedUpTo,
      minimumHostVersion: header.minimumHostVersion,
      minimumRuntimeVersion: header.minimumRuntimeVersion,
      author: header.author,
      authorProfileUrl: header.authorUri || header.pluginUri,
      lastUpdated: '',
      downloadUrl,
      trunkUrl: '',
      sections,
      banners: {},
      icons: {},
      upgradeNotice: ''
    };
  }

  private async download(url: string, destination: string, config: UpdaterConfig): Promise<boolean> {
    let response: HttpResponse;
    try {
      response = await this.http.get(url, {
        headers: buildRequestHeaders({
          accept: 'application/octet-stream',
          userAgent: config.userAgent,
          authToken: config.authToken
        }),
        timeoutSeconds: config.requestTimeoutSeconds,
        maxBytes: config.maxArchiveBytes
      });
    } catch (error) {
      if (error instanceof HttpResponseTooLargeError) {
        this.logger.error('archive.download.too_large', {
          downloadLink: url,
          contentLength: error.contentLength,
          maxArchiveBytes: error.maxBytes
        });
        return false;
      }
      this.logger.error('archive.download.failed', { downloadLink: url, error: describeError(error) });
      return false;
    }

    if (response.statusCode !== 200) {
      this.logger.error('archive.download.failed', { downloadLink: url, responseCode: response.statusCode });
      return false;
    }

    try {
      await fs.promises.writeFile(destination, response.body);
    } catch (error) {
      this.logger.error('archive.download.write_failed', { downloadLink: url, error: describeError(error) });
      return false;
    }

    return true;
  }

  private async removePath(target: string): Promise<void> {
    try {
      await fs.promises.rm(target, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn('archive.cleanup.failed', { path: target, error: describeError(error) });
    }
  }
}

function nonBlank(value: string | undefined): string | null {
  return typeof value === 'string' && value.trim() ? value : null;
}

function safeSegment(value: string): string {
  const safe = value.replace(/[^a-zA-Z0-9._-]+/g, '_');
  return safe || 'package';
}

function isInside(root: string, candidate: string): boolean {
  const base = path.resolve(root);
  return candidate.startsWith(`${base}${path.sep}`);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function listEntries(dir: string): Promise<string[]> {
  try {
    return (await fs.promises.readdir(dir)).sort();
  } catch {
    return [];
  }
}
