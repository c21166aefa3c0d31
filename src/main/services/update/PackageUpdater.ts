import type { ResolvedMetadata, UpdateDecision, UpdateTarget, UpdaterConfig } from '@shared/contracts';
import { describeError, type UpdaterLogger } from '@main/services/logging/Logger';
import { renderMarkdown, type HtmlSanitizer } from '@main/services/update/HtmlSanitizer';
import type { InvalidationHandler } from '@main/services/update/InvalidationHandler';
import type { MetadataResolver } from '@main/services/update/MetadataResolver';
import type { UpdateGate } from '@main/services/update/UpdateGate';

export interface PackageUpdaterServices {
  resolver: MetadataResolver;
  gate: UpdateGate;
  invalidation: InvalidationHandler;
  sanitizer: HtmlSanitizer;
  logger: UpdaterLogger;
}

/**
 * Host-facing entry points for one update target. None of them throws: a
 * failed check surfaces as `null` and the host keeps its current state.
 */
export class PackageUpdater {
  constructor(
    readonly target: UpdateTarget,
    readonly config: UpdaterConfig,
    private readonly services: PackageUpdaterServices
  ) {}

  resolveMetadata(): Promise<ResolvedMetadata | null> {
    return this.services.resolver.resolveMetadata(this.target, this.config);
  }

  async checkForUpdate(installedVersion: string, hostVersion: string): Promise<UpdateDecision | null> {
    try {
      return await this.services.gate.checkForUpdate(this.target, this.config, installedVersion, hostVersion);
    } catch (error) {
      this.services.logger.error('update.check.unexpected', { slug: this.target.slug, error: describeError(error) });
      return null;
    }
  }

  /** Metadata for the host's details dialog, with the release notes as `other_notes`. */
  async getPackageInformation(): Promise<ResolvedMetadata | null> {
    const resolved = await this.services.resolver.resolveRelease(this.target, this.config);
    if (!resolved) {
      return null;
    }

    const sections = { ...resolved.metadata.sections };
    const notes = resolved.release.body.trim();
    if (notes) {
      const html = this.services.sanitizer.sanitize(renderMarkdown(notes));
      if (html) {
        sections.other_notes = html;
      }
    }

    return {
      ...resolved.metadata,
      slug: this.target.slug,
      sections
    };
  }

  async onUpdateApplied(appliedPackageFiles: string | readonly string[]): Promise<boolean> {
    try {
      return await this.services.invalidation.onUpdateApplied(this.target, appliedPackageFiles);
    } catch (error) {
      this.services.logger.error('cache.invalidate.unexpected', { slug: this.target.slug, error: describeError(error) });
      return false;
    }
  }
}
