import type { ResolvedMetadata, UpdateDecision, UpdateTarget, UpdaterConfig } from '@shared/contracts';
import type { UpdaterLogger } from '@main/services/logging/Logger';
import type { MetadataResolver } from '@main/services/update/MetadataResolver';
import type { VersionComparator } from '@main/services/update/VersionComparator';

export class UpdateGate {
  constructor(
    private readonly resolver: Pick<MetadataResolver, 'resolveMetadata'>,
    private readonly compare: VersionComparator,
    private readonly logger: UpdaterLogger
  ) {}

  async checkForUpdate(
    target: UpdateTarget,
    config: UpdaterConfig,
    installedVersion: string,
    hostVersion: string
  ): Promise<UpdateDecision | null> {
    const metadata = await this.resolver.resolveMetadata(target, config);
    if (!metadata) {
      this.logger.info('update.check.no_metadata', { slug: target.slug });
      return null;
    }

    return this.decide(target, metadata, installedVersion, hostVersion);
  }

  decide(
    target: UpdateTarget,
    metadata: ResolvedMetadata,
    installedVersion: string,
    hostVersion: string
  ): UpdateDecision | null {
    if (!metadata.version || this.compare(installedVersion, metadata.version) >= 0) {
      this.logger.info('update.check.up_to_date', {
        slug: target.slug,
        installedVersion,
        latestVersion: metadata.version
      });
      return null;
    }

    if (metadata.minimumHostVersion && this.compare(hostVersion, metadata.minimumHostVersion) < 0) {
      this.logger.warn('update.check.host_incompatible', {
        slug: target.slug,
        latestVersion: metadata.version,
        hostVersion,
        minimumHostVersion: metadata.minimumHostVersion
      });
      return null;
    }

    this.logger.info('update.check.available', {
      slug: target.slug,
      installedVersion,
      newVersion: metadata.version
    });

    return {
      available: true,
      id: `github.com/${target.repository}`,
      slug: target.slug,
      packageFile: target.packageFile,
      newVersion: metadata.version,
      packageUrl: metadata.downloadUrl,
      testedUpTo: metadata.testedUpTo,
      hostUrl: metadata.authorProfileUrl,
      minimumHostVersion: metadata.minimumHostVersion,
      minimumRuntimeVersion: metadata.minimumRuntimeVersion
    };
  }
}
