export interface UpdateTarget {
  /** Package file relative to the host's package directory, e.g. `my-plugin/my-plugin.php`. */
  packageFile: string;
  /** GitHub repository in `owner/repo` form. */
  repository: string;
  slug: string;
}

export interface UpdaterConfig {
  authToken: string | null;
  preferJsonMetadata: boolean;
  cacheDurationSeconds: number;
  requestTimeoutSeconds: number;
  maxArchiveBytes: number;
  apiBaseUrl: string;
  userAgent: string;
}

export interface UpdaterOptions {
  authToken?: string;
  slug?: string;
  preferJsonMetadata?: boolean;
  cacheDurationSeconds?: number;
  requestTimeoutSeconds?: number;
  maxArchiveBytes?: number;
  apiBaseUrl?: string;
  userAgent?: string;
}

export interface ReleaseAsset {
  name: string;
  downloadUrl: string;
  size: number;
}

export interface RawRelease {
  tagName: string;
  publishedAt: string;
  body: string;
  assets: ReleaseAsset[];
}

export type ReleaseFetchFailureCause = 'network-error' | 'http-error' | 'empty-body' | 'malformed-json';

export interface ReleaseFetchFailure {
  cause: ReleaseFetchFailureCause;
  statusCode: number | null;
  message: string;
  rateLimitRemaining: string | null;
}

export type ReleaseFetchResult = { ok: true; release: RawRelease } | { ok: false; failure: ReleaseFetchFailure };

export type MetadataSections = Record<string, string>;

export interface ResolvedMetadata {
  name: string;
  slug: string;
  version: string;
  testedUpTo: string;
  minimumHostVersion: string;
  minimumRuntimeVersion: string;
  author: string;
  authorProfileUrl: string;
  lastUpdated: string;
  downloadUrl: string;
  trunkUrl: string;
  sections: MetadataSections;
  banners: Record<string, string>;
  icons: Record<string, string>;
  upgradeNotice: string;
}

export type MetadataSource = 'json' | 'archive';

export interface UpdateDecision {
  available: true;
  id: string;
  slug: string;
  packageFile: string;
  newVersion: string;
  packageUrl: string;
  testedUpTo: string;
  hostUrl: string;
  minimumHostVersion: string;
  minimumRuntimeVersion: string;
}

export type ArchiveValidationErrorCode =
  | 'file_not_found'
  | 'file_too_large'
  | 'invalid_file_type'
  | 'file_read_error'
  | 'invalid_zip_signature'
  | 'zip_integrity_failed';

export type ArchiveValidationResult = { ok: true } | { ok: false; code: ArchiveValidationErrorCode; message: string };

export interface TargetRegistration {
  packageFile: string;
  repository: string;
  config: UpdaterOptions;
}
