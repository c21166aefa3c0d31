import path from 'node:path';
import { z } from 'zod';
import type { UpdateTarget, UpdaterConfig, UpdaterOptions } from '@shared/contracts';

export const DEFAULT_UPDATER_CONFIG: UpdaterConfig = {
  authToken: null,
  preferJsonMetadata: true,
  cacheDurationSeconds: 21600,
  requestTimeoutSeconds: 30,
  maxArchiveBytes: 52428800,
  apiBaseUrl: 'https://api.github.com',
  userAgent: 'plugin-update-resolver/0.1'
};

export const updaterOptionsSchema = z
  .object({
    authToken: z.string().optional(),
    slug: z.string().trim().min(1).optional(),
    preferJsonMetadata: z.boolean().optional(),
    cacheDurationSeconds: z.number().int().positive().optional(),
    requestTimeoutSeconds: z.number().int().positive().optional(),
    maxArchiveBytes: z.number().int().positive().optional(),
    apiBaseUrl: z.string().url().optional(),
    userAgent: z.string().trim().min(1).optional()
  })
  .strict();

const repositorySchema = z.string().regex(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/, 'repository must be "owner/repo"');

export class UpdaterConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UpdaterConfigError';
  }
}

export interface ResolvedUpdaterSetup {
  target: UpdateTarget;
  config: UpdaterConfig;
}

export function resolveUpdaterSetup(packageFile: string, repository: string, options: unknown = {}): ResolvedUpdaterSetup {
  const normalizedFile = packageFile.trim();
  const normalizedRepository = repository.trim();
  if (!normalizedFile || !normalizedRepository) {
    throw new UpdaterConfigError('packageFile e repository sao obrigatorios.');
  }

  const repo = repositorySchema.safeParse(normalizedRepository);
  if (!repo.success) {
    throw new UpdaterConfigError(formatIssues(repo.error));
  }

  const parsed = updaterOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new UpdaterConfigError(formatIssues(parsed.error));
  }

  return {
    target: {
      packageFile: normalizedFile,
      repository: repo.data,
      slug: parsed.data.slug ?? deriveSlug(normalizedFile)
    },
    config: buildConfig(parsed.data)
  };
}

export function deriveSlug(packageFile: string): string {
  const normalized = packageFile.replace(/\\/g, '/');
  const dir = path.posix.dirname(normalized);
  if (dir && dir !== '.') {
    return path.posix.basename(dir);
  }

  return path.posix.basename(normalized, path.posix.extname(normalized));
}

function buildConfig(options: UpdaterOptions): UpdaterConfig {
  const token = options.authToken?.trim();
  return Object.freeze({
    authToken: token ? token : DEFAULT_UPDATER_CONFIG.authToken,
    preferJsonMetadata: options.preferJsonMetadata ?? DEFAULT_UPDATER_CONFIG.preferJsonMetadata,
    cacheDurationSeconds: options.cacheDurationSeconds ?? DEFAULT_UPDATER_CONFIG.cacheDurationSeconds,
    requestTimeoutSeconds: options.requestTimeoutSeconds ?? DEFAULT_UPDATER_CONFIG.requestTimeoutSeconds,
    maxArchiveBytes: options.maxArchiveBytes ?? DEFAULT_UPDATER_CONFIG.maxArchiveBytes,
    apiBaseUrl: (options.apiBaseUrl ?? DEFAULT_UPDATER_CONFIG.apiBaseUrl).replace(/\/+$/, ''),
    userAgent: options.userAgent ?? DEFAULT_UPDATER_CONFIG.userAgent
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
