import { z } from 'zod';
import type {
  RawRelease,
  ReleaseFetchFailure,
  ReleaseFetchResult,
  UpdateTarget,
  UpdaterConfig
} from '@shared/contracts';
import { cacheKey, writeCache, type CacheStore } from '@main/services/cache/CacheStore';
import { buildRequestHeaders, HttpTransportError, type HttpClient, type HttpResponse } from '@main/services/http/HttpClient';
import { describeError, type UpdaterLogger } from '@main/services/logging/Logger';

const githubAssetSchema = z.object({
  name: z.string().catch(''),
  browser_download_url: z.string().catch(''),
  size: z.number().nonnegative().catch(0)
});

const githubReleaseSchema = z.object({
  tag_name: z.string().nullish(),
  published_at: z.string().nullish(),
  body: z.string().nullish(),
  assets: z.array(githubAssetSchema).nullish()
});

const rawReleaseSchema = z.object({
  tagName: z.string(),
  publishedAt: z.string(),
  body: z.string(),
  assets: z.array(
    z.object({
      name: z.string(),
      downloadUrl: z.string(),
      size: z.number()
    })
  )
});

export class ReleaseFetcher {
  constructor(
    private readonly http: HttpClient,
    private readonly cache: CacheStore,
    private readonly logger: UpdaterLogger
  ) {}

  async fetchLatestRelease(target: UpdateTarget, config: UpdaterConfig): Promise<ReleaseFetchResult> {
    const key = cacheKey('release', target.slug);
    const cached = rawReleaseSchema.safeParse(await this.cache.get(key));
    if (cached.success) {
      this.logger.debug('release.cache.hit', { slug: target.slug });
      return { ok: true, release: cached.data };
    }

    const url = `${config.apiBaseUrl}/repos/${target.repository}/releases/latest`;
    let response: HttpResponse;
    try {
      response = await this.http.get(url, {
        headers: buildRequestHeaders({
          accept: 'application/json',
          userAgent: config.userAgent,
          authToken: config.authToken
        }),
        timeoutSeconds: config.requestTimeoutSeconds
      });
    } catch (error) {
      return this.fail(target, {
        cause: 'network-error',
        statusCode: null,
        message:
          error instanceof HttpTransportError && error.timedOut
            ? `Falha de rede ao consultar GitHub: tempo limite de ${config.requestTimeoutSeconds}s excedido`
            : `Falha de rede ao consultar GitHub: ${describeError(error)}`,
        rateLimitRemaining: null
      });
    }

    if (response.statusCode !== 200) {
      return this.fail(target, describeHttpFailure(response));
    }

    const text = response.body.toString('utf-8');
    if (!text.trim()) {
      return this.fail(target, {
        cause: 'empty-body',
        statusCode: response.statusCode,
        message: 'GitHub respondeu sem corpo para a release mais recente',
        rateLimitRemaining: null
      });
    }

    const release = parseRelease(text);
    if (!release) {
      return this.fail(target, {
        cause: 'malformed-json',
        statusCode: response.statusCode,
        message: `JSON invalido na resposta do GitHub: ${text.slice(0, 200)}`,
        rateLimitRemaining: null
      });
    }

    await writeCache(this.cache, this.logger, key, release, config.cacheDurationSeconds);
    this.logger.debug('release.fetch.ok', {
      slug: target.slug,
      tagName: release.tagName,
      assets: release.assets.map((asset) => asset.name)
    });

    return { ok: true, release };
  }

  private fail(target: UpdateTarget, failure: ReleaseFetchFailure): ReleaseFetchResult {
    this.logger.error('release.fetch.failed', {
      repository: target.repository,
      packageFile: target.packageFile,
      slug: target.slug,
      cause: failure.cause,
      statusCode: failure.statusCode,
      message: failure.message,
      rateLimitRemaining: failure.rateLimitRemaining
    });

    return { ok: false, failure };
  }
}

export function describeHttpFailure(response: Pick<HttpResponse, 'statusCode' | 'headers'>): ReleaseFetchFailure {
  const code = response.statusCode;
  let message = `GitHub API request failed: HTTP ${code}`;
  let rateLimitRemaining: string | null = null;

  if (code === 403) {
    message += ' (rate limit exceeded or insufficient permissions)';
    rateLimitRemaining = response.headers['x-ratelimit-remaining'] ?? null;
  } else if (code === 404) {
    message += ' (repository not found or private)';
  } else if (code === 401) {
    message += ' (authentication failed)';
  } else if (code >= 500 && code <= 599) {
    message += ' (upstream server error — transient)';
  }

  return {
    cause: 'http-error',
    statusCode: code,
    message,
    rateLimitRemaining
  };
}

function parseRelease(text: string): RawRelease | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  if (!json || typeof json !== 'object' || Array.isArray(json) || Object.keys(json).length === 0) {
    return null;
  }

  const parsed = githubReleaseSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }

  return {
    tagName: parsed.data.tag_name ?? '',
    publishedAt: parsed.data.published_at ?? '',
    body: parsed.data.body ?? '',
    assets: (parsed.data.assets ?? []).map((asset) => ({
      name: asset.name,
      downloadUrl: asset.browser_download_url,
      size: asset.size
    }))
  };
}
