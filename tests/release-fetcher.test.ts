import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { MemoryCacheStore } from '@main/services/cache/MemoryCacheStore';
import { resolveUpdaterSetup } from '@main/services/config/UpdaterConfig';
import {
  FetchHttpClient,
  HttpTransportError,
  type HttpClient,
  type HttpRequestOptions,
  type HttpResponse
} from '@main/services/http/HttpClient';
import { Logger } from '@main/services/logging/Logger';
import { ReleaseFetcher } from '@main/services/update/ReleaseFetcher';

const RELEASE_URL = 'https://api.github.com/repos/acme/my-plugin/releases/latest';
const tempDirs: string[] = [];

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();

  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('ReleaseFetcher', () => {
  it('normaliza a release e grava no cache', async () => {
    const { fetcher, get, cache } = createFetcher(() => jsonResponse(githubRelease()));
    const { target, config } = resolveUpdaterSetup('my-plugin/my-plugin.php', 'acme/my-plugin');

    const result = await fetcher.fetchLatestRelease(target, config);

    expect(result).toEqual({
      ok: true,
      release: {
        tagName: 'v1.3.0',
        publishedAt: '2026-01-10T12:00:00Z',
        body: 'Notas',
        assets: [{ name: 'my-plugin.zip', downloadUrl: 'https://example.invalid/my-plugin.zip', size: 2048 }]
      }
    });
    expect(get).toHaveBeenCalledTimes(1);
    expect(get.mock.calls[0]?.[0]).toBe(RELEASE_URL);
    expect(cache.has('release:my-plugin')).toBe(true);
  });

  it('nao acessa a rede quando a release esta em cache', async () => {
    const { fetcher, get } = createFetcher(() => jsonResponse(githubRelease()));
    const { target, config } = resolveUpdaterSetup('my-plugin/my-plugin.php', 'acme/my-plugin');

    await fetcher.fetchLatestRelease(target, config);
    const second = await fetcher.fetchLatestRelease(target, config);

    expect(second.ok).toBe(true);
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('envia Authorization somente quando ha token', async () => {
    const { fetcher, get } = createFetcher(() => jsonResponse(githubRelease()));
    const anonymous = resolveUpdaterSetup('my-plugin/my-plugin.php', 'acme/my-plugin');
    const authenticated = resolveUpdaterSetup('other/other.php', 'acme/other', { authToken: 'test-token' });

    await fetcher.fetchLatestRelease(anonymous.target, anonymous.config);
    await fetcher.fetchLatestRelease(authenticated.target, authenticated.config);

    const firstHeaders = get.mock.calls[0]?.[1].headers;
    const secondHeaders = get.mock.calls[1]?.[1].headers;
    expect(firstHeaders).toEqual({ Accept: 'application/json', 'User-Agent': 'plugin-update-resolver/0.1' });
    expect(secondHeaders?.Authorization).toBe('Bearer test-token');
    expect(get.mock.calls[1]?.[1].timeoutSeconds).toBe(30);
  });

  it('anota rate limit restante em HTTP 403', async () => {
    const { fetcher } = createFetcher(() => ({
      statusCode: 403,
      headers: { 'x-ratelimit-remaining': '0' },
      body: Buffer.from('{"message":"API rate limit exceeded"}')
    }));
    const { target, config } = resolveUpdaterSetup('my-plugin/my-plugin.php', 'acme/my-plugin');

    const result = await fetcher.fetchLatestRelease(target, config);

    expect(result).toEqual({
      ok: false,
      failure: {
        cause: 'http-error',
        statusCode: 403,
        message: 'GitHub API request failed: HTTP 403 (rate limit exceeded or insufficient permissions)',
        rateLimitRemaining: '0'
      }
    });
  });

  it.each([
    [404, 'repository not found or private'],
    [401, 'authentication failed'],
    [502, 'upstream server error — transient']
  ])('anota HTTP %i', async (statusCode, annotation) => {
    const { fetcher } = createFetcher(() => ({ statusCode, headers: {}, body: Buffer.from('') }));
    const { target, config } = resolveUpdaterSetup('my-plugin/my-plugin.php', 'acme/my-plugin');

    const result = await fetcher.fetchLatestRelease(target, config);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.cause).toBe('http-error');
      expect(result.failure.statusCode).toBe(statusCode);
      expect(result.failure.message).toBe(`GitHub API request failed: HTTP ${statusCode} (${annotation})`);
    }
  });

  it('classifica corpo vazio, JSON invalido e erro de transporte', async () => {
    const { target, config } = resolveUpdaterSetup('my-plugin/my-plugin.php', 'acme/my-plugin');

    const empty = await createFetcher(() => ({ statusCode: 200, headers: {}, body: Buffer.from('  ') })).fetcher.fetchLatestRelease(
      target,
      config
    );
    const malformed = await createFetcher(() => ({
      statusCode: 200,
      headers: {},
      body: Buffer.from('{oops')
    })).fetcher.fetchLatestRelease(target, config);
    const list = await createFetcher(() => jsonResponse([])).fetcher.fetchLatestRelease(target, config);
    const network = await createFetcher(() => {
      throw new HttpTransportError('socket hang up', RELEASE_URL, false);
    }).fetcher.fetchLatestRelease(target, config);

    expect(empty.ok ? null : empty.failure.cause).toBe('empty-body');
    expect(malformed.ok ? null : malformed.failure.cause).toBe('malformed-json');
    expect(list.ok ? null : list.failure.cause).toBe('malformed-json');
    expect(network.ok ? null : network.failure.cause).toBe('network-error');
    expect(network.ok ? null : network.failure.message).toBe('Falha de rede ao consultar GitHub: socket hang up');
  });

  it('nao grava falhas no cache e registra o erro', async () => {
    const { fetcher, get, cache, logger } = createFetcher(() => ({ statusCode: 404, headers: {}, body: Buffer.from('') }));
    const { target, config } = resolveUpdaterSetup('my-plugin/my-plugin.php', 'acme/my-plugin');

    await fetcher.fetchLatestRelease(target, config);
    await fetcher.fetchLatestRelease(target, config);

    expect(get).toHaveBeenCalledTimes(2);
    expect(cache.has('release:my-plugin')).toBe(false);
    const failures = logger.entries().filter((entry) => entry.message === 'release.fetch.failed');
    expect(failures).toHaveLength(2);
    expect(failures[0]?.level).toBe('error');
    expect(failures[0]?.meta).toMatchObject({ repository: 'acme/my-plugin', cause: 'http-error', statusCode: 404 });
  });

  it('usa fetch global pelo FetchHttpClient', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => {
      return new Response(JSON.stringify(githubRelease()), {
        status: 200,
        headers: { 'Content-Type': 'application/json', 'X-RateLimit-Remaining': '59' }
      });
    });
    vi.stubGlobal('fetch', fetchMock);

    const dir = createTempDir();
    const logger = new Logger(dir);
    const fetcher = new ReleaseFetcher(new FetchHttpClient(), new MemoryCacheStore(), logger);
    const { target, config } = resolveUpdaterSetup('my-plugin/my-plugin.php', 'acme/my-plugin', {
      apiBaseUrl: 'https://github.example.invalid/api/v3/'
    });

    const result = await fetcher.fetchLatestRelease(target, config);

    expect(result.ok).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://github.example.invalid/api/v3/repos/acme/my-plugin/releases/latest');
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      Accept: 'application/json',
      'User-Agent': 'plugin-update-resolver/0.1'
    });
  });

  it('converte falha do fetch em network-error', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const fetcher = new ReleaseFetcher(new FetchHttpClient(), new MemoryCacheStore(), new Logger(createTempDir()));
    const { target, config } = resolveUpdaterSetup('my-plugin/my-plugin.php', 'acme/my-plugin');

    const result = await fetcher.fetchLatestRelease(target, config);

    expect(result).toEqual({
      ok: false,
      failure: {
        cause: 'network-error',
        statusCode: null,
        message: 'Falha de rede ao consultar GitHub: fetch failed',
        rateLimitRemaining: null
      }
    });
  });
});

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'updater-release-fetcher-'));
  tempDirs.push(dir);
  return dir;
}

function createFetcher(respond: (url: string) => HttpResponse) {
  const get = vi.fn(async (url: string, _options: HttpRequestOptions): Promise<HttpResponse> => respond(url));
  const http: HttpClient = { get };
  const cache = new MemoryCacheStore();
  const logger = new Logger(createTempDir());

  return {
    fetcher: new ReleaseFetcher(http, cache, logger),
    get,
    cache,
    logger
  };
}

function jsonResponse(body: unknown): HttpResponse {
  return {
    statusCode: 200,
    headers: { 'content-type': 'application/json' },
    body: Buffer.from(JSON.stringify(body))
  };
}

function githubRelease() {
  return {
    tag_name: 'v1.3.0',
    published_at: '2026-01-10T12:00:00Z',
    body: 'Notas',
    draft: false,
    assets: [
      {
        name: 'my-plugin.zip',
        browser_download_url: 'https://example.invalid/my-plugin.zip',
        size: 2048
      }
    ]
  };
}
