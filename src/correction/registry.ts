import fetch from 'node-fetch';
import type { RetryConfig } from '../config/index.js';
import { describeError, isRecord, type Failure } from '../types.js';
import { withRetry, type Sleep } from '../utils/retry.js';

export type RegistryResponse = {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  arrayBuffer(): Promise<ArrayBuffer>;
};

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<RegistryResponse>;

export type Fetched<T> = { ok: true; value: T } | Failure;

export type ProjectMetadata = {
  projectUrls: string[];
  latestVersion: string | null;
};

export type ReleaseArtifact = {
  url: string;
  filename: string | null;
  md5: string | null;
  sha256: string | null;
};

export interface RegistryClientOptions {
  registryUrl: string;
  timeoutMs: number;
  retry: RetryConfig;
  fetch?: FetchLike;
  sleep?: Sleep;
}

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

/** Read-only client for a PyPI-style JSON API (`/{name}/json`, `/{name}/{version}/json`). */
export class RegistryClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;
  private readonly fetch: FetchLike;
  private readonly sleep?: Sleep;

  constructor(options: RegistryClientOptions) {
    this.baseUrl = options.registryUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry;
    this.fetch = options.fetch ?? defaultFetch;
    this.sleep = options.sleep;
  }

  async getProject(packageName: string): Promise<Fetched<ProjectMetadata>> {
    const response = await this.getJson(`${this.baseUrl}/${encodeURIComponent(packageName)}/json`);
    if (!response.ok) {
      return response;
    }
    const info: Record<string, unknown> =
      isRecord(response.value) && isRecord(response.value.info) ? response.value.info : {};
    const urls: string[] = [];
    if (isRecord(info.project_urls)) {
      for (const value of Object.values(info.project_urls)) {
        if (typeof value === 'string' && value.length > 0) {
          urls.push(value);
        }
      }
    }
    if (typeof info.home_page === 'string' && info.home_page.length > 0) {
      urls.push(info.home_page);
    }
    const latestVersion = typeof info.version === 'string' && info.version.length > 0 ? info.version : null;
    return { ok: true, value: { projectUrls: urls, latestVersion } };
  }

  async getReleaseArtifacts(packageName: string, version: string): Promise<Fetched<ReleaseArtifact[]>> {
    const url = `${this.baseUrl}/${encodeURIComponent(packageName)}/${encodeURIComponent(version)}/json`;
    const response = await this.getJson(url);
    if (!response.ok) {
      return response;
    }
    const document: Record<string, unknown> = isRecord(response.value) ? response.value : {};
    let entries: unknown = document.urls;
    if (!Array.isArray(entries) || entries.length === 0) {
      entries = isRecord(document.releases) ? document.releases[version] : undefined;
    }
    const artifacts = Array.isArray(entries) ? entries.map(parseArtifact).filter(isArtifact) : [];
    return { ok: true, value: artifacts };
  }

  async download(url: string): Promise<Fetched<Buffer>> {
    return withRetry(
      this.retry,
      async (): Promise<Fetched<Buffer>> => {
        try {
          const response = await this.fetch(url, this.requestInit());
          if (!response.ok) {
            return { ok: false, reason: `download of ${url} returned HTTP ${response.status}` };
          }
          return { ok: true, value: Buffer.from(await response.arrayBuffer()) };
        } catch (error) {
          return { ok: false, reason: `download of ${url} failed: ${describeError(error)}` };
        }
      },
      this.sleep
    );
  }

  private async getJson(url: string): Promise<Fetched<unknown>> {
    return withRetry(
      this.retry,
      async (): Promise<Fetched<unknown>> => {
        try {
          const response = await this.fetch(url, this.requestInit());
          if (response.status !== 200) {
            return { ok: false, reason: `registry returned HTTP ${response.status} for ${url}` };
          }
          return { ok: true, value: await response.json() };
        } catch (error) {
          return { ok: false, reason: `registry request to ${url} failed: ${describeError(error)}` };
        }
      },
      this.sleep
    );
  }

  private requestInit() {
    return this.timeoutMs > 0 ? { signal: AbortSignal.timeout(this.timeoutMs) } : {};
  }
}

function parseArtifact(entry: unknown): ReleaseArtifact | null {
  if (!isRecord(entry) || typeof entry.url !== 'string') {
    return null;
  }
  const digests: Record<string, unknown> = isRecord(entry.digests) ? entry.digests : {};
  return {
    url: entry.url,
    filename: typeof entry.filename === 'string' ? entry.filename : null,
    md5: readDigest(digests.md5) ?? readDigest(entry.md5_digest),
    sha256: readDigest(digests.sha256) ?? readDigest(entry.sha256_digest)
  };
}

function readDigest(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value.toLowerCase() : null;
}

function isArtifact(value: ReleaseArtifact | null): value is ReleaseArtifact {
  return value !== null;
}
