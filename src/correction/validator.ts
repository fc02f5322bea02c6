import { createHash } from 'node:crypto';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { RetryConfig, ValidationConfig } from '../config/index.js';
import type { ValidationResult, ValidationStage } from '../types.js';
import { RegistryClient, type FetchLike, type ReleaseArtifact } from './registry.js';
import type { Sleep } from '../utils/retry.js';

export interface PackageValidatorDependencies {
  fetch?: FetchLike;
  sleep?: Sleep;
  registry?: RegistryClient;
  log?: Logger;
  metrics?: MetricsRegistry;
}

export type ArtifactDigests = { md5: string; sha256: string };

export function computeDigests(content: Buffer): ArtifactDigests {
  return {
    md5: createHash('md5').update(content).digest('hex'),
    sha256: createHash('sha256').update(content).digest('hex')
  };
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/** Only the host counts: an allowed name in the path or query does not. Subdomains match. */
export function isTrustedSource(urls: readonly string[], allowedSources: readonly string[]) {
  const allowed = allowedSources.map(source => source.trim().toLowerCase()).filter(Boolean);
  return urls.some(url => {
    const host = hostOf(url);
    if (!host) {
      return false;
    }
    return allowed.some(source => host === source || host.endsWith(`.${source}`));
  });
}

/**
 * Two gates, short-circuiting on the first failure: the project must declare a
 * URL on an allow-listed host, then one published artifact of the release must
 * match both of its published digests. Every failure, including network
 * errors, resolves to `ok: false`.
 */
export class PackageValidator {
  private readonly allowedSources: readonly string[];
  private readonly registry: RegistryClient;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(
    config: ValidationConfig,
    retry: RetryConfig = { attempts: 1, backoffMs: 0 },
    dependencies: PackageValidatorDependencies = {}
  ) {
    this.allowedSources = [...config.allowedSources];
    this.registry =
      dependencies.registry ??
      new RegistryClient({
        registryUrl: config.registryUrl,
        timeoutMs: config.timeoutMs,
        retry,
        fetch: dependencies.fetch,
        sleep: dependencies.sleep
      });
    this.log = (dependencies.log ?? logger).child({ component: 'validator' });
    this.metrics = dependencies.metrics ?? metrics;
  }

  async validate(packageName: string, version?: string): Promise<ValidationResult> {
    let result: ValidationResult;
    try {
      result = await this.runGates(packageName, version);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result = { ok: false, stage: 'source', reason: `validation error: ${message}` };
    }

    this.metrics.recordValidation(result.ok, result.stage);
    if (result.ok) {
      this.log.info({ packageName, version: result.version }, 'Package validation passed');
    } else {
      this.log.warn({ packageName, version, stage: result.stage, reason: result.reason }, 'Package validation failed');
    }
    return result;
  }

  private async runGates(packageName: string, requestedVersion?: string): Promise<ValidationResult> {
    const project = await this.registry.getProject(packageName);
    if (!project.ok) {
      return fail('source', project.reason);
    }
    if (!isTrustedSource(project.value.projectUrls, this.allowedSources)) {
      return fail('source', `no project URL of ${packageName} matches an allowed source`);
    }

    const version = requestedVersion ?? project.value.latestVersion;
    if (!version) {
      return fail('integrity', `no version of ${packageName} to verify`);
    }

    const release = await this.registry.getReleaseArtifacts(packageName, version);
    if (!release.ok) {
      return fail('integrity', release.reason);
    }
    if (release.value.length === 0) {
      return fail('integrity', `no artifacts published for ${packageName} ${version}`);
    }

    const mismatches: string[] = [];
    for (const artifact of release.value) {
      const outcome = await this.verifyArtifact(artifact);
      if (outcome === null) {
        return { ok: true, stage: 'complete', version, reason: `verified ${artifact.filename ?? artifact.url}` };
      }
      mismatches.push(outcome);
    }

    return fail('integrity', `no artifact matched its published digests (${mismatches.join('; ')})`);
  }

  /** Resolves to null on a match, otherwise to the reason it did not match. */
  private async verifyArtifact(artifact: ReleaseArtifact): Promise<string | null> {
    const label = artifact.filename ?? artifact.url;
    if (!artifact.md5 || !artifact.sha256) {
      return `${label}: missing published digests`;
    }
    const download = await this.registry.download(artifact.url);
    if (!download.ok) {
      return `${label}: ${download.reason}`;
    }
    const digests = computeDigests(download.value);
    if (digests.md5 !== artifact.md5 || digests.sha256 !== artifact.sha256) {
      return `${label}: digest mismatch`;
    }
    return null;
  }
}

function fail(stage: ValidationStage, reason: string): ValidationResult {
  return { ok: false, stage, reason };
}
