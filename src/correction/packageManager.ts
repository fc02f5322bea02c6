import fs from 'node:fs';
import path from 'node:path';
import logger, { type Logger } from '../logger.js';
import type { PackageManagerConfig, RetryConfig } from '../config/index.js';
import { describeError, type CommandResult } from '../types.js';
import { execFileAsync, isTimeoutError, type CommandRunner } from '../utils/exec.js';
import { withRetry, type Sleep } from '../utils/retry.js';

/** External package manager: exact-version installs and update pins. */
export interface PackageManager {
  install(packageName: string, version: string): Promise<CommandResult>;
  blockUpdates(packageName: string): Promise<CommandResult>;
}

export interface SystemPackageManagerDependencies {
  run?: CommandRunner;
  sleep?: Sleep;
  log?: Logger;
}

const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function renderInstallCommand(template: readonly string[], packageName: string, version: string) {
  const rendered = template.map(part =>
    part.replaceAll('{name}', packageName).replaceAll('{version}', version)
  );
  const [command, ...args] = rendered;
  if (!command) {
    throw new Error('Install command template is empty');
  }
  return { command, args };
}

export function renderUpdatePin(packageName: string) {
  return `Package: ${packageName}\nPin: version *\nPin-Priority: -1\n`;
}

/**
 * Runs the configured install command (no shell) and writes apt-style
 * preference files that pin a package to "no further updates".
 */
export class SystemPackageManager implements PackageManager {
  private readonly config: PackageManagerConfig;
  private readonly retry: RetryConfig;
  private readonly run: CommandRunner;
  private readonly sleep?: Sleep;
  private readonly log: Logger;

  constructor(
    config: PackageManagerConfig,
    retry: RetryConfig = { attempts: 1, backoffMs: 0 },
    dependencies: SystemPackageManagerDependencies = {}
  ) {
    this.config = config;
    this.retry = retry;
    this.run = dependencies.run ?? execFileAsync;
    this.sleep = dependencies.sleep;
    this.log = (dependencies.log ?? logger).child({ component: 'package-manager' });
  }

  async install(packageName: string, version: string): Promise<CommandResult> {
    if (!PACKAGE_NAME_PATTERN.test(packageName)) {
      return { ok: false, reason: `invalid package name "${packageName}"` };
    }
    if (!version.trim() || /\s/.test(version)) {
      return { ok: false, reason: `invalid version "${version}"` };
    }

    const { command, args } = renderInstallCommand(this.config.installCommand, packageName, version);
    const result = await withRetry(
      this.retry,
      async (attempt): Promise<CommandResult> => {
        try {
          await this.run(command, args, { timeoutMs: this.config.timeoutMs });
          return { ok: true };
        } catch (error) {
          const reason = isTimeoutError(error)
            ? `install timed out after ${this.config.timeoutMs}ms`
            : `install failed: ${describeError(error)}`;
          this.log.warn({ packageName, version, attempt, reason }, 'Package install attempt failed');
          return { ok: false, reason };
        }
      },
      this.sleep
    );

    if (result.ok) {
      this.log.info({ packageName, version }, 'Installed package version');
    }
    return result;
  }

  async blockUpdates(packageName: string): Promise<CommandResult> {
    if (!PACKAGE_NAME_PATTERN.test(packageName)) {
      return { ok: false, reason: `invalid package name "${packageName}"` };
    }
    const pinPath = path.join(this.config.preferencesDir, `${packageName}-block`);
    try {
      fs.mkdirSync(this.config.preferencesDir, { recursive: true });
      fs.writeFileSync(pinPath, renderUpdatePin(packageName), 'utf-8');
    } catch (error) {
      const reason = `could not write ${pinPath}: ${describeError(error)}`;
      this.log.error({ err: error, packageName, pinPath }, 'Failed to block package updates');
      return { ok: false, reason };
    }
    this.log.info({ packageName, pinPath }, 'Blocked package updates');
    return { ok: true };
  }
}
