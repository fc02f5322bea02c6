import config from 'config';
import logger, { type Logger } from './logger.js';
import metrics, { type MetricsRegistry, type MetricsSnapshot } from './metrics/index.js';
import detectionBus, { type DetectionBus } from './eventBus.js';
import { loadConfig, resolveConfig, type LoadedConfig, type SentinelConfig } from './config/index.js';
import { AnomalyScorer } from './detector/model.js';
import { FeatureWindower } from './detector/windower.js';
import { DetectionManager } from './detector/manager.js';
import { PackageValidator } from './correction/validator.js';
import { SystemPackageManager, type PackageManager } from './correction/packageManager.js';
import { BackupManager } from './correction/rollback.js';
import { CorrectionHandler } from './correction/handler.js';
import { Notifier } from './mitigation/notifier.js';
import { MitigationHandler, ServiceActionExecutor } from './mitigation/handler.js';
import type { FetchLike } from './correction/registry.js';
import type { CommandRunner } from './utils/exec.js';
import type { Sleep } from './utils/retry.js';

type HealthStatus = 'ok' | 'degraded';

export type HealthIndicatorContext = {
  metrics: MetricsSnapshot;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type HealthCheck = { name: string; status: HealthStatus; details?: Record<string, unknown> };

export type ShutdownHook = (context: { reason: string }) => void | Promise<void>;

type Registered<T> = { name: string; entry: T };

const healthIndicators: Registered<HealthIndicator>[] = [];
const shutdownHooks: Registered<ShutdownHook>[] = [];

function register<T>(list: Registered<T>[], name: string, entry: T) {
  const existingIndex = list.findIndex(item => item.name === name);
  if (existingIndex >= 0) {
    list[existingIndex] = { name, entry };
  } else {
    list.push({ name, entry });
  }

  return () => {
    const index = list.findIndex(item => item.name === name);
    if (index >= 0) {
      list.splice(index, 1);
    }
  };
}

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  return register(healthIndicators, name, indicator);
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  return register(shutdownHooks, name, hook);
}

export async function collectHealthChecks(snapshot: MetricsSnapshot = metrics.snapshot()): Promise<HealthCheck[]> {
  const results: HealthCheck[] = [];
  for (const { name, entry } of healthIndicators) {
    try {
      const result = await entry({ metrics: snapshot });
      results.push({ name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name,
        status: 'degraded',
        details: { error: error instanceof Error ? error.message : String(error) }
      });
    }
  }
  return results;
}

export async function runShutdownHooks(reason: string) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: string }> = [];
  for (const { name, entry } of [...shutdownHooks].reverse()) {
    try {
      await entry({ reason });
      results.push({ name, status: 'ok' });
    } catch (error) {
      logger.error({ err: error, hook: name }, 'Shutdown hook failed');
      results.push({ name, status: 'error', error: error instanceof Error ? error.message : String(error) });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}

/**
 * Resolves the runtime configuration. An explicit file wins; otherwise the
 * node-config tree (config/default.json plus the NODE_ENV overlay) is merged
 * over the built-in defaults. Invalid input falls back to the defaults with a
 * warning instead of failing startup.
 */
export function resolveRuntimeConfig(configPath?: string, log: Logger = logger): LoadedConfig {
  const loaded = configPath ? loadConfig(configPath) : resolveConfig(readConfigTree());
  if (loaded.warning) {
    log.warn({ source: loaded.source }, loaded.warning);
  }
  return loaded;
}

function readConfigTree(): unknown {
  const tree: unknown = config.util.toObject();
  return tree;
}

export interface RuntimeOverrides {
  fetch?: FetchLike;
  run?: CommandRunner;
  sleep?: Sleep;
  packageManager?: PackageManager;
  bus?: DetectionBus;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => Date;
}

export type Runtime = {
  config: SentinelConfig;
  scorer: AnomalyScorer;
  windower: FeatureWindower;
  validator: PackageValidator;
  packageManager: PackageManager;
  backups: BackupManager;
  notifier: Notifier;
  mitigation: MitigationHandler;
  correction: CorrectionHandler;
  manager: DetectionManager;
  bus: DetectionBus;
};

export function createRuntime(sentinelConfig: SentinelConfig, overrides: RuntimeOverrides = {}): Runtime {
  const log = overrides.log ?? logger;
  const registry = overrides.metrics ?? metrics;
  const { detector, mitigation: mitigationConfig, correction: correctionConfig } = sentinelConfig;

  const scorer = AnomalyScorer.fromConfig(detector, { log, metrics: registry });
  const windower = new FeatureWindower(detector, { log });
  const validator = new PackageValidator(correctionConfig.validation, correctionConfig.retry, {
    fetch: overrides.fetch,
    sleep: overrides.sleep,
    log,
    metrics: registry
  });
  const packageManager =
    overrides.packageManager ??
    new SystemPackageManager(correctionConfig.packageManager, correctionConfig.retry, {
      run: overrides.run,
      sleep: overrides.sleep,
      log
    });
  const backups = new BackupManager(correctionConfig.backup, {
    packageManager,
    now: overrides.now,
    log,
    metrics: registry
  });
  const notifier = new Notifier(mitigationConfig.notification, { run: overrides.run, log });
  const executor = new ServiceActionExecutor({ backups, validator, packageManager, notifier });
  const mitigation = new MitigationHandler(mitigationConfig, {
    executor,
    audit: notifier.auditLog,
    log,
    metrics: registry,
    now: overrides.now
  });
  const correction = new CorrectionHandler(correctionConfig, { validator, backups, log });
  const bus = overrides.bus ?? detectionBus;
  const manager = new DetectionManager(detector, {
    scorer,
    windower,
    mitigation,
    alert: result => bus.emitDetection(result),
    log,
    metrics: registry,
    now: overrides.now
  });

  log.debug(
    { parameterSource: scorer.parameterSource, threshold: detector.threshold, windowSize: detector.windowSize },
    'Runtime assembled'
  );

  return {
    config: sentinelConfig,
    scorer,
    windower,
    validator,
    packageManager,
    backups,
    notifier,
    mitigation,
    correction,
    manager,
    bus
  };
}
