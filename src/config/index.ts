import fs from 'node:fs';
import path from 'node:path';
import { isRecord, type RiskThresholds, type RiskTier } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type DetectorConfig = {
  windowSize: number;
  features: string[];
  kernelSize: number;
  hiddenSize: number;
  numLayers: number;
  headHiddenSize: number;
  /** Recorded with trained weights; scoring is inference only, so it never changes a score. */
  dropout: number;
  alpha: number;
  threshold: number;
  seed: number;
  modelPath?: string;
};

export type EmailNotificationConfig = {
  enabled: boolean;
  recipients: string[];
  command: string;
  timeoutMs: number;
};

export type LogNotificationConfig = {
  enabled: boolean;
  path: string;
};

export type NotificationConfig = {
  requireDelivery: boolean;
  email: EmailNotificationConfig;
  logging: LogNotificationConfig;
};

export type MitigationConfig = {
  thresholds: RiskThresholds;
  actions: Record<RiskTier, string[]>;
  notification: NotificationConfig;
};

export type BackupConfig = {
  directory: string;
  maxHistory: number;
};

export type ValidationConfig = {
  registryUrl: string;
  allowedSources: string[];
  timeoutMs: number;
};

export type PackageManagerConfig = {
  installCommand: string[];
  preferencesDir: string;
  timeoutMs: number;
};

export type RetryConfig = {
  attempts: number;
  backoffMs: number;
};

export type CorrectionConfig = {
  detectionThreshold: number;
  backup: BackupConfig;
  validation: ValidationConfig;
  packageManager: PackageManagerConfig;
  retry: RetryConfig;
};

export type SentinelConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  detector: DetectorConfig;
  mitigation: MitigationConfig;
  correction: CorrectionConfig;
};

type JsonType = 'object' | 'array' | 'number' | 'string' | 'boolean';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  items?: JsonSchema;
  minimum?: number;
  maximum?: number;
  integer?: boolean;
};

const probabilitySchema: JsonSchema = { type: 'number', minimum: 0, maximum: 1 };
const positiveIntegerSchema: JsonSchema = { type: 'number', minimum: 1, integer: true };
const timeoutSchema: JsonSchema = { type: 'number', minimum: 0 };
const stringListSchema: JsonSchema = { type: 'array', items: { type: 'string' } };

const sentinelConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'database', 'detector', 'mitigation', 'correction'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: {
        path: { type: 'string' }
      }
    },
    detector: {
      type: 'object',
      required: [
        'windowSize',
        'features',
        'kernelSize',
        'hiddenSize',
        'numLayers',
        'headHiddenSize',
        'dropout',
        'alpha',
        'threshold',
        'seed'
      ],
      additionalProperties: false,
      properties: {
        windowSize: positiveIntegerSchema,
        features: stringListSchema,
        kernelSize: positiveIntegerSchema,
        hiddenSize: positiveIntegerSchema,
        numLayers: positiveIntegerSchema,
        headHiddenSize: positiveIntegerSchema,
        dropout: { type: 'number', minimum: 0, maximum: 1 },
        alpha: { type: 'number', minimum: 0 },
        threshold: probabilitySchema,
        seed: { type: 'number', integer: true },
        modelPath: { type: 'string' }
      }
    },
    mitigation: {
      type: 'object',
      required: ['thresholds', 'actions', 'notification'],
      additionalProperties: false,
      properties: {
        thresholds: {
          type: 'object',
          required: ['high', 'medium', 'low'],
          additionalProperties: false,
          properties: {
            high: probabilitySchema,
            medium: probabilitySchema,
            low: probabilitySchema
          }
        },
        actions: {
          type: 'object',
          required: ['high', 'medium', 'low'],
          additionalProperties: false,
          properties: {
            high: stringListSchema,
            medium: stringListSchema,
            low: stringListSchema
          }
        },
        notification: {
          type: 'object',
          required: ['requireDelivery', 'email', 'logging'],
          additionalProperties: false,
          properties: {
            requireDelivery: { type: 'boolean' },
            email: {
              type: 'object',
              required: ['enabled', 'recipients', 'command', 'timeoutMs'],
              additionalProperties: false,
              properties: {
                enabled: { type: 'boolean' },
                recipients: stringListSchema,
                command: { type: 'string' },
                timeoutMs: timeoutSchema
              }
            },
            logging: {
              type: 'object',
              required: ['enabled', 'path'],
              additionalProperties: false,
              properties: {
                enabled: { type: 'boolean' },
                path: { type: 'string' }
              }
            }
          }
        }
      }
    },
    correction: {
      type: 'object',
      required: ['detectionThreshold', 'backup', 'validation', 'packageManager', 'retry'],
      additionalProperties: false,
      properties: {
        detectionThreshold: probabilitySchema,
        backup: {
          type: 'object',
          required: ['directory', 'maxHistory'],
          additionalProperties: false,
          properties: {
            directory: { type: 'string' },
            maxHistory: positiveIntegerSchema
          }
        },
        validation: {
          type: 'object',
          required: ['registryUrl', 'allowedSources', 'timeoutMs'],
          additionalProperties: false,
          properties: {
            registryUrl: { type: 'string' },
            allowedSources: stringListSchema,
            timeoutMs: timeoutSchema
          }
        },
        packageManager: {
          type: 'object',
          required: ['installCommand', 'preferencesDir', 'timeoutMs'],
          additionalProperties: false,
          properties: {
            installCommand: stringListSchema,
            preferencesDir: { type: 'string' },
            timeoutMs: timeoutSchema
          }
        },
        retry: {
          type: 'object',
          required: ['attempts', 'backoffMs'],
          additionalProperties: false,
          properties: {
            attempts: positiveIntegerSchema,
            backoffMs: timeoutSchema
          }
        }
      }
    }
  }
};

export function defaultConfig(): SentinelConfig {
  return {
    app: { name: 'supply-sentinel' },
    logging: { level: 'info' },
    database: { path: 'data/sentinel.sqlite' },
    detector: {
      windowSize: 10,
      features: [
        'package_size',
        'dependency_count',
        'update_frequency',
        'size_change',
        'dependency_volatility',
        'resource_intensity'
      ],
      kernelSize: 7,
      hiddenSize: 64,
      numLayers: 2,
      headHiddenSize: 32,
      dropout: 0.2,
      alpha: 0.2,
      threshold: 0.5,
      seed: 42
    },
    mitigation: {
      thresholds: { high: 0.8, medium: 0.6, low: 0.3 },
      actions: {
        high: ['rollback', 'block_updates', 'notify'],
        medium: ['validate', 'notify'],
        low: ['notify']
      },
      notification: {
        requireDelivery: true,
        email: { enabled: false, recipients: [], command: 'mail', timeoutMs: 10_000 },
        logging: { enabled: true, path: 'logs/mitigation.log' }
      }
    },
    correction: {
      detectionThreshold: 0.8,
      backup: { directory: 'backups', maxHistory: 5 },
      validation: {
        registryUrl: 'https://pypi.org/pypi',
        allowedSources: ['pypi.org', 'github.com', 'gitlab.com'],
        timeoutMs: 15_000
      },
      packageManager: {
        installCommand: ['pip', 'install', '{name}=={version}'],
        preferencesDir: '/etc/apt/preferences.d',
        timeoutMs: 120_000
      },
      retry: { attempts: 1, backoffMs: 0 }
    }
  };
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const errors: string[] = [];
  const { type } = schema;

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    if (schema.additionalProperties === false) {
      const definedProperties = new Set(Object.keys(schema.properties ?? {}));
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (key in value) {
        errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
      }
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
    }
    return errors;
  }

  if (typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }
  return errors;
}

export function validateConfig(config: unknown): asserts config is SentinelConfig {
  const errors = validateAgainstSchema(sentinelConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config);
}

function validateLogicalConfig(config: unknown) {
  if (!isRecord(config)) {
    return;
  }
  const messages: string[] = [];
  const detector: Record<string, unknown> = isRecord(config.detector) ? config.detector : {};
  const mitigation: Record<string, unknown> = isRecord(config.mitigation) ? config.mitigation : {};
  const thresholds: Record<string, unknown> = isRecord(mitigation.thresholds) ? mitigation.thresholds : {};

  const { high, medium, low } = thresholds;
  if (typeof high === 'number' && typeof medium === 'number' && typeof low === 'number') {
    if (!(high >= medium && medium >= low)) {
      messages.push('config.mitigation.thresholds must satisfy high >= medium >= low');
    }
  }

  if (typeof detector.kernelSize === 'number' && detector.kernelSize % 2 === 0) {
    messages.push('config.detector.kernelSize must be odd');
  }

  if (Array.isArray(detector.features) && detector.features.length === 0) {
    messages.push('config.detector.features must list at least one feature');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function parseConfig(contents: string): SentinelConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  const merged = mergeWithDefaults(parsed);
  validateConfig(merged);
  return freezeConfig(merged);
}

export function loadConfigFromFile(filePath: string): SentinelConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

export type ConfigSource = 'file' | 'merged' | 'defaults';

export type LoadedConfig = {
  config: SentinelConfig;
  source: ConfigSource;
  warning?: string;
};

/**
 * Never throws: a missing, unreadable or invalid document yields the built-in
 * defaults together with a warning describing why.
 */
export function loadConfig(filePath?: string): LoadedConfig {
  if (!filePath) {
    return { config: freezeConfig(defaultConfig()), source: 'defaults' };
  }
  try {
    return { config: loadConfigFromFile(filePath), source: 'file' };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      config: freezeConfig(defaultConfig()),
      source: 'defaults',
      warning: `Configuration ${filePath} unavailable, using defaults: ${message}`
    };
  }
}

/**
 * Builds a config from an already-parsed document, such as the node-config
 * tree, merging it over the defaults.
 */
export function resolveConfig(document: unknown): LoadedConfig {
  try {
    const merged = mergeWithDefaults(document);
    validateConfig(merged);
    return { config: freezeConfig(merged), source: 'merged' };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      config: freezeConfig(defaultConfig()),
      source: 'defaults',
      warning: `Configuration invalid, using defaults: ${message}`
    };
  }
}

export function mergeWithDefaults(document: unknown): unknown {
  return mergeDeep(defaultConfig(), document);
}

function mergeDeep(base: unknown, override: unknown): unknown {
  if (override === undefined || override === null) {
    return base;
  }
  if (isRecord(base) && isRecord(override)) {
    const result: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(override)) {
      result[key] = key in base ? mergeDeep(base[key], value) : value;
    }
    return result;
  }
  return override;
}

export function freezeConfig<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      freezeConfig(child);
    }
    Object.freeze(value);
  }
  return value;
}

