import logger, { type Logger } from '../logger.js';
import type { DetectorConfig } from '../config/index.js';
import type {
  FeatureRow,
  FeatureTable,
  FeatureValue,
  TelemetrySample,
  Window,
  WindowSet
} from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const VOLATILITY_ROWS = 5;

export type FeatureWindowerOptions = Pick<DetectorConfig, 'windowSize' | 'features'>;

export interface FeatureWindowerDependencies {
  log?: Logger;
}

export class FeatureWindower {
  private readonly windowSize: number;
  private readonly features: readonly string[];
  private readonly log: Logger;

  constructor(options: FeatureWindowerOptions, dependencies: FeatureWindowerDependencies = {}) {
    assertWindowSize(options.windowSize);
    this.windowSize = options.windowSize;
    this.features = [...options.features];
    this.log = dependencies.log ?? logger;
  }

  process(samples: readonly TelemetrySample[]): FeatureTable {
    const rows: FeatureRow[] = [];
    for (const sample of samples) {
      const parsed = Date.parse(sample.timestamp);
      if (!Number.isFinite(parsed)) {
        this.log.warn(
          { packageName: sample.packageName, timestamp: sample.timestamp },
          'Dropping telemetry sample with invalid timestamp'
        );
        continue;
      }
      rows.push({
        timestamp: new Date(parsed),
        packageName: sample.packageName,
        fields: flattenMetrics(sample.metrics)
      });
    }
    return sortByTimestamp(rows);
  }

  addDerivedFeatures(table: FeatureTable): FeatureTable {
    const rows = sortByTimestamp(table);
    return rows.map((row, index) => {
      const previous = index > 0 ? rows[index - 1] : undefined;
      return {
        timestamp: row.timestamp,
        packageName: row.packageName,
        fields: {
          ...row.fields,
          update_frequency: updateFrequency(rows, index),
          size_change: sizeChange(previous, row),
          dependency_volatility: dependencyVolatility(rows, index),
          resource_intensity: resourceIntensity(row)
        }
      };
    });
  }

  makeWindows(
    table: FeatureTable,
    featureNames: readonly string[] = this.features,
    windowSize: number = this.windowSize
  ): WindowSet {
    assertWindowSize(windowSize);
    const rows = sortByTimestamp(table);
    const vectors = rows.map(row => featureNames.map(name => numericValue(row.fields[name])));
    const sequences: Window[] = [];
    const timestamps: Date[] = [];

    for (let start = 0; start + windowSize <= vectors.length; start += 1) {
      sequences.push(vectors.slice(start, start + windowSize));
      const last = rows[start + windowSize - 1];
      if (last) {
        timestamps.push(last.timestamp);
      }
    }

    return { sequences, timestamps };
  }

  buildWindows(samples: readonly TelemetrySample[]): WindowSet {
    return this.makeWindows(this.addDerivedFeatures(this.process(samples)));
  }
}

function assertWindowSize(windowSize: number) {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new RangeError(`windowSize must be a positive integer, received ${windowSize}`);
  }
}

function flattenMetrics(metrics: Readonly<Record<string, unknown>>): Record<string, FeatureValue> {
  const fields: Record<string, FeatureValue> = {};
  for (const [key, value] of Object.entries(metrics)) {
    if (key === 'dependencies') {
      fields.dependency_count = Array.isArray(value) ? value.length : 0;
    } else if (key === 'size') {
      fields.package_size = toFeatureValue(value);
    } else {
      fields[key] = toFeatureValue(value);
    }
  }
  return fields;
}

function toFeatureValue(value: unknown): FeatureValue {
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

function sortByTimestamp(rows: FeatureTable): FeatureTable {
  return [...rows].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

function numericValue(value: FeatureValue | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function isNumber(value: FeatureValue | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function versionChanged(rows: FeatureTable, index: number) {
  const row = rows[index];
  if (!row) {
    return false;
  }
  // The first row has no predecessor, so it counts as a change.
  const previous = index > 0 ? rows[index - 1] : undefined;
  return !previous || previous.fields.version !== row.fields.version;
}

function updateFrequency(rows: FeatureTable, index: number) {
  const row = rows[index];
  if (!row) {
    return 0;
  }
  const windowStart = row.timestamp.getTime() - DAY_MS;
  let count = 0;
  for (let cursor = index; cursor >= 0; cursor -= 1) {
    const candidate = rows[cursor];
    if (!candidate || candidate.timestamp.getTime() <= windowStart) {
      break;
    }
    if (versionChanged(rows, cursor)) {
      count += 1;
    }
  }
  return count;
}

function sizeChange(previous: FeatureRow | undefined, row: FeatureRow) {
  if (!previous) {
    return 0;
  }
  const before = previous.fields.package_size;
  const after = row.fields.package_size;
  if (!isNumber(before) || !isNumber(after) || before === 0) {
    return 0;
  }
  return (after - before) / before;
}

function dependencyVolatility(rows: FeatureTable, index: number) {
  const values: number[] = [];
  for (let cursor = Math.max(0, index - VOLATILITY_ROWS + 1); cursor <= index; cursor += 1) {
    const value = rows[cursor]?.fields.dependency_count;
    if (isNumber(value)) {
      values.push(value);
    }
  }
  return sampleStandardDeviation(values);
}

export function sampleStandardDeviation(values: readonly number[]) {
  if (values.length < 2) {
    return 0;
  }
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const squared = values.reduce((sum, value) => sum + (value - mean) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

function resourceIntensity(row: FeatureRow) {
  const cpu = row.fields.cpu_usage;
  const memory = row.fields.memory_usage;
  if (!isNumber(cpu) || !isNumber(memory)) {
    return 0;
  }
  return 0.5 * cpu + 0.5 * memory;
}
