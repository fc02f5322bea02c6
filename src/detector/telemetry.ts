import fs from 'node:fs';
import path from 'node:path';
import { isRecord, type TelemetrySample } from '../types.js';

export type ParsedTelemetry = {
  samples: TelemetrySample[];
  rejected: Array<{ index: number; reason: string }>;
};

/**
 * Accepts a JSON array of samples. Both `packageName` and `package_name` are
 * read; entries without a package, timestamp or metrics object are rejected
 * individually rather than failing the whole document.
 */
export function parseTelemetry(document: unknown): ParsedTelemetry {
  if (!Array.isArray(document)) {
    throw new TypeError('Telemetry document must be a JSON array of samples');
  }

  const samples: TelemetrySample[] = [];
  const rejected: ParsedTelemetry['rejected'] = [];
  document.forEach((entry: unknown, index) => {
    if (!isRecord(entry)) {
      rejected.push({ index, reason: 'sample is not an object' });
      return;
    }
    const packageName = readString(entry.packageName) ?? readString(entry.package_name);
    if (!packageName) {
      rejected.push({ index, reason: 'missing package name' });
      return;
    }
    const timestamp = readString(entry.timestamp);
    if (!timestamp) {
      rejected.push({ index, reason: 'missing timestamp' });
      return;
    }
    if (!isRecord(entry.metrics)) {
      rejected.push({ index, reason: 'metrics must be an object' });
      return;
    }
    samples.push(Object.freeze({ timestamp, packageName, metrics: Object.freeze({ ...entry.metrics }) }));
  });

  return { samples, rejected };
}

export function loadTelemetryFile(filePath: string): ParsedTelemetry {
  const contents = fs.readFileSync(path.resolve(filePath), 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse telemetry: ${message}`);
  }
  return parseTelemetry(parsed);
}

function readString(value: unknown) {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}
