import fs from 'node:fs';
import path from 'node:path';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { BackupConfig } from '../config/index.js';
import {
  describeError,
  isRecord,
  type BackupRecord,
  type BackupResult,
  type RollbackResult
} from '../types.js';
import type { PackageManager } from './packageManager.js';

export interface BackupManagerDependencies {
  packageManager: PackageManager;
  now?: () => Date;
  log?: Logger;
  metrics?: MetricsRegistry;
}

type StoredBackup = {
  record: BackupRecord;
  filePath: string;
};

const MAX_SEQUENCE = 999;

/** Fixed-width UTC stamp, `YYYYMMDD_HHMMSS_mmm`, so string order is time order. */
export function formatBackupTimestamp(date: Date) {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `_${pad(date.getUTCMilliseconds(), 3)}`
  );
}

export function sanitizePackageName(packageName: string) {
  return packageName.replace(/[^A-Za-z0-9._-]/g, '_');
}

function compareNewestFirst(a: StoredBackup, b: StoredBackup) {
  if (a.record.timestamp === b.record.timestamp) {
    return 0;
  }
  return a.record.timestamp < b.record.timestamp ? 1 : -1;
}

/**
 * Append-only ledger of known-good package versions, one JSON file per backup,
 * bounded to `maxHistory` records per package. Eviction and "most recent"
 * lookup both order by the stored timestamp.
 */
export class BackupManager {
  private readonly directory: string;
  private readonly maxHistory: number;
  private readonly packageManager: PackageManager;
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(config: BackupConfig, dependencies: BackupManagerDependencies) {
    if (!Number.isInteger(config.maxHistory) || config.maxHistory < 1) {
      throw new RangeError(`maxHistory must be a positive integer, received ${config.maxHistory}`);
    }
    this.directory = config.directory;
    this.maxHistory = config.maxHistory;
    this.packageManager = dependencies.packageManager;
    this.now = dependencies.now ?? (() => new Date());
    this.log = (dependencies.log ?? logger).child({ component: 'rollback' });
    this.metrics = dependencies.metrics ?? metrics;
  }

  /** Synchronous so that a write and its eviction pass cannot interleave with another backup. */
  backup(packageName: string, version: string): BackupResult {
    try {
      fs.mkdirSync(this.directory, { recursive: true });
      const existing = this.readRecords(packageName);
      const timestamp = this.nextTimestamp(existing);
      const record: BackupRecord = { package: packageName, version, timestamp };
      const filePath = path.join(this.directory, `${sanitizePackageName(packageName)}_${timestamp}.json`);
      fs.writeFileSync(filePath, `${JSON.stringify(record, null, 2)}\n`, { encoding: 'utf-8', flag: 'wx' });

      const evicted = this.evict([...existing, { record, filePath }]);
      this.metrics.recordBackup(true, evicted.length);
      this.log.info({ packageName, version, timestamp, evicted: evicted.length }, 'Created package backup');
      return { ok: true, record, filePath, evicted };
    } catch (error) {
      const reason = `backup of ${packageName} ${version} failed: ${describeError(error)}`;
      this.metrics.recordBackup(false);
      this.log.error({ err: error, packageName, version }, 'Failed to create package backup');
      return { ok: false, reason };
    }
  }

  async rollback(packageName: string, targetVersion?: string): Promise<RollbackResult> {
    let result: RollbackResult;
    if (targetVersion) {
      const installed = await this.packageManager.install(packageName, targetVersion);
      result = installed.ok ? { ok: true, version: targetVersion, source: 'explicit' } : installed;
    } else {
      result = await this.rollbackToLatest(packageName);
    }

    this.metrics.recordRollback(result.ok);
    if (result.ok) {
      this.log.info({ packageName, version: result.version, source: result.source }, 'Rolled back package');
    } else {
      this.log.warn({ packageName, targetVersion, reason: result.reason }, 'Package rollback failed');
    }
    return result;
  }

  listBackups(packageName: string): BackupRecord[] {
    try {
      return this.readRecords(packageName)
        .sort(compareNewestFirst)
        .map(entry => entry.record);
    } catch (error) {
      this.log.error({ err: error, packageName }, 'Failed to read backup ledger');
      return [];
    }
  }

  latestBackup(packageName: string): BackupRecord | null {
    return this.listBackups(packageName)[0] ?? null;
  }

  private async rollbackToLatest(packageName: string): Promise<RollbackResult> {
    const latest = this.latestBackup(packageName);
    if (!latest) {
      return { ok: false, reason: `no backups for ${packageName}` };
    }
    const installed = await this.packageManager.install(packageName, latest.version);
    return installed.ok ? { ok: true, version: latest.version, source: 'backup' } : installed;
  }

  private nextTimestamp(existing: readonly StoredBackup[]) {
    const taken = new Set(existing.map(entry => entry.record.timestamp));
    const base = formatBackupTimestamp(this.now());
    if (!taken.has(base)) {
      return base;
    }
    for (let sequence = 1; sequence <= MAX_SEQUENCE; sequence += 1) {
      const candidate = `${base}_${String(sequence).padStart(3, '0')}`;
      if (!taken.has(candidate)) {
        return candidate;
      }
    }
    throw new Error(`too many backups within one millisecond (${base})`);
  }

  private evict(entries: StoredBackup[]): string[] {
    const stale = [...entries].sort(compareNewestFirst).slice(this.maxHistory);
    const removed: string[] = [];
    for (const entry of stale) {
      try {
        fs.rmSync(entry.filePath, { force: true });
        removed.push(entry.filePath);
      } catch (error) {
        this.log.warn({ err: error, filePath: entry.filePath }, 'Failed to evict backup record');
      }
    }
    return removed;
  }

  private readRecords(packageName: string): StoredBackup[] {
    if (!fs.existsSync(this.directory)) {
      return [];
    }
    const records: StoredBackup[] = [];
    for (const fileName of fs.readdirSync(this.directory)) {
      if (!fileName.endsWith('.json')) {
        continue;
      }
      const filePath = path.join(this.directory, fileName);
      const record = this.readRecord(filePath);
      if (record && record.package === packageName) {
        records.push({ record, filePath });
      }
    }
    return records;
  }

  private readRecord(filePath: string): BackupRecord | null {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      if (
        isRecord(parsed) &&
        typeof parsed.package === 'string' &&
        typeof parsed.version === 'string' &&
        typeof parsed.timestamp === 'string'
      ) {
        return { package: parsed.package, version: parsed.version, timestamp: parsed.timestamp };
      }
      this.log.warn({ filePath }, 'Ignoring malformed backup record');
    } catch (error) {
      this.log.warn({ err: error, filePath }, 'Ignoring unreadable backup record');
    }
    return null;
  }
}
