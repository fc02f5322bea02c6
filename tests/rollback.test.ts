import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BackupManager, formatBackupTimestamp, sanitizePackageName } from '../src/correction/rollback.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { FakePackageManager } from './helpers/fakes.js';
import { createCaptureLogger } from './helpers/logging.js';

function steppingClock(startIso: string, stepMs: number) {
  let current = Date.parse(startIso);
  return () => {
    const value = new Date(current);
    current += stepMs;
    return value;
  };
}

describe('BackupManager', () => {
  let directory: string;
  let packageManager: FakePackageManager;
  let registry: MetricsRegistry;

  beforeEach(() => {
    directory = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-backups-')), 'ledger');
    packageManager = new FakePackageManager();
    registry = new MetricsRegistry();
  });

  afterEach(() => {
    fs.rmSync(path.dirname(directory), { recursive: true, force: true });
  });

  function createManager(now: () => Date, maxHistory = 5) {
    return new BackupManager(
      { directory, maxHistory },
      { packageManager, now, log: createCaptureLogger().log, metrics: registry }
    );
  }

  it('BackupBounded keeps only the newest maxHistory records', () => {
    const manager = createManager(steppingClock('2024-05-06T07:08:00.000Z', 1000));
    for (let index = 1; index <= 8; index += 1) {
      expect(manager.backup('requests', `2.${index}.0`).ok).toBe(true);
    }

    expect(manager.listBackups('requests').map(record => record.version)).toEqual([
      '2.8.0',
      '2.7.0',
      '2.6.0',
      '2.5.0',
      '2.4.0'
    ]);
    expect(fs.readdirSync(directory)).toHaveLength(5);
    expect(registry.snapshot().backups).toMatchObject({ created: 8, failed: 0, evicted: 3 });
  });

  it('BackupCollision gives same-millisecond backups distinct timestamps', () => {
    const fixed = new Date('2024-05-06T07:08:09.010Z');
    const manager = createManager(() => fixed);

    const first = manager.backup('requests', '2.31.0');
    const second = manager.backup('requests', '2.32.0');
    const third = manager.backup('requests', '2.32.1');

    const stamps = [first, second, third].map(result => (result.ok ? result.record.timestamp : null));
    expect(stamps).toEqual(['20240506_070809_010', '20240506_070809_010_001', '20240506_070809_010_002']);
    expect(manager.latestBackup('requests')?.version).toBe('2.32.1');
  });

  it('BackupFileName uses the sanitised package name and timestamp', () => {
    const manager = createManager(() => new Date('2024-01-02T03:04:05.006Z'));
    const result = manager.backup('@scope/pkg', '1.0.0');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(path.basename(result.filePath)).toBe('_scope_pkg_20240102_030405_006.json');
      expect(JSON.parse(fs.readFileSync(result.filePath, 'utf-8'))).toEqual({
        package: '@scope/pkg',
        version: '1.0.0',
        timestamp: '20240102_030405_006'
      });
      expect(result.evicted).toEqual([]);
    }
  });

  it('keeps separate histories for packages with similar names', () => {
    const manager = createManager(steppingClock('2024-05-06T07:08:00.000Z', 10), 1);
    manager.backup('six', '1.16.0');
    manager.backup('six-ext', '0.1.0');
    manager.backup('six', '1.17.0');

    expect(manager.listBackups('six').map(record => record.version)).toEqual(['1.17.0']);
    expect(manager.listBackups('six-ext').map(record => record.version)).toEqual(['0.1.0']);
  });

  it('RollbackLatest installs the most recent backup', async () => {
    const manager = createManager(steppingClock('2024-05-06T07:08:00.000Z', 1000));
    manager.backup('urllib3', '2.0.7');
    manager.backup('urllib3', '2.2.1');

    const result = await manager.rollback('urllib3');

    expect(result).toEqual({ ok: true, version: '2.2.1', source: 'backup' });
    expect(packageManager.installs).toEqual([{ packageName: 'urllib3', version: '2.2.1' }]);
    expect(registry.snapshot().backups.rollbacks).toEqual({ succeeded: 1, failed: 0 });
  });

  it('RollbackExplicit installs the requested version without reading the ledger', async () => {
    const manager = createManager(() => new Date());

    const result = await manager.rollback('urllib3', '1.26.18');

    expect(result).toEqual({ ok: true, version: '1.26.18', source: 'explicit' });
    expect(packageManager.installs).toEqual([{ packageName: 'urllib3', version: '1.26.18' }]);
    expect(fs.existsSync(directory)).toBe(false);
  });

  it('RollbackMissing fails without installing when no backup exists', async () => {
    const manager = createManager(() => new Date());

    await expect(manager.rollback('idna')).resolves.toEqual({ ok: false, reason: 'no backups for idna' });
    expect(packageManager.installs).toEqual([]);
    expect(registry.snapshot().backups.rollbacks).toEqual({ succeeded: 0, failed: 1 });
  });

  it('RollbackInstallFailure reports the package manager reason', async () => {
    const manager = createManager(() => new Date('2024-05-06T07:08:00.000Z'));
    manager.backup('idna', '3.6');
    packageManager.installResult = { ok: false, reason: 'install failed: exit 1' };

    await expect(manager.rollback('idna')).resolves.toEqual({ ok: false, reason: 'install failed: exit 1' });
  });

  it('skips malformed ledger files', () => {
    const manager = createManager(() => new Date('2024-05-06T07:08:00.000Z'));
    manager.backup('idna', '3.6');
    fs.writeFileSync(path.join(directory, 'broken.json'), '{');
    fs.writeFileSync(path.join(directory, 'partial.json'), JSON.stringify({ package: 'idna' }));
    fs.writeFileSync(path.join(directory, 'notes.txt'), 'ignored');

    expect(manager.listBackups('idna')).toEqual([
      { package: 'idna', version: '3.6', timestamp: '20240506_070800_000' }
    ]);
  });

  it('BackupFailure reports a reason when the directory cannot be created', () => {
    fs.mkdirSync(path.dirname(directory), { recursive: true });
    fs.writeFileSync(directory, 'not a directory');
    const manager = createManager(() => new Date());

    const result = manager.backup('idna', '3.6');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toMatch(/^backup of idna 3\.6 failed: /);
    }
    expect(registry.snapshot().backups.failed).toBe(1);
  });

  it('rejects a history bound below one', () => {
    expect(() => createManager(() => new Date(), 0)).toThrow(RangeError);
  });
});

describe('backup helpers', () => {
  it('formats fixed-width UTC timestamps', () => {
    expect(formatBackupTimestamp(new Date('2024-12-31T23:59:58.007Z'))).toBe('20241231_235958_007');
  });

  it('replaces characters outside the safe file name set', () => {
    expect(sanitizePackageName('zope.interface')).toBe('zope.interface');
    expect(sanitizePackageName('@types/node')).toBe('_types_node');
  });
});
