import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runCli } from '../src/cli.js';
import { clearDetections, storeDetection } from '../src/db.js';
import { getLogLevel, setLogLevel } from '../src/logger.js';

function createTestIo() {
  let stdout = '';
  let stderr = '';
  const sink = (append: (text: string) => void) =>
    new Writable({
      write(chunk, _encoding, callback) {
        append(typeof chunk === 'string' ? chunk : chunk.toString());
        callback();
      }
    });

  return {
    io: {
      stdout: sink(text => {
        stdout += text;
      }),
      stderr: sink(text => {
        stderr += text;
      })
    },
    stdout: () => stdout,
    stderr: () => stderr
  };
}

describe('sentinel CLI', () => {
  let root: string;
  let configPath: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-cli-'));
    configPath = path.join(root, 'sentinel.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        detector: { windowSize: 2, kernelSize: 3, hiddenSize: 4, headHiddenSize: 4, threshold: 1 },
        mitigation: { notification: { logging: { enabled: false, path: path.join(root, 'mitigation.log') } } },
        correction: {
          backup: { directory: path.join(root, 'backups'), maxHistory: 2 },
          packageManager: { preferencesDir: path.join(root, 'preferences.d') }
        }
      })
    );
    clearDetections();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('prints usage for help', async () => {
    const test = createTestIo();

    await expect(runCli(['help'], test.io)).resolves.toBe(0);
    expect(test.stdout().split('\n')[0]).toBe('Supply Sentinel CLI');
  });

  it('rejects unknown commands and options', async () => {
    const unknownCommand = createTestIo();
    await expect(runCli(['frobnicate'], unknownCommand.io)).resolves.toBe(1);
    expect(unknownCommand.stderr()).toBe('Unknown command: frobnicate\n');

    const unknownOption = createTestIo();
    await expect(runCli(['score', '--verbose'], unknownOption.io)).resolves.toBe(1);
    expect(unknownOption.stderr()).toBe('Unknown option: --verbose\n');
  });

  it('scores a telemetry file and reports each window', async () => {
    const telemetryPath = path.join(root, 'telemetry.json');
    fs.writeFileSync(
      telemetryPath,
      JSON.stringify([
        { packageName: 'six', timestamp: '2024-06-01T00:00:00.000Z', metrics: { size: 100, version: '1.16.0', dependencies: [] } },
        { packageName: 'six', timestamp: '2024-06-01T01:00:00.000Z', metrics: { size: 120, version: '1.16.0', dependencies: [] } },
        { packageName: 'six', timestamp: '2024-06-01T02:00:00.000Z', metrics: { size: 125, version: '1.17.0', dependencies: ['a'] } },
        { timestamp: '2024-06-01T03:00:00.000Z', metrics: {} }
      ])
    );
    const test = createTestIo();

    await expect(runCli(['score', telemetryPath, '--config', configPath], test.io)).resolves.toBe(0);

    const lines = test.stdout().trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^2024-06-01T01:00:00\.000Z six score=\d\.\d{3} risk=none actions=-$/);
    expect(lines[1]).toMatch(/^2024-06-01T02:00:00\.000Z six score=\d\.\d{3} risk=none actions=-$/);
    expect(lines[2]).toBe('Scored 2 window(s), 0 anomalous');
  });

  it('prints scored windows as JSON', async () => {
    const telemetryPath = path.join(root, 'telemetry.json');
    fs.writeFileSync(
      telemetryPath,
      JSON.stringify([
        { package_name: 'idna', timestamp: '2024-06-01T00:00:00.000Z', metrics: { size: 10 } },
        { package_name: 'idna', timestamp: '2024-06-01T01:00:00.000Z', metrics: { size: 11 } }
      ])
    );
    const test = createTestIo();

    await expect(runCli(['score', telemetryPath, '-c', configPath, '--json'], test.io)).resolves.toBe(0);

    const results: unknown = JSON.parse(test.stdout());
    expect(results).toEqual([
      expect.objectContaining({
        timestamp: '2024-06-01T01:00:00.000Z',
        packageName: 'idna',
        threshold: 1,
        isAnomaly: false,
        riskLevel: 'none',
        actionsTaken: []
      })
    ]);
  });

  it('reports telemetry problems', async () => {
    const missingArgument = createTestIo();
    await expect(runCli(['score'], missingArgument.io)).resolves.toBe(1);
    expect(missingArgument.stderr()).toBe('Missing telemetry file\n');

    const notArray = path.join(root, 'object.json');
    fs.writeFileSync(notArray, '{"packageName":"six"}');
    const invalid = createTestIo();
    await expect(runCli(['score', notArray, '-c', configPath], invalid.io)).resolves.toBe(1);
    expect(invalid.stderr()).toBe('Failed to read telemetry: Telemetry document must be a JSON array of samples\n');
  });

  it('notes when there are too few samples for a window', async () => {
    const telemetryPath = path.join(root, 'telemetry.json');
    fs.writeFileSync(
      telemetryPath,
      JSON.stringify([{ packageName: 'six', timestamp: '2024-06-01T00:00:00.000Z', metrics: { size: 1 } }])
    );
    const test = createTestIo();

    await expect(runCli(['score', telemetryPath, '-c', configPath], test.io)).resolves.toBe(0);
    expect(test.stdout()).toBe('No complete windows to score\n');
  });

  it('records backups and reports evictions past the history bound', async () => {
    const outputs: string[] = [];
    for (const version of ['1.15.0', '1.16.0', '1.17.0']) {
      const test = createTestIo();
      await expect(runCli(['backup', 'six', version, '-c', configPath], test.io)).resolves.toBe(0);
      outputs.push(test.stdout());
    }

    expect(outputs[0]).toMatch(/^Backed up six==1\.15\.0 at \d{8}_\d{6}_\d{3}(_\d{3})?\n$/);
    expect(outputs[1]).toMatch(/^Backed up six==1\.16\.0 at \d{8}_\d{6}_\d{3}(_\d{3})?\n$/);
    expect(outputs[2]).toMatch(/^Backed up six==1\.17\.0 at \d{8}_\d{6}_\d{3}(_\d{3})?\nEvicted 1 older backup\(s\)\n$/);
    expect(fs.readdirSync(path.join(root, 'backups'))).toHaveLength(2);
  });

  it('requires a package and version to back up', async () => {
    const test = createTestIo();

    await expect(runCli(['backup', 'six'], test.io)).resolves.toBe(1);
    expect(test.stderr()).toBe('Usage: sentinel backup <package> <version>\n');
  });

  it('fails a rollback without a recorded backup', async () => {
    const test = createTestIo();

    await expect(runCli(['rollback', 'idna', '-c', configPath], test.io)).resolves.toBe(1);
    expect(test.stderr()).toBe('Rollback failed: no backups for idna\n');
  });

  it('requires a package to validate', async () => {
    const test = createTestIo();

    await expect(runCli(['validate'], test.io)).resolves.toBe(1);
    expect(test.stderr()).toBe('Usage: sentinel validate <package> [version]\n');
  });

  describe('detections', () => {
    beforeEach(() => {
      storeDetection({
        timestamp: '2024-06-01T02:00:00.000Z',
        packageName: 'six',
        anomalyScore: 0.93,
        threshold: 0.5,
        isAnomaly: true,
        riskLevel: 'high',
        actionsTaken: ['rollback', 'notify']
      });
      storeDetection({
        timestamp: '2024-06-01T01:00:00.000Z',
        packageName: 'idna',
        anomalyScore: 0.1,
        threshold: 0.5,
        isAnomaly: false,
        riskLevel: 'none',
        actionsTaken: []
      });
    });

    it('lists stored detections newest first', async () => {
      const test = createTestIo();

      await expect(runCli(['detections'], test.io)).resolves.toBe(0);
      expect(test.stdout()).toBe(
        [
          '2024-06-01T02:00:00.000Z six score=0.930 risk=high actions=rollback,notify',
          '2024-06-01T01:00:00.000Z idna score=0.100 risk=none actions=-',
          'Showing 2 of 2',
          ''
        ].join('\n')
      );
    });

    it('filters anomalies and limits the page', async () => {
      const anomalies = createTestIo();
      await expect(runCli(['detections', '--anomalies'], anomalies.io)).resolves.toBe(0);
      expect(anomalies.stdout()).toBe(
        '2024-06-01T02:00:00.000Z six score=0.930 risk=high actions=rollback,notify\nShowing 1 of 1\n'
      );

      const limited = createTestIo();
      await expect(runCli(['detections', '-n', '1'], limited.io)).resolves.toBe(0);
      expect(limited.stdout().trimEnd().split('\n').pop()).toBe('Showing 1 of 2');
    });

    it('filters by package and risk level', async () => {
      const test = createTestIo();

      await expect(runCli(['detections', '-p', 'idna', '-r', 'none', '--json'], test.io)).resolves.toBe(0);
      const page: unknown = JSON.parse(test.stdout());
      expect(page).toMatchObject({ total: 1, items: [{ packageName: 'idna', riskLevel: 'none' }] });
    });

    it('rejects an unknown risk level', async () => {
      const test = createTestIo();

      await expect(runCli(['detections', '--risk', 'severe'], test.io)).resolves.toBe(1);
      expect(test.stderr()).toBe('Invalid risk level "severe" (expected: high, medium, low, none)\n');
    });
  });

  it('reports an empty detection store', async () => {
    const test = createTestIo();

    await expect(runCli(['detections'], test.io)).resolves.toBe(0);
    expect(test.stdout()).toBe('No detections recorded\n');
  });

  it('prints health JSON with built-in and registered checks', async () => {
    const test = createTestIo();

    await expect(runCli(['health'], test.io)).resolves.toBe(0);

    const payload: unknown = JSON.parse(test.stdout());
    expect(payload).toMatchObject({
      status: 'ok',
      application: { name: 'supply-sentinel', version: '0.1.0' },
      checks: [
        { name: 'logger', status: 'ok' },
        { name: 'alertSink', status: 'ok' },
        { name: 'database', status: 'ok', details: { path: ':memory:' } }
      ]
    });
  });

  describe('log-level', () => {
    let initialLevel: string;

    beforeEach(() => {
      initialLevel = getLogLevel();
    });

    afterEach(() => {
      setLogLevel(initialLevel);
    });

    it('shows the current level', async () => {
      const test = createTestIo();

      await expect(runCli(['log-level'], test.io)).resolves.toBe(0);
      expect(test.stdout()).toBe('silent\n');
    });

    it('changes the level', async () => {
      const test = createTestIo();

      await expect(runCli(['log-level', 'set', 'WARN'], test.io)).resolves.toBe(0);
      expect(test.stdout()).toBe('Log level set to warn\n');
      expect(getLogLevel()).toBe('warn');
    });

    it('rejects an unknown level', async () => {
      const test = createTestIo();

      await expect(runCli(['log-level', 'verbose'], test.io)).resolves.toBe(1);
      expect(test.stderr()).toBe(
        'Unknown log level "verbose" (available: debug, error, fatal, info, silent, trace, warn)\n'
      );
    });
  });
});
