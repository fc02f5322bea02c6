import fs from 'node:fs';
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import db, { databasePath, listDetections } from './db.js';
import {
  collectHealthChecks,
  createRuntime,
  registerHealthIndicator,
  registerShutdownHook,
  resolveRuntimeConfig,
  runShutdownHooks,
  type HealthCheck,
  type Runtime
} from './app.js';
import { loadTelemetryFile } from './detector/telemetry.js';
import type { DetectionResult, RiskLevel, TelemetrySample } from './types.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type HealthStatus = HealthCheck['status'];

type HealthPayload = {
  status: HealthStatus;
  timestamp: string;
  application: { name: string; version: string };
  checks: HealthCheck[];
  metrics: MetricsSnapshot;
};

type ParsedArgs = {
  positionals: string[];
  configPath?: string;
  packageName?: string;
  riskLevel?: RiskLevel;
  limit?: number;
  json: boolean;
  anomaliesOnly: boolean;
  help: boolean;
  errors: string[];
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE_LINES = [
  'Supply Sentinel CLI',
  '',
  'Usage:',
  '  sentinel score <telemetry.json> [--json]       Score telemetry windows and remediate anomalies',
  '  sentinel backup <package> <version>            Record a known-good version',
  '  sentinel rollback <package> [version]          Reinstall a version (latest backup by default)',
  '  sentinel validate <package> [version]          Check source and artifact integrity',
  '  sentinel detections [options]                  List stored detection results',
  '  sentinel health                                Print health JSON',
  '  sentinel log-level                             Get or set the active log level',
  '',
  'Options:',
  '  -c, --config <path>   Use an alternate configuration file',
  '  -p, --package <name>  Filter detections by package',
  '  -r, --risk <level>    Filter detections by risk level (high, medium, low, none)',
  '  -n, --limit <count>   Maximum detections to list (default: 50)',
  '  -a, --anomalies       Only list anomalous detections',
  '  -j, --json            Output JSON',
  '  -h, --help            Show this help message'
];

const LOG_LEVEL_USAGE = [
  'Sentinel log level commands',
  '',
  'Usage:',
  '  sentinel log-level            Show the current log level',
  '  sentinel log-level get        Show the current log level',
  '  sentinel log-level set <level>  Change the active log level',
  '  sentinel log-level <level>      Shortcut for set',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

const RISK_LEVELS: readonly RiskLevel[] = ['high', 'medium', 'low', 'none'];

function parseRiskLevel(value: string): RiskLevel | undefined {
  const normalized = value.toLowerCase();
  return RISK_LEVELS.find(level => level === normalized);
}

function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    positionals: [],
    json: false,
    anomaliesOnly: false,
    help: false,
    errors: []
  };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }
    if (token === '--help' || token === '-h') {
      result.help = true;
      continue;
    }
    if (token === '--json' || token === '-j') {
      result.json = true;
      continue;
    }
    if (token === '--anomalies' || token === '-a') {
      result.anomaliesOnly = true;
      continue;
    }
    if (token === '--config' || token === '-c') {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push('Missing value for --config');
      } else {
        result.configPath = value;
        index += 1;
      }
      continue;
    }
    if (token === '--package' || token === '-p') {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push('Missing value for --package');
      } else {
        result.packageName = value;
        index += 1;
      }
      continue;
    }
    if (token === '--risk' || token === '-r') {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push('Missing value for --risk');
      } else {
        const level = parseRiskLevel(value);
        if (level) {
          result.riskLevel = level;
        } else {
          result.errors.push(`Invalid risk level "${value}" (expected: ${RISK_LEVELS.join(', ')})`);
        }
        index += 1;
      }
      continue;
    }
    if (token === '--limit' || token === '-n') {
      const value = args[index + 1];
      const parsed = value ? Number(value) : Number.NaN;
      if (!value || !Number.isInteger(parsed) || parsed <= 0) {
        result.errors.push('Invalid value for --limit');
      } else {
        result.limit = parsed;
      }
      index += 1;
      continue;
    }
    if (token.startsWith('-')) {
      result.errors.push(`Unknown option: ${token}`);
      continue;
    }
    result.positionals.push(token);
  }

  return result;
}

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const [command, ...rest] = argv;

  switch (command) {
    case 'score':
      return withParsedArgs(rest, io, args => runScoreCommand(args, io));
    case 'backup':
      return withParsedArgs(rest, io, args => runBackupCommand(args, io));
    case 'rollback':
      return withParsedArgs(rest, io, args => runRollbackCommand(args, io));
    case 'validate':
      return withParsedArgs(rest, io, args => runValidateCommand(args, io));
    case 'detections':
      return withParsedArgs(rest, io, args => runDetectionsCommand(args, io));
    case 'health':
      return outputHealth(io);
    case 'log-level':
      return runLogLevelCommand(rest, io);
    case undefined:
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
    }
  }
}

async function withParsedArgs(
  rest: string[],
  io: CliIo,
  handler: (args: ParsedArgs) => Promise<number> | number
): Promise<number> {
  const parsed = parseArgs(rest);
  if (parsed.help) {
    io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
    return 0;
  }
  if (parsed.errors.length > 0) {
    parsed.errors.forEach(error => {
      io.stderr.write(`${error}\n`);
    });
    return 1;
  }
  return handler(parsed);
}

function buildRuntime(args: ParsedArgs): Runtime {
  const { config } = resolveRuntimeConfig(args.configPath);
  return createRuntime(config);
}

async function runScoreCommand(args: ParsedArgs, io: CliIo): Promise<number> {
  const [telemetryPath] = args.positionals;
  if (!telemetryPath) {
    io.stderr.write('Missing telemetry file\n');
    return 1;
  }

  let samples: TelemetrySample[];
  try {
    const parsed = loadTelemetryFile(telemetryPath);
    for (const rejected of parsed.rejected) {
      logger.warn({ index: rejected.index, reason: rejected.reason }, 'Telemetry sample rejected');
    }
    samples = parsed.samples;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Failed to read telemetry: ${message}\n`);
    return 1;
  }

  const runtime = buildRuntime(args);
  const results = await runtime.manager.processSamples(samples);

  if (args.json) {
    io.stdout.write(`${JSON.stringify(results)}\n`);
    return 0;
  }

  if (results.length === 0) {
    io.stdout.write('No complete windows to score\n');
    return 0;
  }
  for (const result of results) {
    io.stdout.write(`${formatDetection(result)}\n`);
  }
  const anomalies = results.filter(result => result.isAnomaly).length;
  io.stdout.write(`Scored ${results.length} window(s), ${anomalies} anomalous\n`);
  return 0;
}

function runBackupCommand(args: ParsedArgs, io: CliIo): number {
  const [packageName, version] = args.positionals;
  if (!packageName || !version) {
    io.stderr.write('Usage: sentinel backup <package> <version>\n');
    return 1;
  }

  const runtime = buildRuntime(args);
  const result = runtime.correction.backupCurrentState(packageName, version);
  if (!result.ok) {
    io.stderr.write(`Backup failed: ${result.reason}\n`);
    return 1;
  }
  io.stdout.write(`Backed up ${result.record.package}==${result.record.version} at ${result.record.timestamp}\n`);
  if (result.evicted.length > 0) {
    io.stdout.write(`Evicted ${result.evicted.length} older backup(s)\n`);
  }
  return 0;
}

async function runRollbackCommand(args: ParsedArgs, io: CliIo): Promise<number> {
  const [packageName, version] = args.positionals;
  if (!packageName) {
    io.stderr.write('Usage: sentinel rollback <package> [version]\n');
    return 1;
  }

  const runtime = buildRuntime(args);
  const result = await runtime.correction.forceRollback(packageName, version);
  if (!result.ok) {
    io.stderr.write(`Rollback failed: ${result.reason}\n`);
    return 1;
  }
  io.stdout.write(`Rolled back ${packageName} to ${result.version} (${result.source})\n`);
  return 0;
}

async function runValidateCommand(args: ParsedArgs, io: CliIo): Promise<number> {
  const [packageName, version] = args.positionals;
  if (!packageName) {
    io.stderr.write('Usage: sentinel validate <package> [version]\n');
    return 1;
  }

  const runtime = buildRuntime(args);
  const result = await runtime.correction.validatePackage(packageName, version);
  if (args.json) {
    io.stdout.write(`${JSON.stringify(result)}\n`);
    return result.ok ? 0 : 1;
  }
  if (!result.ok) {
    io.stderr.write(`Validation failed (${result.stage}): ${result.reason}\n`);
    return 1;
  }
  io.stdout.write(`${packageName}==${result.version} ${result.reason}\n`);
  return 0;
}

function runDetectionsCommand(args: ParsedArgs, io: CliIo): number {
  const page = listDetections({
    packageName: args.packageName,
    riskLevel: args.riskLevel,
    anomaliesOnly: args.anomaliesOnly,
    limit: args.limit
  });

  if (args.json) {
    io.stdout.write(`${JSON.stringify(page)}\n`);
    return 0;
  }
  if (page.items.length === 0) {
    io.stdout.write('No detections recorded\n');
    return 0;
  }
  for (const item of page.items) {
    io.stdout.write(`${formatDetection(item)}\n`);
  }
  io.stdout.write(`Showing ${page.items.length} of ${page.total}\n`);
  return 0;
}

function formatDetection(result: DetectionResult) {
  const actions = result.actionsTaken.length > 0 ? result.actionsTaken.join(',') : '-';
  return `${result.timestamp} ${result.packageName} score=${result.anomalyScore.toFixed(3)} risk=${result.riskLevel} actions=${actions}`;
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (first.startsWith('-')) {
    io.stderr.write(`Unknown option: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }
}

function readPackageInfo(): { name: string; version: string } {
  const packagePath = fileURLToPath(new URL('../package.json', import.meta.url));
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'name' in parsed && 'version' in parsed) {
      return { name: String(parsed.name), version: String(parsed.version) };
    }
  } catch (error) {
    logger.debug({ err: error }, 'Package metadata unavailable');
  }
  return { name: 'supply-sentinel', version: '0.0.0' };
}

export async function buildHealthPayload(): Promise<HealthPayload> {
  const snapshot = metrics.snapshot();
  const errorCount = (snapshot.logs.byLevel.error ?? 0) + (snapshot.logs.byLevel.fatal ?? 0);
  const builtIn: HealthCheck[] = [
    {
      name: 'logger',
      status: errorCount > 0 ? 'degraded' : 'ok',
      details: { levels: snapshot.logs.byLevel }
    },
    {
      name: 'alertSink',
      status: snapshot.alertSink.failures > 0 ? 'degraded' : 'ok',
      details: { ...snapshot.alertSink }
    }
  ];
  const checks = [...builtIn, ...(await collectHealthChecks(snapshot))];

  return {
    status: checks.some(check => check.status !== 'ok') ? 'degraded' : 'ok',
    timestamp: new Date().toISOString(),
    application: readPackageInfo(),
    checks,
    metrics: snapshot
  };
}

async function outputHealth(io: CliIo): Promise<number> {
  const payload = await buildHealthPayload();
  io.stdout.write(`${JSON.stringify(payload)}\n`);
  return payload.status === 'ok' ? 0 : 1;
}

registerHealthIndicator('database', () => {
  const row = db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
  return { status: row?.ok === 1 ? 'ok' : 'degraded', details: { path: databasePath } };
});

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  registerShutdownHook('database', () => {
    db.close();
  });
  runCli()
    .then(async code => {
      await runShutdownHooks('cli-exit');
      process.exit(code);
    })
    .catch(error => {
      logger.error({ err: error }, 'Sentinel CLI failed');
      process.exit(1);
    });
}
