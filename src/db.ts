import Database from 'better-sqlite3';
import config from 'config';
import fs from 'node:fs';
import path from 'node:path';
import { ACTION_NAMES, type ActionName, type DetectionResult, type RiskLevel } from './types.js';

const IN_MEMORY = ':memory:';

const dbPath = config.has('database.path') ? config.get<string>('database.path') : 'data/sentinel.sqlite';
if (dbPath !== IN_MEMORY) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

const db = new Database(dbPath);

export const databasePath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dbPath);

db.exec(`
  CREATE TABLE IF NOT EXISTS detections (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ts INTEGER NOT NULL,
    package_name TEXT NOT NULL,
    anomaly_score REAL NOT NULL,
    threshold REAL NOT NULL,
    is_anomaly INTEGER NOT NULL,
    risk_level TEXT NOT NULL,
    actions_taken TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_detections_ts ON detections (ts);
  CREATE INDEX IF NOT EXISTS idx_detections_package ON detections (package_name, ts);
`);

type DetectionRow = {
  id: number;
  ts: number;
  package_name: string;
  anomaly_score: number;
  threshold: number;
  is_anomaly: number;
  risk_level: string;
  actions_taken: string;
};

type InsertParams = Omit<DetectionRow, 'id'>;

const insertStatement = db.prepare<InsertParams>(`
  INSERT INTO detections (ts, package_name, anomaly_score, threshold, is_anomaly, risk_level, actions_taken)
  VALUES (@ts, @package_name, @anomaly_score, @threshold, @is_anomaly, @risk_level, @actions_taken)
`);

export type StoredDetection = DetectionResult & { id: number };

export interface ListDetectionsOptions {
  packageName?: string;
  riskLevel?: RiskLevel;
  anomaliesOnly?: boolean;
  since?: number;
  until?: number;
  limit?: number;
  offset?: number;
}

export interface PaginatedDetections {
  items: StoredDetection[];
  total: number;
}

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export function storeDetection(result: DetectionResult): number {
  const parsed = Date.parse(result.timestamp);
  const info = insertStatement.run({
    ts: Number.isFinite(parsed) ? parsed : Date.now(),
    package_name: result.packageName,
    anomaly_score: result.anomalyScore,
    threshold: result.threshold,
    is_anomaly: result.isAnomaly ? 1 : 0,
    risk_level: result.riskLevel,
    actions_taken: JSON.stringify(result.actionsTaken)
  });
  return typeof info.lastInsertRowid === 'bigint' ? Number(info.lastInsertRowid) : info.lastInsertRowid;
}

export function listDetections(options: ListDetectionsOptions = {}): PaginatedDetections {
  const filters: string[] = [];
  const params: Record<string, string | number> = {};

  if (options.packageName) {
    filters.push('package_name = @packageName');
    params.packageName = options.packageName;
  }

  if (options.riskLevel) {
    filters.push('risk_level = @riskLevel');
    params.riskLevel = options.riskLevel;
  }

  if (options.anomaliesOnly) {
    filters.push('is_anomaly = 1');
  }

  if (typeof options.since === 'number') {
    filters.push('ts >= @since');
    params.since = options.since;
  }

  if (typeof options.until === 'number') {
    filters.push('ts <= @until');
    params.until = options.until;
  }

  const whereClause = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
  const limit = clampLimit(options.limit);
  const offset = Math.max(0, Math.floor(options.offset ?? 0));

  const rows = db
    .prepare<Record<string, string | number>, DetectionRow>(
      `SELECT id, ts, package_name, anomaly_score, threshold, is_anomaly, risk_level, actions_taken
       FROM detections
       ${whereClause}
       ORDER BY ts DESC, id DESC
       LIMIT @limit OFFSET @offset`
    )
    .all({ ...params, limit, offset });
  const totalRow = db
    .prepare<Record<string, string | number>, { count: number }>(
      `SELECT COUNT(*) AS count FROM detections ${whereClause}`
    )
    .get(params);

  return {
    items: rows.map(mapRow),
    total: totalRow?.count ?? 0
  };
}

export function clearDetections() {
  db.prepare('DELETE FROM detections').run();
}

function clampLimit(limit: number | undefined) {
  if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0) {
    return DEFAULT_LIMIT;
  }
  return Math.min(MAX_LIMIT, Math.floor(limit));
}

function mapRow(row: DetectionRow): StoredDetection {
  return {
    id: row.id,
    timestamp: new Date(row.ts).toISOString(),
    packageName: row.package_name,
    anomalyScore: row.anomaly_score,
    threshold: row.threshold,
    isAnomaly: row.is_anomaly === 1,
    riskLevel: parseRiskLevel(row.risk_level),
    actionsTaken: parseActions(row.actions_taken)
  };
}

function parseRiskLevel(value: string): RiskLevel {
  switch (value) {
    case 'high':
    case 'medium':
    case 'low':
      return value;
    default:
      return 'none';
  }
}

function parseActions(value: string): ActionName[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return [];
  }
  const entries: unknown[] = Array.isArray(parsed) ? parsed : [];
  return entries.filter(isActionName);
}

function isActionName(value: unknown): value is ActionName {
  return ACTION_NAMES.some(name => name === value);
}

export default db;
