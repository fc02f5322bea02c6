import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { ActionName, DetectionResult, ValidationStage } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type LatencyState = { count: number; totalMs: number; minMs: number; maxMs: number };

type ActionSnapshot = {
  succeeded: number;
  failed: number;
};

type LogLevelSnapshot = {
  byLevel: CounterMap;
  current: string;
  changes: CounterMap;
  lastChangeAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

type DetectionSnapshot = {
  total: number;
  anomalies: number;
  byRiskLevel: CounterMap;
  byPackage: CounterMap;
  lastDetectionAt: string | null;
  lastScore: number | null;
};

type BackupSnapshot = {
  created: number;
  failed: number;
  evicted: number;
  rollbacks: { succeeded: number; failed: number };
};

type ValidationSnapshot = {
  passed: number;
  failed: number;
  failuresByStage: CounterMap;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: LogLevelSnapshot;
  detections: DetectionSnapshot;
  actions: Record<string, ActionSnapshot>;
  skippedActions: CounterMap;
  validations: ValidationSnapshot;
  backups: BackupSnapshot;
  latencies: Record<string, LatencyStats>;
  alertSink: { stored: number; failures: number; lastError: string | null };
};

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly riskLevelCounters = new Map<string, number>();
  private readonly packageCounters = new Map<string, number>();
  private totalDetections = 0;
  private anomalies = 0;
  private lastDetectionAt: number | null = null;
  private lastScore: number | null = null;
  private readonly actionCounters = new Map<ActionName, ActionSnapshot>();
  private readonly skippedActions = new Map<string, number>();
  private validationsPassed = 0;
  private validationsFailed = 0;
  private readonly validationFailuresByStage = new Map<string, number>();
  private backupsCreated = 0;
  private backupsFailed = 0;
  private backupsEvicted = 0;
  private rollbacksSucceeded = 0;
  private rollbacksFailed = 0;
  private readonly latencyStats = new Map<string, LatencyState>();
  private alertsStored = 0;
  private alertSinkFailures = 0;
  private lastAlertSinkError: string | null = null;

  reset() {
    this.logLevelCounters.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.riskLevelCounters.clear();
    this.packageCounters.clear();
    this.totalDetections = 0;
    this.anomalies = 0;
    this.lastDetectionAt = null;
    this.lastScore = null;
    this.actionCounters.clear();
    this.skippedActions.clear();
    this.validationsPassed = 0;
    this.validationsFailed = 0;
    this.validationFailuresByStage.clear();
    this.backupsCreated = 0;
    this.backupsFailed = 0;
    this.backupsEvicted = 0;
    this.rollbacksSucceeded = 0;
    this.rollbacksFailed = 0;
    this.latencyStats.clear();
    this.alertsStored = 0;
    this.alertSinkFailures = 0;
    this.lastAlertSinkError = null;
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    this.currentLogLevel = normalized;
    if (previous && previous !== normalized) {
      const key = `${previous.toLowerCase()}->${normalized}`;
      this.logLevelChangeCounters.set(key, (this.logLevelChangeCounters.get(key) ?? 0) + 1);
      this.lastLogLevelChangeAt = Date.now();
    }
  }

  recordDetection(result: DetectionResult) {
    this.totalDetections += 1;
    if (result.isAnomaly) {
      this.anomalies += 1;
    }
    this.riskLevelCounters.set(result.riskLevel, (this.riskLevelCounters.get(result.riskLevel) ?? 0) + 1);
    this.packageCounters.set(result.packageName, (this.packageCounters.get(result.packageName) ?? 0) + 1);
    const parsed = Date.parse(result.timestamp);
    this.lastDetectionAt = Number.isFinite(parsed) ? parsed : Date.now();
    this.lastScore = result.anomalyScore;
  }

  recordAction(action: ActionName, ok: boolean) {
    const current = this.actionCounters.get(action) ?? { succeeded: 0, failed: 0 };
    if (ok) {
      current.succeeded += 1;
    } else {
      current.failed += 1;
    }
    this.actionCounters.set(action, current);
  }

  recordSkippedAction(name: string) {
    this.skippedActions.set(name, (this.skippedActions.get(name) ?? 0) + 1);
  }

  recordValidation(ok: boolean, stage: ValidationStage) {
    if (ok) {
      this.validationsPassed += 1;
      return;
    }
    this.validationsFailed += 1;
    this.validationFailuresByStage.set(stage, (this.validationFailuresByStage.get(stage) ?? 0) + 1);
  }

  recordBackup(ok: boolean, evicted = 0) {
    if (ok) {
      this.backupsCreated += 1;
    } else {
      this.backupsFailed += 1;
    }
    this.backupsEvicted += evicted;
  }

  recordRollback(ok: boolean) {
    if (ok) {
      this.rollbacksSucceeded += 1;
    } else {
      this.rollbacksFailed += 1;
    }
  }

  recordAlertStored() {
    this.alertsStored += 1;
  }

  recordAlertSinkFailure(error: unknown) {
    this.alertSinkFailures += 1;
    this.lastAlertSinkError = error instanceof Error ? error.message : String(error);
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportLogLevelMetrics(): LogLevelSnapshot {
    return {
      byLevel: mapToObject(this.logLevelCounters),
      current: this.currentLogLevel,
      changes: mapToObject(this.logLevelChangeCounters),
      lastChangeAt: toIso(this.lastLogLevelChangeAt),
      lastErrorAt: toIso(this.lastErrorAt),
      lastErrorMessage: this.lastErrorMessage
    };
  }

  snapshot(): MetricsSnapshot {
    const actions: Record<string, ActionSnapshot> = {};
    for (const [action, counts] of this.actionCounters) {
      actions[action] = { ...counts };
    }

    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of this.latencyStats) {
      latencies[metric] = {
        count: stats.count,
        totalMs: stats.totalMs,
        minMs: stats.count > 0 ? stats.minMs : 0,
        maxMs: stats.maxMs,
        averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
      };
    }

    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      detections: {
        total: this.totalDetections,
        anomalies: this.anomalies,
        byRiskLevel: mapToObject(this.riskLevelCounters),
        byPackage: mapToObject(this.packageCounters),
        lastDetectionAt: toIso(this.lastDetectionAt),
        lastScore: this.lastScore
      },
      actions,
      skippedActions: mapToObject(this.skippedActions),
      validations: {
        passed: this.validationsPassed,
        failed: this.validationsFailed,
        failuresByStage: mapToObject(this.validationFailuresByStage)
      },
      backups: {
        created: this.backupsCreated,
        failed: this.backupsFailed,
        evicted: this.backupsEvicted,
        rollbacks: { succeeded: this.rollbacksSucceeded, failed: this.rollbacksFailed }
      },
      latencies,
      alertSink: {
        stored: this.alertsStored,
        failures: this.alertSinkFailures,
        lastError: this.lastAlertSinkError
      }
    };
  }
}

function mapToObject(map: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  for (const [key, value] of map) {
    result[key] = value;
  }
  return result;
}

function toIso(value: number | null) {
  return typeof value === 'number' ? new Date(value).toISOString() : null;
}

const defaultRegistry = new MetricsRegistry();

export type { ActionSnapshot, LatencyStats, LogLevelSnapshot, MetricsSnapshot };
export { MetricsRegistry };
export default defaultRegistry;
