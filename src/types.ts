export type RiskTier = 'high' | 'medium' | 'low';

export type RiskLevel = RiskTier | 'none';

export const ACTION_NAMES = ['rollback', 'validate', 'block_updates', 'notify'] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export type RiskThresholds = {
  high: number;
  medium: number;
  low: number;
};

export interface TelemetrySample {
  readonly timestamp: string;
  readonly packageName: string;
  readonly metrics: Readonly<Record<string, unknown>>;
}

export type FeatureValue = number | string | boolean | null;

export interface FeatureRow {
  timestamp: Date;
  packageName: string;
  fields: Record<string, FeatureValue>;
}

export type FeatureTable = FeatureRow[];

export type FeatureVector = number[];

export type Window = FeatureVector[];

export type WindowSet = {
  sequences: Window[];
  timestamps: Date[];
};

export type ScoredWindow = {
  score: number;
  timestamp: Date;
};

export interface BackupRecord {
  readonly package: string;
  readonly version: string;
  readonly timestamp: string;
}

export type Failure = { ok: false; reason: string };

export type CommandResult = { ok: true } | Failure;

export type BackupResult = { ok: true; record: BackupRecord; filePath: string; evicted: string[] } | Failure;

export type RollbackResult = { ok: true; version: string; source: 'explicit' | 'backup' } | Failure;

export type ValidationStage = 'source' | 'integrity' | 'complete';

export type ValidationResult =
  | { ok: true; stage: 'complete'; reason: string; version: string }
  | { ok: false; stage: ValidationStage; reason: string };

export type NotificationChannel = 'log' | 'email';

export type ChannelOutcome = {
  channel: NotificationChannel;
  target?: string;
  ok: boolean;
  reason?: string;
};

export type NotifyResult = {
  ok: boolean;
  channels: ChannelOutcome[];
};

export type ActionOutcome = {
  action: ActionName;
  ok: boolean;
  reason?: string;
};

export interface MitigationOutcome {
  timestamp: string;
  packageName: string;
  riskLevel: RiskTier;
  anomalyScore: number;
  actionsTaken: ActionName[];
  outcomes: ActionOutcome[];
  skipped: string[];
}

export interface DetectionResult {
  timestamp: string;
  packageName: string;
  anomalyScore: number;
  threshold: number;
  isAnomaly: boolean;
  riskLevel: RiskLevel;
  actionsTaken: ActionName[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
