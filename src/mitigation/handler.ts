import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { MitigationConfig } from '../config/index.js';
import { assertThresholdOrder, classifyRisk } from '../detector/riskClassifier.js';
import type { BackupManager } from '../correction/rollback.js';
import type { PackageValidator } from '../correction/validator.js';
import type { PackageManager } from '../correction/packageManager.js';
import type { Notifier } from './notifier.js';
import {
  dispatchAction,
  parseActionPlan,
  type ActionExecutor,
  type ActionResult,
  type BlockUpdatesAction,
  type NotifyAction,
  type RollbackAction,
  type ValidateAction
} from './actions.js';
import { describeError, type ActionName, type ActionOutcome, type MitigationOutcome } from '../types.js';

export interface MitigationServices {
  backups: Pick<BackupManager, 'rollback'>;
  validator: Pick<PackageValidator, 'validate'>;
  packageManager: Pick<PackageManager, 'blockUpdates'>;
  notifier: Pick<Notifier, 'notify'>;
}

export class ServiceActionExecutor implements ActionExecutor {
  constructor(private readonly services: MitigationServices) {}

  async rollback(action: RollbackAction): Promise<ActionResult> {
    const result = await this.services.backups.rollback(action.target.packageName);
    return result.ok ? { ok: true } : { ok: false, reason: result.reason };
  }

  async validate(action: ValidateAction): Promise<ActionResult> {
    const result = await this.services.validator.validate(action.target.packageName);
    return result.ok ? { ok: true } : { ok: false, reason: `${result.stage}: ${result.reason}` };
  }

  async blockUpdates(action: BlockUpdatesAction): Promise<ActionResult> {
    return this.services.packageManager.blockUpdates(action.target.packageName);
  }

  async notify(action: NotifyAction): Promise<ActionResult> {
    const result = await this.services.notifier.notify(action.target);
    if (result.ok) {
      return { ok: true };
    }
    const failures = result.channels.filter(channel => !channel.ok);
    const reason =
      failures.length > 0
        ? failures.map(channel => `${channel.channel}${channel.target ? `:${channel.target}` : ''}`).join(', ')
        : 'no external channel delivered the alert';
    return { ok: false, reason };
  }
}

export interface MitigationHandlerDependencies {
  executor: ActionExecutor;
  /** Mitigation audit trail; the structured response record is also written to the app log. */
  audit?: Logger | null;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => Date;
}

/**
 * Per detection event: classify the score, run the tier's actions in order
 * (each at most once, each isolated from the others' failures) and log the
 * response record. There is no retry loop at this level.
 */
export class MitigationHandler {
  private readonly config: MitigationConfig;
  private readonly executor: ActionExecutor;
  private readonly audit: Logger | null;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => Date;

  constructor(config: MitigationConfig, dependencies: MitigationHandlerDependencies) {
    assertThresholdOrder(config.thresholds);
    this.config = config;
    this.executor = dependencies.executor;
    this.audit = dependencies.audit ?? null;
    this.log = (dependencies.log ?? logger).child({ component: 'mitigation' });
    this.metrics = dependencies.metrics ?? metrics;
    this.now = dependencies.now ?? (() => new Date());
  }

  async handleThreat(packageName: string, anomalyScore: number, detectedAt?: string): Promise<MitigationOutcome> {
    const riskLevel = classifyRisk(anomalyScore, this.config.thresholds);
    const target = {
      packageName,
      anomalyScore,
      riskLevel,
      detectedAt: detectedAt ?? this.now().toISOString()
    };
    const plan = parseActionPlan(this.config.actions[riskLevel], target);

    const outcomes: ActionOutcome[] = [];
    const skipped: string[] = [];
    for (const action of plan) {
      if (action.kind === 'unrecognized') {
        this.log.warn({ packageName, action: action.name }, 'Unknown mitigation action skipped');
        this.metrics.recordSkippedAction(action.name);
        skipped.push(action.name);
        continue;
      }

      let outcome: ActionOutcome;
      try {
        const result = await dispatchAction(this.executor, action);
        outcome = { action: action.kind, ok: result.ok, reason: result.reason };
      } catch (error) {
        this.log.error({ err: error, packageName, action: action.kind }, 'Mitigation action threw');
        outcome = { action: action.kind, ok: false, reason: describeError(error) };
      }

      this.metrics.recordAction(outcome.action, outcome.ok);
      if (!outcome.ok) {
        this.log.warn({ packageName, action: outcome.action, reason: outcome.reason }, 'Mitigation action failed');
      }
      outcomes.push(outcome);
    }

    const actionsTaken: ActionName[] = outcomes.filter(outcome => outcome.ok).map(outcome => outcome.action);
    const timestamp = target.detectedAt;
    this.logResponse({ timestamp, packageName, riskLevel, anomalyScore, actionsTaken });

    return { timestamp, packageName, riskLevel, anomalyScore, actionsTaken, outcomes, skipped };
  }

  private logResponse(entry: Pick<MitigationOutcome, 'timestamp' | 'packageName' | 'riskLevel' | 'anomalyScore' | 'actionsTaken'>) {
    const record = {
      timestamp: entry.timestamp,
      package: entry.packageName,
      risk_level: entry.riskLevel,
      anomaly_score: entry.anomalyScore,
      actions_taken: entry.actionsTaken
    };
    this.audit?.info(record, 'Mitigation response');
    this.log.info(record, 'Mitigation response');
  }
}
