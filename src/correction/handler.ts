import logger, { type Logger } from '../logger.js';
import type { CorrectionConfig } from '../config/index.js';
import type { BackupResult, RollbackResult, ValidationResult } from '../types.js';
import type { PackageValidator } from './validator.js';
import type { BackupManager } from './rollback.js';

export type CorrectionOutcome =
  | { ok: true; action: 'none' | 'validated' | 'rolled_back'; validation?: ValidationResult; rollback?: RollbackResult }
  | { ok: false; reason: string; validation?: ValidationResult; rollback?: RollbackResult };

export interface CorrectionHandlerDependencies {
  validator: Pick<PackageValidator, 'validate'>;
  backups: Pick<BackupManager, 'backup' | 'rollback'>;
  log?: Logger;
}

/**
 * Validation-first correction: a suspicious package that fails validation is
 * rolled back to its most recent backup.
 */
export class CorrectionHandler {
  private readonly detectionThreshold: number;
  private readonly validator: Pick<PackageValidator, 'validate'>;
  private readonly backups: Pick<BackupManager, 'backup' | 'rollback'>;
  private readonly log: Logger;

  constructor(config: Pick<CorrectionConfig, 'detectionThreshold'>, dependencies: CorrectionHandlerDependencies) {
    this.detectionThreshold = config.detectionThreshold;
    this.validator = dependencies.validator;
    this.backups = dependencies.backups;
    this.log = (dependencies.log ?? logger).child({ component: 'correction' });
  }

  async handleDetection(packageName: string, version: string, anomalyScore: number): Promise<CorrectionOutcome> {
    if (!(anomalyScore > this.detectionThreshold)) {
      return { ok: true, action: 'none' };
    }

    this.log.warn({ packageName, version, anomalyScore }, 'Suspicious package detected');
    const validation = await this.validator.validate(packageName, version);
    if (validation.ok) {
      return { ok: true, action: 'validated', validation };
    }

    const rollback = await this.backups.rollback(packageName);
    if (rollback.ok) {
      return { ok: true, action: 'rolled_back', validation, rollback };
    }
    return {
      ok: false,
      reason: `validation failed (${validation.reason}) and rollback failed (${rollback.reason})`,
      validation,
      rollback
    };
  }

  backupCurrentState(packageName: string, version: string): BackupResult {
    return this.backups.backup(packageName, version);
  }

  validatePackage(packageName: string, version?: string): Promise<ValidationResult> {
    return this.validator.validate(packageName, version);
  }

  forceRollback(packageName: string, version?: string): Promise<RollbackResult> {
    return this.backups.rollback(packageName, version);
  }
}
