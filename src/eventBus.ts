import { EventEmitter } from 'node:events';
import logger, { type Logger } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { storeDetection } from './db.js';
import type { DetectionResult } from './types.js';

const DETECTION_CHANNEL = 'detection';

interface DetectionBusDependencies {
  store: (result: DetectionResult) => unknown;
  log: Logger;
  metrics?: MetricsRegistry;
}

/**
 * Local alerting collaborator. Every DetectionResult is persisted, counted and
 * logged; delivery is fire-and-forget, so a failing store is logged and
 * reported through the return value, never retried.
 */
class DetectionBus extends EventEmitter {
  private readonly store: (result: DetectionResult) => unknown;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: DetectionBusDependencies = { store: storeDetection, log: logger }) {
    super();
    this.store = dependencies.store;
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;
  }

  emitDetection(result: DetectionResult): boolean {
    const frozen = Object.freeze({ ...result, actionsTaken: [...result.actionsTaken] });
    let stored = true;
    try {
      this.store(frozen);
      this.metrics.recordAlertStored();
    } catch (error) {
      stored = false;
      this.metrics.recordAlertSinkFailure(error);
      this.log.error({ err: error, packageName: result.packageName }, 'Failed to store detection result');
    }

    this.metrics.recordDetection(frozen);
    const payload = {
      package_name: frozen.packageName,
      anomaly_score: frozen.anomalyScore,
      threshold: frozen.threshold,
      risk_level: frozen.riskLevel,
      actions_taken: frozen.actionsTaken
    };
    if (frozen.isAnomaly) {
      this.log.warn(payload, 'Anomalous package behavior detected');
    } else {
      this.log.debug(payload, 'Package window scored');
    }

    this.emit(DETECTION_CHANNEL, frozen);
    return stored;
  }

  onDetection(listener: (result: DetectionResult) => void) {
    this.on(DETECTION_CHANNEL, listener);
    return () => {
      this.off(DETECTION_CHANNEL, listener);
    };
  }
}

const detectionBus = new DetectionBus();

export default detectionBus;
export { DetectionBus };
export type { DetectionBusDependencies };
