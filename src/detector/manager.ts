import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { DetectionResult, TelemetrySample, Window } from '../types.js';
import type { MitigationHandler } from '../mitigation/handler.js';
import type { AnomalyScorer } from './model.js';
import type { FeatureWindower } from './windower.js';

export type AlertSink = (result: DetectionResult) => unknown;

export interface DetectionManagerDependencies {
  scorer: Pick<AnomalyScorer, 'score'>;
  windower: Pick<FeatureWindower, 'buildWindows'>;
  mitigation: Pick<MitigationHandler, 'handleThreat'>;
  alert?: AlertSink;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => Date;
}

/**
 * Scores windows and gates remediation on `score > threshold`. Scores at or
 * below the threshold never reach the mitigation handler.
 */
export class DetectionManager {
  private readonly threshold: number;
  private readonly scorer: Pick<AnomalyScorer, 'score'>;
  private readonly windower: Pick<FeatureWindower, 'buildWindows'>;
  private readonly mitigation: Pick<MitigationHandler, 'handleThreat'>;
  private readonly alert: AlertSink | null;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => Date;

  constructor(config: { threshold: number }, dependencies: DetectionManagerDependencies) {
    this.threshold = config.threshold;
    this.scorer = dependencies.scorer;
    this.windower = dependencies.windower;
    this.mitigation = dependencies.mitigation;
    this.alert = dependencies.alert ?? null;
    this.log = (dependencies.log ?? logger).child({ component: 'detector' });
    this.metrics = dependencies.metrics ?? metrics;
    this.now = dependencies.now ?? (() => new Date());
  }

  async processWindow(packageName: string, window: Window, timestamp?: Date): Promise<DetectionResult> {
    const anomalyScore = this.scorer.score(window);
    const detectedAt = (timestamp ?? this.now()).toISOString();

    let result: DetectionResult;
    if (anomalyScore > this.threshold) {
      const outcome = await this.metrics.time('detector.mitigation', () =>
        this.mitigation.handleThreat(packageName, anomalyScore, detectedAt)
      );
      result = {
        timestamp: detectedAt,
        packageName,
        anomalyScore,
        threshold: this.threshold,
        isAnomaly: true,
        riskLevel: outcome.riskLevel,
        actionsTaken: outcome.actionsTaken
      };
    } else {
      result = {
        timestamp: detectedAt,
        packageName,
        anomalyScore,
        threshold: this.threshold,
        isAnomaly: false,
        riskLevel: 'none',
        actionsTaken: []
      };
    }

    this.forward(result);
    return result;
  }

  /** Windows each package's stream separately and processes windows one at a time, in order. */
  async processSamples(samples: readonly TelemetrySample[]): Promise<DetectionResult[]> {
    const byPackage = new Map<string, TelemetrySample[]>();
    for (const sample of samples) {
      const bucket = byPackage.get(sample.packageName) ?? [];
      bucket.push(sample);
      byPackage.set(sample.packageName, bucket);
    }

    const results: DetectionResult[] = [];
    for (const [packageName, packageSamples] of byPackage) {
      const { sequences, timestamps } = this.windower.buildWindows(packageSamples);
      if (sequences.length === 0) {
        this.log.debug({ packageName, samples: packageSamples.length }, 'Not enough samples for a full window');
        continue;
      }
      for (let index = 0; index < sequences.length; index += 1) {
        const window = sequences[index];
        if (window) {
          results.push(await this.processWindow(packageName, window, timestamps[index]));
        }
      }
    }
    return results;
  }

  private forward(result: DetectionResult) {
    if (!this.alert) {
      return;
    }
    const report = (error: unknown) => {
      this.log.error({ err: error, packageName: result.packageName }, 'Alert sink rejected detection result');
    };
    try {
      const delivery = this.alert(result);
      if (delivery instanceof Promise) {
        void delivery.catch(report);
      }
    } catch (error) {
      report(error);
    }
  }
}
