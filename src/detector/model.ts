import { performance } from 'node:perf_hooks';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { DetectorConfig } from '../config/index.js';
import type { Window } from '../types.js';
import {
  dot,
  leakyRelu,
  linear,
  relu,
  sigmoid,
  softmax,
  transpose,
  zeroVector,
  type Matrix,
  type Vector
} from './tensor.js';
import {
  initializeParameters,
  loadScorerParameters,
  type AttentionParameters,
  type ConvParameters,
  type GruLayerParameters,
  type HeadParameters,
  type ScorerDimensions,
  type ScorerParameters
} from './weights.js';

export type ParameterSource = 'file' | 'seeded';

export interface AnomalyScorerDependencies {
  log?: Logger;
  metrics?: MetricsRegistry;
}

/**
 * Scores one window of feature vectors with the convolution, feature
 * attention, stacked GRU and feed-forward head pipeline. Dropout is an
 * identity at inference, so scoring is deterministic for fixed parameters.
 */
export class AnomalyScorer {
  readonly dimensions: ScorerDimensions;
  readonly parameterSource: ParameterSource;
  private readonly parameters: ScorerParameters;
  private readonly alpha: number;
  private readonly metrics: MetricsRegistry;

  constructor(
    dimensions: ScorerDimensions,
    parameters: ScorerParameters,
    options: { alpha?: number; parameterSource?: ParameterSource; metrics?: MetricsRegistry } = {}
  ) {
    if (dimensions.kernelSize % 2 === 0) {
      throw new RangeError(`kernelSize must be odd, received ${dimensions.kernelSize}`);
    }
    this.dimensions = { ...dimensions };
    this.parameters = parameters;
    this.alpha = options.alpha ?? 0.2;
    this.parameterSource = options.parameterSource ?? 'file';
    this.metrics = options.metrics ?? metrics;
  }

  static fromConfig(config: DetectorConfig, dependencies: AnomalyScorerDependencies = {}): AnomalyScorer {
    const log = dependencies.log ?? logger;
    const dimensions = dimensionsFromConfig(config);
    const options = { alpha: config.alpha, metrics: dependencies.metrics };

    if (config.modelPath) {
      try {
        const parameters = loadScorerParameters(config.modelPath, dimensions);
        log.info({ modelPath: config.modelPath }, 'Loaded anomaly scorer weights');
        return new AnomalyScorer(dimensions, parameters, { ...options, parameterSource: 'file' });
      } catch (error) {
        log.warn(
          { err: error, modelPath: config.modelPath },
          'Anomaly scorer weights unavailable, falling back to seeded parameters'
        );
      }
    } else {
      log.warn({ seed: config.seed }, 'No scorer weights configured, using seeded parameters');
    }

    return new AnomalyScorer(dimensions, initializeParameters(dimensions, config.seed), {
      ...options,
      parameterSource: 'seeded'
    });
  }

  score(window: Window): number {
    this.assertShape(window);
    const start = performance.now();
    const { conv, attention, gru, head } = this.parameters;

    const channels = transpose(window);
    const smoothed = convolve(channels, conv);
    const attended = featureAttention(smoothed, attention, this.alpha);
    const hidden = encodeSequence(transpose(attended), gru);
    const score = scoringHead(hidden, head);

    this.metrics.observeLatency('detector.score', performance.now() - start);
    return score;
  }

  scoreBatch(windows: readonly Window[]): number[] {
    return windows.map(window => this.score(window));
  }

  private assertShape(window: Window) {
    const { windowSize, nFeatures } = this.dimensions;
    if (window.length !== windowSize) {
      throw new RangeError(`Window must contain ${windowSize} rows, received ${window.length}`);
    }
    window.forEach((row, index) => {
      if (row.length !== nFeatures) {
        throw new RangeError(`Window row ${index} must contain ${nFeatures} features, received ${row.length}`);
      }
    });
  }
}

export function dimensionsFromConfig(config: DetectorConfig): ScorerDimensions {
  return {
    windowSize: config.windowSize,
    nFeatures: config.features.length,
    kernelSize: config.kernelSize,
    hiddenSize: config.hiddenSize,
    numLayers: config.numLayers,
    headHiddenSize: config.headHiddenSize
  };
}

/** Zero "same" padding convolution over channel-major input, followed by ReLU. */
export function convolve(channels: Matrix, conv: ConvParameters): Matrix {
  const width = channels[0]?.length ?? 0;
  return conv.weight.map((filters, outChannel) => {
    const output = zeroVector(width);
    for (let t = 0; t < width; t += 1) {
      let sum = conv.bias[outChannel] ?? 0;
      filters.forEach((kernel, inChannel) => {
        const series = channels[inChannel] ?? [];
        const pad = (kernel.length - 1) / 2;
        kernel.forEach((weight, k) => {
          const source = t + k - pad;
          if (source >= 0 && source < width) {
            sum += weight * (series[source] ?? 0);
          }
        });
      });
      output[t] = relu(sum);
    }
    return output;
  });
}

/**
 * Channel-major in and out. Logit (i, j) combines channel i's series with the
 * projection of channel j's series; rows are softmax-normalised over j.
 */
export function featureAttention(channels: Matrix, params: AttentionParameters, alpha: number): Matrix {
  const width = channels[0]?.length ?? 0;
  const sourceWeights = params.a.slice(0, width);
  const targetWeights = params.a.slice(width, 2 * width);
  const sourceTerms = channels.map(series => dot(sourceWeights, series));
  const targetTerms = channels.map(series => dot(targetWeights, linear(params.fcWeight, series, params.fcBias)));

  return sourceTerms.map(source => {
    const weights = softmax(targetTerms.map(target => leakyRelu(source + target, alpha)));
    const mixed = zeroVector(width);
    weights.forEach((weight, j) => {
      const series = channels[j] ?? [];
      for (let t = 0; t < width; t += 1) {
        mixed[t] = (mixed[t] ?? 0) + weight * (series[t] ?? 0);
      }
    });
    return mixed.map(sigmoid);
  });
}

export function gruStep(input: Vector, hidden: Vector, layer: GruLayerParameters): Vector {
  const size = hidden.length;
  const gi = linear(layer.weightIh, input, layer.biasIh);
  const gh = linear(layer.weightHh, hidden, layer.biasHh);
  return hidden.map((previous, index) => {
    const reset = sigmoid((gi[index] ?? 0) + (gh[index] ?? 0));
    const update = sigmoid((gi[size + index] ?? 0) + (gh[size + index] ?? 0));
    const candidate = Math.tanh((gi[2 * size + index] ?? 0) + reset * (gh[2 * size + index] ?? 0));
    return (1 - update) * candidate + update * previous;
  });
}

/** Runs the stacked GRU over time-major input and returns the top layer's final state. */
export function encodeSequence(sequence: Matrix, layers: GruLayerParameters[]): Vector {
  let inputs = sequence;
  let hidden: Vector = [];
  for (const layer of layers) {
    hidden = zeroVector(layer.weightHh[0]?.length ?? 0);
    const outputs: Matrix = [];
    for (const input of inputs) {
      hidden = gruStep(input, hidden, layer);
      outputs.push(hidden);
    }
    inputs = outputs;
  }
  return hidden;
}

export function scoringHead(hidden: Vector, head: HeadParameters): number {
  const activated = linear(head.fc1Weight, hidden, head.fc1Bias).map(relu);
  const [logit] = linear(head.fc2Weight, activated, head.fc2Bias);
  return sigmoid(logit ?? 0);
}
