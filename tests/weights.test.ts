import { describe, expect, it } from 'vitest';
import { initializeParameters, parseScorerParameters, type ScorerDimensions } from '../src/detector/weights.js';
import { createRandom, xavierBound } from '../src/detector/tensor.js';
import { toWeightsDocument } from './helpers/weights.js';

const DIMS: ScorerDimensions = {
  windowSize: 3,
  nFeatures: 2,
  kernelSize: 3,
  hiddenSize: 2,
  numLayers: 2,
  headHiddenSize: 2
};

describe('initializeParameters', () => {
  it('WeightsShape builds every tensor with the configured dimensions', () => {
    const parameters = initializeParameters(DIMS, 5);

    expect(parameters.conv.weight).toHaveLength(2);
    expect(parameters.conv.weight[0]).toHaveLength(2);
    expect(parameters.conv.weight[0]?.[0]).toHaveLength(3);
    expect(parameters.attention.fcWeight).toHaveLength(3);
    expect(parameters.attention.a).toHaveLength(6);
    expect(parameters.gru).toHaveLength(2);
    expect(parameters.gru[0]?.weightIh).toHaveLength(6);
    expect(parameters.gru[0]?.weightIh[0]).toHaveLength(2);
    expect(parameters.gru[1]?.weightIh[0]).toHaveLength(2);
    expect(parameters.head.fc1Weight).toHaveLength(2);
    expect(parameters.head.fc2Weight).toEqual([expect.any(Array)]);
    expect(parameters.head.fc2Bias).toEqual([0]);
  });

  it('WeightsSeeded is reproducible for a seed and differs across seeds', () => {
    expect(initializeParameters(DIMS, 11)).toEqual(initializeParameters(DIMS, 11));
    expect(initializeParameters(DIMS, 11)).not.toEqual(initializeParameters(DIMS, 12));
  });

  it('WeightsBounded keeps convolution weights within the Xavier bound', () => {
    const bound = xavierBound(DIMS.nFeatures * DIMS.kernelSize, DIMS.nFeatures * DIMS.kernelSize);
    const values = initializeParameters(DIMS, 3).conv.weight.flat(2);

    expect(values).toHaveLength(12);
    for (const value of values) {
      expect(Math.abs(value)).toBeLessThanOrEqual(bound);
    }
  });
});

describe('createRandom', () => {
  it('produces the same sequence for the same seed within [0, 1)', () => {
    const first = createRandom(42);
    const second = createRandom(42);
    const values = Array.from({ length: 5 }, () => first());

    expect(Array.from({ length: 5 }, () => second())).toEqual(values);
    for (const value of values) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('parseScorerParameters', () => {
  it('accepts a document produced from valid parameters', () => {
    const parameters = initializeParameters(DIMS, 8);
    expect(parseScorerParameters(toWeightsDocument(parameters), DIMS)).toEqual(parameters);
  });

  it('WeightsShapeMismatch names the offending tensor', () => {
    const document = toWeightsDocument(initializeParameters(DIMS, 8));
    document.attention.a = [0, 0, 0];

    expect(() => parseScorerParameters(document, DIMS)).toThrow('weights.attention.a must be an array of 6 numbers');
  });

  it('rejects a layer count that does not match', () => {
    const document = toWeightsDocument(initializeParameters(DIMS, 8));
    document.gru = document.gru.slice(0, 1);

    expect(() => parseScorerParameters(document, DIMS)).toThrow('weights.gru must list 2 layers');
  });

  it('rejects non-numeric entries', () => {
    const document = toWeightsDocument(initializeParameters(DIMS, 8));

    expect(() => parseScorerParameters({ ...document, conv: { ...document.conv, bias: [0, 'x'] } }, DIMS)).toThrow(
      'weights.conv.bias[1] must be a finite number'
    );
  });

  it('rejects a missing section', () => {
    expect(() => parseScorerParameters({ conv: {} }, DIMS)).toThrow('weights.attention must be an object');
  });
});
