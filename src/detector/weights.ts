import fs from 'node:fs';
import path from 'node:path';
import { isRecord } from '../types.js';
import {
  createRandom,
  uniformMatrix,
  xavierBound,
  zeroVector,
  type Matrix,
  type Vector
} from './tensor.js';

export type ScorerDimensions = {
  windowSize: number;
  nFeatures: number;
  kernelSize: number;
  hiddenSize: number;
  numLayers: number;
  headHiddenSize: number;
};

export type ConvParameters = {
  /** [outChannel][inChannel][kernel] */
  weight: number[][][];
  bias: Vector;
};

export type AttentionParameters = {
  fcWeight: Matrix;
  fcBias: Vector;
  /** Length 2 * windowSize: source half, then target half. */
  a: Vector;
};

export type GruLayerParameters = {
  /** Rows ordered reset, update, new: (3H, input). */
  weightIh: Matrix;
  weightHh: Matrix;
  biasIh: Vector;
  biasHh: Vector;
};

export type HeadParameters = {
  fc1Weight: Matrix;
  fc1Bias: Vector;
  fc2Weight: Matrix;
  fc2Bias: Vector;
};

export type ScorerParameters = {
  conv: ConvParameters;
  attention: AttentionParameters;
  gru: GruLayerParameters[];
  head: HeadParameters;
};

export function initializeParameters(dims: ScorerDimensions, seed: number): ScorerParameters {
  const random = createRandom(seed);
  const { windowSize, nFeatures, kernelSize, hiddenSize, numLayers, headHiddenSize } = dims;
  const convFan = nFeatures * kernelSize;
  const convBound = xavierBound(convFan, convFan);

  const gru: GruLayerParameters[] = [];
  for (let layer = 0; layer < numLayers; layer += 1) {
    const inputSize = layer === 0 ? nFeatures : hiddenSize;
    gru.push({
      weightIh: uniformMatrix(3 * hiddenSize, inputSize, xavierBound(inputSize, 3 * hiddenSize), random),
      weightHh: uniformMatrix(3 * hiddenSize, hiddenSize, xavierBound(hiddenSize, 3 * hiddenSize), random),
      biasIh: zeroVector(3 * hiddenSize),
      biasHh: zeroVector(3 * hiddenSize)
    });
  }

  return {
    conv: {
      weight: Array.from({ length: nFeatures }, () =>
        uniformMatrix(nFeatures, kernelSize, convBound, random)
      ),
      bias: zeroVector(nFeatures)
    },
    attention: {
      fcWeight: uniformMatrix(windowSize, windowSize, xavierBound(windowSize, windowSize), random),
      fcBias: zeroVector(windowSize),
      a: column(uniformMatrix(2 * windowSize, 1, xavierBound(1, 2 * windowSize, 1.414), random))
    },
    gru,
    head: {
      fc1Weight: uniformMatrix(headHiddenSize, hiddenSize, xavierBound(hiddenSize, headHiddenSize), random),
      fc1Bias: zeroVector(headHiddenSize),
      fc2Weight: uniformMatrix(1, headHiddenSize, xavierBound(headHiddenSize, 1), random),
      fc2Bias: zeroVector(1)
    }
  };
}

function column(matrix: Matrix): Vector {
  return matrix.map(row => row[0] ?? 0);
}

export function loadScorerParameters(filePath: string, dims: ScorerDimensions): ScorerParameters {
  const contents = fs.readFileSync(path.resolve(filePath), 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse scorer weights: ${message}`);
  }
  return parseScorerParameters(parsed, dims);
}

export function parseScorerParameters(document: unknown, dims: ScorerDimensions): ScorerParameters {
  const { windowSize, nFeatures, kernelSize, hiddenSize, numLayers, headHiddenSize } = dims;
  const root = readObject(document, 'weights');
  const conv = readObject(root.conv, 'weights.conv');
  const attention = readObject(root.attention, 'weights.attention');
  const fc = readObject(attention.fc, 'weights.attention.fc');
  const head = readObject(root.head, 'weights.head');

  if (!Array.isArray(root.gru) || root.gru.length !== numLayers) {
    throw new Error(`weights.gru must list ${numLayers} layers`);
  }

  const gru = root.gru.map((entry: unknown, layer: number): GruLayerParameters => {
    const label = `weights.gru[${layer}]`;
    const value = readObject(entry, label);
    const inputSize = layer === 0 ? nFeatures : hiddenSize;
    return {
      weightIh: readMatrix(value.weightIh, 3 * hiddenSize, inputSize, `${label}.weightIh`),
      weightHh: readMatrix(value.weightHh, 3 * hiddenSize, hiddenSize, `${label}.weightHh`),
      biasIh: readVector(value.biasIh, 3 * hiddenSize, `${label}.biasIh`),
      biasHh: readVector(value.biasHh, 3 * hiddenSize, `${label}.biasHh`)
    };
  });

  return {
    conv: {
      weight: readTensor3(conv.weight, [nFeatures, nFeatures, kernelSize], 'weights.conv.weight'),
      bias: readVector(conv.bias, nFeatures, 'weights.conv.bias')
    },
    attention: {
      fcWeight: readMatrix(fc.weight, windowSize, windowSize, 'weights.attention.fc.weight'),
      fcBias: readVector(fc.bias, windowSize, 'weights.attention.fc.bias'),
      a: readVector(attention.a, 2 * windowSize, 'weights.attention.a')
    },
    gru,
    head: {
      fc1Weight: readMatrix(head.fc1Weight, headHiddenSize, hiddenSize, 'weights.head.fc1Weight'),
      fc1Bias: readVector(head.fc1Bias, headHiddenSize, 'weights.head.fc1Bias'),
      fc2Weight: readMatrix(head.fc2Weight, 1, headHiddenSize, 'weights.head.fc2Weight'),
      fc2Bias: readVector(head.fc2Bias, 1, 'weights.head.fc2Bias')
    }
  };
}

function readObject(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`${label} must be an object`);
  }
  return value;
}

function readVector(value: unknown, length: number, label: string): Vector {
  if (!Array.isArray(value) || value.length !== length) {
    throw new Error(`${label} must be an array of ${length} numbers`);
  }
  return value.map((entry: unknown, index: number) => {
    if (typeof entry !== 'number' || !Number.isFinite(entry)) {
      throw new Error(`${label}[${index}] must be a finite number`);
    }
    return entry;
  });
}

function readMatrix(value: unknown, rows: number, cols: number, label: string): Matrix {
  if (!Array.isArray(value) || value.length !== rows) {
    throw new Error(`${label} must have ${rows} rows`);
  }
  return value.map((row: unknown, index: number) => readVector(row, cols, `${label}[${index}]`));
}

function readTensor3(value: unknown, shape: [number, number, number], label: string): number[][][] {
  const [depth, rows, cols] = shape;
  if (!Array.isArray(value) || value.length !== depth) {
    throw new Error(`${label} must have ${depth} entries`);
  }
  return value.map((slice: unknown, index: number) => readMatrix(slice, rows, cols, `${label}[${index}]`));
}
