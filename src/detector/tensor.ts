export type Vector = number[];
export type Matrix = number[][];

export function sigmoid(value: number) {
  if (value >= 0) {
    return 1 / (1 + Math.exp(-value));
  }
  const exp = Math.exp(value);
  return exp / (1 + exp);
}

export function relu(value: number) {
  return value > 0 ? value : 0;
}

export function leakyRelu(value: number, slope: number) {
  return value >= 0 ? value : value * slope;
}

export function dot(a: Vector, b: Vector) {
  let sum = 0;
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    sum += (a[index] ?? 0) * (b[index] ?? 0);
  }
  return sum;
}

/** `weight` is (out, in), as in a linear layer. */
export function linear(weight: Matrix, input: Vector, bias?: Vector): Vector {
  return weight.map((row, index) => dot(row, input) + (bias?.[index] ?? 0));
}

export function transpose(matrix: Matrix): Matrix {
  const rows = matrix.length;
  const cols = matrix[0]?.length ?? 0;
  const result = zeros(cols, rows);
  for (let r = 0; r < rows; r += 1) {
    const row = matrix[r] ?? [];
    for (let c = 0; c < cols; c += 1) {
      const target = result[c];
      if (target) {
        target[r] = row[c] ?? 0;
      }
    }
  }
  return result;
}

export function softmax(values: Vector): Vector {
  if (values.length === 0) {
    return [];
  }
  const max = Math.max(...values);
  const exps = values.map(value => Math.exp(value - max));
  const total = exps.reduce((sum, value) => sum + value, 0);
  return exps.map(value => value / total);
}

export function zeros(rows: number, cols: number): Matrix {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
}

export function zeroVector(length: number): Vector {
  return new Array<number>(length).fill(0);
}

export type Random = () => number;

/** mulberry32: small seeded PRNG returning values in [0, 1). */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniformMatrix(rows: number, cols: number, bound: number, random: Random): Matrix {
  return Array.from({ length: rows }, () =>
    Array.from({ length: cols }, () => (random() * 2 - 1) * bound)
  );
}

export function xavierBound(fanIn: number, fanOut: number, gain = 1) {
  return gain * Math.sqrt(6 / (fanIn + fanOut));
}
