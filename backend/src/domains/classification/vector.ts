/**
 * Vector helpers for embedding similarity
 *
 * @module domains/classification/vector
 */

import { NumericError } from './errors';

/** Fixed-length real vector produced by an embedding provider */
export type Embedding = readonly number[];

export function l2Norm(vector: Embedding): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Scale a vector to unit length.
 *
 * @param name - Identifies the vector in the error message
 * @throws NumericError when the vector is empty, non-finite or has zero norm
 */
export function normalize(vector: Embedding, name: string): number[] {
  if (vector.length === 0) {
    throw new NumericError(`${name} is empty`);
  }
  if (!vector.every(Number.isFinite)) {
    throw new NumericError(`${name} contains non-finite values`);
  }

  const norm = l2Norm(vector);
  if (norm === 0 || !Number.isFinite(norm)) {
    throw new NumericError(`${name} has zero norm`);
  }

  return vector.map((value) => value / norm);
}

export function dot(a: Embedding, b: Embedding): number {
  if (a.length !== b.length) {
    throw new NumericError(`Dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/**
 * Softmax with the maximum subtracted first so large logits cannot overflow
 */
export function softmax(logits: readonly number[]): number[] {
  if (logits.length === 0) {
    return [];
  }

  let max = -Infinity;
  for (const value of logits) {
    if (value > max) max = value;
  }
  const exps = logits.map((value) => Math.exp(value - max));
  const total = exps.reduce((acc, value) => acc + value, 0);
  return exps.map((value) => value / total);
}

/**
 * Index of the largest value; the first one wins on ties
 */
export function argmax(values: readonly number[]): number {
  let best = -1;
  let bestValue = -Infinity;
  values.forEach((value, index) => {
    if (best === -1 || value > bestValue) {
      best = index;
      bestValue = value;
    }
  });
  return best;
}
