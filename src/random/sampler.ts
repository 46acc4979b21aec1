/**
 * Random Field Sampler
 *
 * Draws the random values the verifiers need from an injected
 * RandomSource. Every call consumes fresh randomness; nothing is cached
 * between calls or trials.
 */

import type { FieldConfig, FieldElement, RandomSource } from '../types.js';

/**
 * Uniform value in {0, 1}
 */
export function sampleBit(rng: RandomSource): bigint {
  return rng.nextInt(0n, 1n);
}

/**
 * Uniform field element in [0, p - 1]
 */
export function sampleFieldElement(rng: RandomSource, field: FieldConfig): FieldElement {
  return rng.nextInt(0n, field.modulus - 1n);
}

/**
 * Uniform non-zero field element in [1, p - 1]
 */
export function sampleNonZeroElement(rng: RandomSource, field: FieldConfig): FieldElement {
  return rng.nextInt(1n, field.modulus - 1n);
}

/**
 * Vector of n independent uniform bits
 */
export function sampleBitVector(rng: RandomSource, n: number): bigint[] {
  const vector: bigint[] = new Array<bigint>(n);
  for (let i = 0; i < n; i++) {
    vector[i] = sampleBit(rng);
  }
  return vector;
}
