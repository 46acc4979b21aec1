/**
 * Reference implementations used to check the randomized routines
 *
 * Deliberately simple and slow: Laplace expansion for determinants and
 * augmenting paths for bipartite matching.
 */

import type { RandomSource } from '../types.js';

/**
 * Determinant by cofactor expansion along the first row, reduced mod p
 *
 * Exponential time; intended for n ≤ 6.
 */
export function referenceDeterminant(matrix: readonly (readonly bigint[])[], modulus: bigint): bigint {
  const det = laplace(matrix);
  return ((det % modulus) + modulus) % modulus;
}

function laplace(matrix: readonly (readonly bigint[])[]): bigint {
  const n = matrix.length;
  if (n === 0) return 1n;
  if (n === 1) return matrix[0][0];

  let det = 0n;
  for (let col = 0; col < n; col++) {
    const entry = matrix[0][col];
    if (entry === 0n) continue;
    const minor = matrix.slice(1).map((row) => row.filter((_, j) => j !== col));
    const sign = col % 2 === 0 ? 1n : -1n;
    det += sign * entry * laplace(minor);
  }
  return det;
}

/**
 * Size of a maximum matching via Kuhn's augmenting-path algorithm
 */
export function maximumMatchingSize(adjacency: readonly (readonly number[])[]): number {
  const n = adjacency.length;
  const matchOfRight: number[] = new Array<number>(n).fill(-1);

  const tryAugment = (left: number, seen: boolean[]): boolean => {
    for (let right = 0; right < n; right++) {
      if (adjacency[left][right] !== 1 || seen[right]) continue;
      seen[right] = true;
      if (matchOfRight[right] === -1 || tryAugment(matchOfRight[right], seen)) {
        matchOfRight[right] = left;
        return true;
      }
    }
    return false;
  };

  let size = 0;
  for (let left = 0; left < n; left++) {
    if (tryAugment(left, new Array<boolean>(n).fill(false))) {
      size++;
    }
  }
  return size;
}

/**
 * Random source that replays a fixed list of values
 */
export interface ScriptedRandomSource extends RandomSource {
  /** Number of draws made so far */
  readonly draws: number;
  /** Values not yet consumed */
  remaining(): number;
}

/**
 * Create a random source that returns the given values in order
 *
 * Every draw is checked against the requested range, so a test fails
 * loudly if the code under test asks for a different range than expected.
 *
 * @throws Error when a value falls outside the requested range or the script runs out
 */
export function createScriptedRandomSource(values: readonly (bigint | number)[]): ScriptedRandomSource {
  const script = values.map((v) => BigInt(v));
  let index = 0;

  return {
    get draws() {
      return index;
    },
    remaining: () => script.length - index,
    nextInt(lo, hi) {
      if (index >= script.length) {
        throw new Error(`Scripted random source exhausted after ${script.length} draws`);
      }
      const value = script[index];
      if (value < lo || value > hi) {
        throw new Error(`Scripted value ${value} at draw ${index} is outside [${lo}, ${hi}]`);
      }
      index++;
      return value;
    },
  };
}
