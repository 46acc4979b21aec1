/**
 * Property-based testing configuration and utilities
 *
 * Shared fast-check configuration, arbitraries and independent reference
 * arithmetic for the property tests.
 */

import * as fc from 'fast-check';

/**
 * Standard configuration for property-based tests
 * - 100 iterations per property
 * - Seed logging for reproducibility
 * - Shrinking enabled for minimal failing examples
 */
export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for properties whose bodies run many trials
 */
export const FAST_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 25,
  verbose: false,
  seed: Date.now(),
};

/**
 * Small primes, where zero pivots and row swaps are frequent
 */
export const SMALL_PRIMES = [2n, 3n, 5n, 7n, 11n, 13n] as const;

/**
 * Arbitrary generator for a small prime modulus
 */
export function arbitrarySmallPrime(): fc.Arbitrary<bigint> {
  return fc.constantFrom(...SMALL_PRIMES);
}

/**
 * Arbitrary generator for field elements within a modulus
 * Generates random bigints in range [0, modulus)
 */
export function arbitraryFieldValue(modulus: bigint): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 0n, max: modulus - 1n });
}

/**
 * Arbitrary generator for non-zero field elements
 * Generates random bigints in range [1, modulus)
 */
export function arbitraryNonZeroFieldValue(modulus: bigint): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max: modulus - 1n });
}

/**
 * Arbitrary generator for n×n matrices built from an entry arbitrary
 */
export function arbitrarySquareMatrix<T>(
  entry: fc.Arbitrary<T>,
  minSize: number = 1,
  maxSize: number = 5
): fc.Arbitrary<T[][]> {
  return fc
    .integer({ min: minSize, max: maxSize })
    .chain((n) =>
      fc.array(fc.array(entry, { minLength: n, maxLength: n }), { minLength: n, maxLength: n })
    );
}

/**
 * Arbitrary generator for pairs of n×n integer matrices of the same size
 */
export function arbitraryIntegerMatrixPair(
  maxSize: number = 5,
  magnitude: number = 50
): fc.Arbitrary<[number[][], number[][]]> {
  return fc.integer({ min: 1, max: maxSize }).chain((n) => {
    const entry = fc.integer({ min: -magnitude, max: magnitude });
    const matrix = fc.array(fc.array(entry, { minLength: n, maxLength: n }), {
      minLength: n,
      maxLength: n,
    });
    return fc.tuple(matrix, matrix);
  });
}

/**
 * Arbitrary generator for bipartite adjacency matrices
 */
export function arbitraryAdjacency(
  minSize: number = 1,
  maxSize: number = 6
): fc.Arbitrary<number[][]> {
  return arbitrarySquareMatrix(fc.constantFrom(0, 1), minSize, maxSize);
}

/**
 * Arbitrary generator for random-source seeds
 */
export function arbitrarySeed(): fc.Arbitrary<number> {
  return fc.integer({ min: 0, max: 0xffffffff });
}

/**
 * Modular exponentiation using square-and-multiply
 */
export function modPow(base: bigint, exp: bigint, modulus: bigint): bigint {
  if (modulus === 1n) return 0n;
  let result = 1n;
  base = ((base % modulus) + modulus) % modulus;
  while (exp > 0n) {
    if (exp % 2n === 1n) {
      result = (result * base) % modulus;
    }
    exp = exp / 2n;
    base = (base * base) % modulus;
  }
  return result;
}

/**
 * Modular inverse using extended Euclidean algorithm
 * Returns the modular inverse of a mod modulus, or throws if gcd(a, modulus) != 1
 */
export function modInverse(a: bigint, modulus: bigint): bigint {
  if (a === 0n) {
    throw new Error('Cannot compute inverse of zero');
  }

  let [oldR, r] = [a % modulus, modulus];
  let [oldS, s] = [1n, 0n];

  while (r !== 0n) {
    const quotient = oldR / r;
    [oldR, r] = [r, oldR - quotient * r];
    [oldS, s] = [s, oldS - quotient * s];
  }

  if (oldR !== 1n) {
    throw new Error(`No modular inverse exists: gcd(${a}, ${modulus}) = ${oldR}`);
  }

  return ((oldS % modulus) + modulus) % modulus;
}
