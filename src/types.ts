/**
 * Core type definitions for randomized-identity-testing
 *
 * This module defines the value types shared by the field arithmetic,
 * matrix routines and the randomized verifiers.
 *
 * @module types
 */

/**
 * Prime field configuration
 *
 * The library assumes, and by default checks at creation time, that the
 * modulus is prime. Inversion relies on Fermat's little theorem.
 *
 * @example
 * ```typescript
 * const field = createFieldConfig(1_000_000_007n);
 * ```
 */
export interface FieldConfig {
  /** The prime modulus p of the field Z_p */
  readonly modulus: bigint;
}

/**
 * Field element: an integer in [0, p - 1]
 *
 * Every arithmetic operation returns a value already reduced into this
 * range.
 */
export type FieldElement = bigint;

/**
 * Integer accepted from callers. `number` values must be safe integers.
 */
export type IntegerLike = number | bigint;

/**
 * Row-major matrix of caller-supplied integers
 */
export type IntegerMatrix = readonly (readonly IntegerLike[])[];

/**
 * Caller-supplied integer vector
 */
export type IntegerVector = readonly IntegerLike[];

/**
 * Row-major matrix of field elements
 */
export type FieldMatrix = FieldElement[][];

/**
 * Vector of field elements
 */
export type FieldVector = FieldElement[];

/**
 * Bipartite graph as an n×n 0/1 matrix
 *
 * Entry (i, j) is 1 iff left vertex i is adjacent to right vertex j.
 */
export type BipartiteAdjacency = IntegerMatrix;

/**
 * Source of uniform random integers
 *
 * Implementations must return statistically independent values across
 * calls. One source should be created and seeded once, then passed to every
 * call that needs randomness.
 */
export interface RandomSource {
  /**
   * Draw a uniform integer from the inclusive range [lo, hi]
   */
  nextInt(lo: bigint, hi: bigint): bigint;
}

/**
 * How a verifier's repeated trials are combined
 *
 * - `all`: the verdict is true only if every trial is true (one-sided
 *   false-accept error, as in Freivalds' check)
 * - `any`: the verdict is true as soon as one trial is true (one-sided
 *   false-reject error, as in the matching test)
 */
export type AmplificationRule = 'all' | 'any';

/**
 * Outcome of an amplified verification
 */
export interface AmplificationResult {
  /** Combined verdict */
  readonly verdict: boolean;
  /** Trials actually run before the verdict was settled */
  readonly trialsRun: number;
  /** Trials requested (k) */
  readonly trialsRequested: number;
  /**
   * Upper bound on the probability that the verdict is wrong, assuming
   * all k trials ran. Zero when the verdict was reached in the direction
   * that cannot err.
   */
  readonly errorBound: number;
}

/**
 * Arithmetic used by Freivalds' matrix–vector products
 *
 * - `integer`: exact bigint arithmetic over the integers
 * - `modular`: every product reduced into the configured prime field
 */
export type FreivaldsArithmetic = 'integer' | 'modular';
