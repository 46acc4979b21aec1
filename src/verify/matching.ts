/**
 * Bipartite Perfect Matching Test
 *
 * Substitutes independent random non-zero field elements for the edge
 * variables of the Edmonds matrix and checks the determinant mod p. The
 * symbolic determinant is identically zero iff the graph has no perfect
 * matching, so:
 *
 * - no perfect matching: every trial returns false, deterministically
 * - perfect matching: a trial returns false with probability at most n/p
 *   (Schwartz–Zippel, total degree n)
 */

import type {
  AmplificationResult,
  BipartiteAdjacency,
  FieldConfig,
  FieldMatrix,
  RandomSource,
} from '../types.js';
import { getConfig } from '../api.js';
import { createDebugLogger } from '../debug.js';
import { toBigInt } from '../field/element.js';
import { determinantModP } from '../matrix/determinant.js';
import { sampleNonZeroElement } from '../random/sampler.js';
import { validateAdjacency, validateSquareMatrix } from '../validation.js';
import { amplify, matchingErrorBound, validateTrialCount } from './amplifier.js';

const debugLog = createDebugLogger('matching');

/**
 * Options for the matching test
 */
export interface MatchingOptions {
  /**
   * Prime field to evaluate in (default: config.field). Build it with
   * createFieldConfig; the modulus is not re-checked per call.
   */
  field?: FieldConfig;
  /**
   * Reject adjacency entries other than 0 and 1 (default:
   * config.validateInputs). When off, every non-zero entry is an edge.
   */
  validate?: boolean;
}

function resolveOptions(
  adjacency: BipartiteAdjacency,
  operation: string,
  options: MatchingOptions
): FieldConfig {
  const config = getConfig();
  validateSquareMatrix(adjacency, operation, 'adjacency');
  if (options.validate ?? config.validateInputs) {
    validateAdjacency(adjacency);
  }
  return options.field ?? config.field;
}

/**
 * Build a randomized Edmonds matrix
 *
 * Each edge entry becomes a fresh uniform element of [1, p - 1], drawn in
 * row-major order; each non-edge entry is 0.
 */
export function buildRandomizedEdmondsMatrix(
  adjacency: BipartiteAdjacency,
  rng: RandomSource,
  field: FieldConfig
): FieldMatrix {
  return adjacency.map((row, i) =>
    row.map((value, j) => (toBigInt(value, i, j) !== 0n ? sampleNonZeroElement(rng, field) : 0n))
  );
}

function runTrial(adjacency: BipartiteAdjacency, rng: RandomSource, field: FieldConfig): boolean {
  const edmonds = buildRandomizedEdmondsMatrix(adjacency, rng, field);
  const det = determinantModP(edmonds, field, { inPlace: true, validate: false });
  if (debugLog.enabled()) {
    debugLog('Trial determinant', { n: adjacency.length, nonZero: det !== 0n });
  }
  return det !== 0n;
}

/**
 * One trial: does the bipartite graph have a perfect matching?
 *
 * A true answer is always correct. A false answer is wrong with
 * probability at most n/p. The empty graph (n = 0) has the empty matching.
 *
 * @example
 * ```typescript
 * const rng = createSeededRandomSource(7);
 * hasPerfectMatching([[1, 1, 0], [0, 0, 1], [0, 1, 1]], rng); // true with probability ≥ 1 - 3/p
 * ```
 *
 * @throws IdentityTestingError (DIMENSION_MISMATCH) if the adjacency matrix is not square
 * @throws IdentityTestingError (INVALID_ADJACENCY) if validation is on and an entry is not 0 or 1
 */
export function hasPerfectMatching(
  adjacency: BipartiteAdjacency,
  rng: RandomSource,
  options: MatchingOptions = {}
): boolean {
  const field = resolveOptions(adjacency, 'hasPerfectMatching', options);
  return runTrial(adjacency, rng, field);
}

/**
 * k independent matching trials with the outcome details
 *
 * The verdict is true as soon as one trial finds a non-zero determinant; it
 * is false only after k zero determinants, which happens for a graph with a
 * perfect matching with probability at most (n/p)^k.
 */
export function hasPerfectMatchingAmplifiedDetailed(
  adjacency: BipartiteAdjacency,
  k: number,
  rng: RandomSource,
  options: MatchingOptions = {}
): AmplificationResult {
  validateTrialCount(k);
  const field = resolveOptions(adjacency, 'hasPerfectMatchingAmplified', options);
  return amplify(
    () => runTrial(adjacency, rng, field),
    k,
    'any',
    matchingErrorBound(adjacency.length, field.modulus, k)
  );
}

/**
 * k independent matching trials, true if any trial succeeds
 *
 * @see hasPerfectMatchingAmplifiedDetailed
 */
export function hasPerfectMatchingAmplified(
  adjacency: BipartiteAdjacency,
  k: number,
  rng: RandomSource,
  options: MatchingOptions = {}
): boolean {
  return hasPerfectMatchingAmplifiedDetailed(adjacency, k, rng, options).verdict;
}
