/**
 * Freivalds' Matrix Product Verifier
 *
 * Checks A·B = C in O(n²) per trial by comparing A(Br) with Cr for a
 * random r ∈ {0,1}ⁿ. If A·B = C every trial passes. Otherwise (AB − C)r is
 * non-zero for at least half of all r, so a single trial falsely accepts
 * with probability at most 1/2.
 */

import type {
  AmplificationResult,
  FieldConfig,
  FreivaldsArithmetic,
  IntegerMatrix,
  RandomSource,
} from '../types.js';
import { getConfig } from '../api.js';
import { emptyInputError } from '../errors.js';
import { createDebugLogger } from '../debug.js';
import { multiplyUnchecked, toFieldMatrix } from '../matrix/operations.js';
import { sampleBitVector } from '../random/sampler.js';
import { toBigIntMatrix, validateCommonSquareDimension } from '../validation.js';
import { amplify, freivaldsErrorBound, validateTrialCount } from './amplifier.js';

const debugLog = createDebugLogger('freivalds');

/**
 * Options for Freivalds verification
 */
export interface FreivaldsOptions {
  /**
   * `integer` computes exactly; `modular` reduces A, B and C into `field`
   * first. Modular mode also accepts when AB ≡ C (mod p) but AB ≠ C.
   * Default: config.freivaldsArithmetic.
   */
  arithmetic?: FreivaldsArithmetic;
  /**
   * Field for modular arithmetic (default: config.field). Build it with
   * createFieldConfig; the modulus is not re-checked per call.
   */
  field?: FieldConfig;
}

interface PreparedProduct {
  readonly n: number;
  readonly a: bigint[][];
  readonly b: bigint[][];
  readonly c: bigint[][];
  readonly field?: FieldConfig;
}

function prepare(
  a: IntegerMatrix,
  b: IntegerMatrix,
  c: IntegerMatrix,
  operation: string,
  options: FreivaldsOptions
): PreparedProduct {
  const n = validateCommonSquareDimension(operation, { A: a, B: b, C: c });
  if (n === 0) {
    throw emptyInputError(operation);
  }

  const config = getConfig();
  const arithmetic = options.arithmetic ?? config.freivaldsArithmetic;

  if (arithmetic === 'modular') {
    const field = options.field ?? config.field;
    return {
      n,
      a: toFieldMatrix(a, field),
      b: toFieldMatrix(b, field),
      c: toFieldMatrix(c, field),
      field,
    };
  }

  return { n, a: toBigIntMatrix(a), b: toBigIntMatrix(b), c: toBigIntMatrix(c) };
}

function runTrial(product: PreparedProduct, rng: RandomSource): boolean {
  const r = sampleBitVector(rng, product.n);
  const br = multiplyUnchecked(product.b, r, product.field);
  const aBr = multiplyUnchecked(product.a, br, product.field);
  const cr = multiplyUnchecked(product.c, r, product.field);

  for (let i = 0; i < product.n; i++) {
    if (aBr[i] !== cr[i]) {
      debugLog('Trial found a witness', { row: i });
      return false;
    }
  }
  return true;
}

/**
 * One Freivalds trial: does A·B = C?
 *
 * Never returns false when A·B = C. Returns true for A·B ≠ C with
 * probability at most 1/2.
 *
 * @example
 * ```typescript
 * const rng = createSeededRandomSource(42);
 * freivaldsVerify([[1, 2], [3, 4]], [[5, 6], [7, 8]], [[19, 22], [43, 50]], rng); // true
 * ```
 *
 * @throws IdentityTestingError (DIMENSION_MISMATCH) unless A, B, C are n×n for one n
 * @throws IdentityTestingError (EMPTY_INPUT) for 0×0 matrices
 * @throws IdentityTestingError (INVALID_MATRIX_ENTRY) for a number that is not a safe integer
 */
export function freivaldsVerify(
  a: IntegerMatrix,
  b: IntegerMatrix,
  c: IntegerMatrix,
  rng: RandomSource,
  options: FreivaldsOptions = {}
): boolean {
  return runTrial(prepare(a, b, c, 'freivaldsVerify', options), rng);
}

/**
 * k independent Freivalds trials with the outcome details
 *
 * The verdict is true only if every trial passes; checking stops at the
 * first failing trial. A true verdict is wrong with probability at most
 * 2^-k.
 */
export function freivaldsAmplifyDetailed(
  a: IntegerMatrix,
  b: IntegerMatrix,
  c: IntegerMatrix,
  k: number,
  rng: RandomSource,
  options: FreivaldsOptions = {}
): AmplificationResult {
  validateTrialCount(k);
  const product = prepare(a, b, c, 'freivaldsAmplify', options);
  return amplify(() => runTrial(product, rng), k, 'all', freivaldsErrorBound(k));
}

/**
 * k independent Freivalds trials combined by unanimous agreement
 *
 * @see freivaldsAmplifyDetailed
 */
export function freivaldsAmplify(
  a: IntegerMatrix,
  b: IntegerMatrix,
  c: IntegerMatrix,
  k: number,
  rng: RandomSource,
  options: FreivaldsOptions = {}
): boolean {
  return freivaldsAmplifyDetailed(a, b, c, k, rng, options).verdict;
}
