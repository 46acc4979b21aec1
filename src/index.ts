/**
 * randomized-identity-testing
 *
 * Randomized algebraic identity testing over a prime field:
 * - Freivalds' O(n²) check of a claimed matrix product
 * - Bipartite perfect-matching detection via a randomized Edmonds matrix
 * - Confidence amplification by independent repetition
 *
 * Every verifier takes an explicit RandomSource. Create one, seed it once,
 * and reuse it.
 *
 * @example
 * ```typescript
 * import {
 *   createSeededRandomSource,
 *   freivaldsAmplify,
 *   hasPerfectMatchingAmplified,
 * } from 'randomized-identity-testing';
 *
 * const rng = createSeededRandomSource(2024);
 *
 * freivaldsAmplify(a, b, c, 10, rng); // false-accept probability ≤ 2^-10
 * hasPerfectMatchingAmplified(adjacency, 5, rng); // false-reject probability ≤ (n/p)^5
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Configuration
// ============================================================================
export {
  configure,
  getConfig,
  resetConfig,
  type IdentityTestingConfig,
} from './api.js';

export { createDebugLogger, isDebugEnabled, type DebugLogger } from './debug.js';

// ============================================================================
// Types
// ============================================================================
export type {
  FieldConfig,
  FieldElement,
  IntegerLike,
  IntegerMatrix,
  IntegerVector,
  FieldMatrix,
  FieldVector,
  BipartiteAdjacency,
  RandomSource,
  AmplificationRule,
  AmplificationResult,
  FreivaldsArithmetic,
} from './types.js';

// ============================================================================
// Errors
// ============================================================================
export {
  ErrorCode,
  IdentityTestingError,
  isIdentityTestingError,
} from './errors.js';

// ============================================================================
// Field arithmetic
// ============================================================================
export {
  DEFAULT_MODULUS,
  DEFAULT_FIELD,
  createFieldConfig,
  isProbablePrime,
  type CreateFieldConfigOptions,
  createFieldElement,
  isFieldElement,
  isZeroFieldElement,
  fieldAdd,
  fieldSub,
  fieldNeg,
  fieldMul,
  fieldPow,
  fieldInv,
} from './field/index.js';

// ============================================================================
// Randomness
// ============================================================================
export {
  uniformBigInt,
  createSeededRandomSource,
  createCryptoRandomSource,
  MAX_CRYPTO_BLOCK_SIZE,
  type SeededRandomSource,
  sampleBit,
  sampleFieldElement,
  sampleNonZeroElement,
  sampleBitVector,
} from './random/index.js';

// ============================================================================
// Matrices
// ============================================================================
export {
  matrixVectorMultiply,
  matrixVectorMultiplyModP,
  matrixMultiply,
  identityMatrix,
  cloneMatrix,
  toFieldMatrix,
  determinantModP,
  type DeterminantOptions,
} from './matrix/index.js';

// ============================================================================
// Verifiers
// ============================================================================
export {
  amplify,
  freivaldsErrorBound,
  matchingErrorBound,
  freivaldsVerify,
  freivaldsAmplify,
  freivaldsAmplifyDetailed,
  type FreivaldsOptions,
  buildRandomizedEdmondsMatrix,
  hasPerfectMatching,
  hasPerfectMatchingAmplified,
  hasPerfectMatchingAmplifiedDetailed,
  type MatchingOptions,
} from './verify/index.js';
