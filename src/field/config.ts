/**
 * Prime Field Configuration
 *
 * Defines the default prime field and the factory used to build field
 * configurations from a caller-supplied modulus.
 */

import type { FieldConfig } from '../types.js';
import { invalidModulusError } from '../errors.js';
import { fieldMul, fieldPow } from './operations.js';

/**
 * Default prime modulus, 10^9 + 7
 */
export const DEFAULT_MODULUS = 1_000_000_007n;

/**
 * Miller–Rabin witnesses. Using every prime up to 41 makes the test
 * deterministic for all n < 3.3 × 10^24.
 */
const MILLER_RABIN_BASES = [2n, 3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n, 41n];

/**
 * Check whether n is prime using Miller–Rabin
 *
 * Exact below 3.3 × 10^24; above that a composite passes with probability
 * at most 4^-13.
 */
export function isProbablePrime(n: bigint): boolean {
  if (n < 2n) {
    return false;
  }

  for (const p of MILLER_RABIN_BASES) {
    if (n === p) {
      return true;
    }
    if (n % p === 0n) {
      return false;
    }
  }

  // n - 1 = d * 2^s with d odd
  let d = n - 1n;
  let s = 0;
  while (d % 2n === 0n) {
    d /= 2n;
    s++;
  }

  const ring: FieldConfig = { modulus: n };

  for (const a of MILLER_RABIN_BASES) {
    let x = fieldPow(a, d, ring);
    if (x === 1n || x === n - 1n) {
      continue;
    }

    let witnessed = true;
    for (let r = 1; r < s; r++) {
      x = fieldMul(x, x, ring);
      if (x === n - 1n) {
        witnessed = false;
        break;
      }
    }

    if (witnessed) {
      return false;
    }
  }

  return true;
}

/**
 * Options for building a field configuration
 */
export interface CreateFieldConfigOptions {
  /** Check that the modulus is prime (default: true) */
  validate?: boolean;
}

/**
 * Build a prime field configuration
 *
 * @param modulus - The prime modulus
 * @throws IdentityTestingError (INVALID_MODULUS) if validation is on and the
 *   modulus is below 2 or composite
 */
export function createFieldConfig(
  modulus: bigint | number,
  options: CreateFieldConfigOptions = {}
): FieldConfig {
  const { validate = true } = options;

  if (typeof modulus === 'number' && !Number.isSafeInteger(modulus)) {
    throw invalidModulusError(modulus, 'modulus must be a safe integer');
  }

  const p = BigInt(modulus);

  if (p < 2n) {
    throw invalidModulusError(p, 'modulus must be at least 2');
  }

  if (validate && !isProbablePrime(p)) {
    throw invalidModulusError(p, 'modulus must be prime');
  }

  return Object.freeze({ modulus: p });
}

/**
 * Default field configuration, Z_p with p = 10^9 + 7
 */
export const DEFAULT_FIELD: FieldConfig = createFieldConfig(DEFAULT_MODULUS);
