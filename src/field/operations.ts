/**
 * Field Arithmetic Operations
 *
 * Modular addition, subtraction, negation, multiplication, exponentiation
 * and inversion over a single prime field. Values are bigints, so products
 * of two elements never overflow; every result is reduced into [0, p - 1].
 *
 * Operands are expected to already lie in [0, p - 1]. Use
 * createFieldElement to normalize arbitrary integers first.
 */

import type { FieldConfig, FieldElement } from '../types.js';
import { invalidExponentError } from '../errors.js';

/**
 * Field addition: (a + b) mod p
 */
export function fieldAdd(a: FieldElement, b: FieldElement, field: FieldConfig): FieldElement {
  const sum = a + b;
  return sum >= field.modulus ? sum - field.modulus : sum;
}

/**
 * Field subtraction: (a - b + p) mod p
 */
export function fieldSub(a: FieldElement, b: FieldElement, field: FieldConfig): FieldElement {
  const diff = a - b;
  return diff < 0n ? diff + field.modulus : diff;
}

/**
 * Field negation: (p - a) mod p
 *
 * Used to flip the sign of a running determinant on a row exchange.
 */
export function fieldNeg(a: FieldElement, field: FieldConfig): FieldElement {
  return (field.modulus - a) % field.modulus;
}

/**
 * Field multiplication: (a * b) mod p
 */
export function fieldMul(a: FieldElement, b: FieldElement, field: FieldConfig): FieldElement {
  return (a * b) % field.modulus;
}

/**
 * Field exponentiation: base^exp mod p
 *
 * Square-and-multiply, O(log exp) multiplications. The base is reduced
 * modulo p first, so any integer base is accepted.
 *
 * @param base - The base
 * @param exp - The exponent (non-negative)
 * @throws IdentityTestingError (INVALID_EXPONENT) if exp is negative
 */
export function fieldPow(base: bigint, exp: bigint, field: FieldConfig): FieldElement {
  if (exp < 0n) {
    throw invalidExponentError(exp);
  }

  const p = field.modulus;
  let b = ((base % p) + p) % p;
  let e = exp;
  let result = 1n % p;

  while (e > 0n) {
    if (e % 2n === 1n) {
      result = (result * b) % p;
    }
    b = (b * b) % p;
    e /= 2n;
  }

  return result;
}

/**
 * Field inversion: a^(p-2) mod p
 *
 * Valid by Fermat's little theorem when p is prime and a is non-zero.
 * Inverting zero is a precondition violation and is not checked: the
 * result is 0, which is not an inverse. Gaussian elimination never calls
 * this on a zero pivot.
 */
export function fieldInv(a: FieldElement, field: FieldConfig): FieldElement {
  return fieldPow(a, field.modulus - 2n, field);
}
