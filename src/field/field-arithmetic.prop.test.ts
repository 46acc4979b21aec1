/**
 * Property-Based Tests for Field Arithmetic
 *
 * - Results always lie in [0, p - 1]
 * - Ring laws: commutativity, associativity, distributivity
 * - Inverses: add(a, neg(a)) = 0, mul(a, inv(a)) = 1 for non-zero a
 * - Exponentiation agrees with an independent square-and-multiply
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  PROPERTY_TEST_CONFIG,
  arbitraryFieldValue,
  arbitraryNonZeroFieldValue,
  modInverse,
  modPow,
} from '../test-utils/property-test-config.js';
import { catchError } from '../test-utils/errors.js';
import { ErrorCode } from '../errors.js';
import { DEFAULT_FIELD, createFieldConfig } from './config.js';
import { createFieldElement, isFieldElement, isZeroFieldElement } from './element.js';
import { fieldAdd, fieldSub, fieldMul, fieldNeg, fieldInv, fieldPow } from './operations.js';
import type { FieldConfig } from '../types.js';

const FIELDS: [string, FieldConfig][] = [
  ['p = 10^9 + 7', DEFAULT_FIELD],
  ['p = 13', createFieldConfig(13n)],
  ['p = 2^61 - 1', createFieldConfig(2305843009213693951n)],
];

describe.each(FIELDS)('Field arithmetic properties (%s)', (_name, field) => {
  const element = arbitraryFieldValue(field.modulus);
  const nonZero = arbitraryNonZeroFieldValue(field.modulus);

  it('should keep every result in [0, p - 1] (closure)', () => {
    fc.assert(
      fc.property(element, element, (a, b) => {
        return (
          isFieldElement(fieldAdd(a, b, field), field) &&
          isFieldElement(fieldSub(a, b, field), field) &&
          isFieldElement(fieldMul(a, b, field), field) &&
          isFieldElement(fieldNeg(a, field), field)
        );
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy add(a, b) = add(b, a) and mul(a, b) = mul(b, a)', () => {
    fc.assert(
      fc.property(element, element, (a, b) => {
        return (
          fieldAdd(a, b, field) === fieldAdd(b, a, field) &&
          fieldMul(a, b, field) === fieldMul(b, a, field)
        );
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy mul(mul(a, b), c) = mul(a, mul(b, c)) (associativity)', () => {
    fc.assert(
      fc.property(element, element, element, (a, b, c) => {
        const abC = fieldMul(fieldMul(a, b, field), c, field);
        const aBc = fieldMul(a, fieldMul(b, c, field), field);
        return abC === aBc;
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy mul(a, add(b, c)) = add(mul(a, b), mul(a, c)) (distributivity)', () => {
    fc.assert(
      fc.property(element, element, element, (a, b, c) => {
        const left = fieldMul(a, fieldAdd(b, c, field), field);
        const right = fieldAdd(fieldMul(a, b, field), fieldMul(a, c, field), field);
        return left === right;
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy sub(add(a, b), b) = a and add(a, neg(a)) = 0', () => {
    fc.assert(
      fc.property(element, element, (a, b) => {
        return (
          fieldSub(fieldAdd(a, b, field), b, field) === a &&
          fieldAdd(a, fieldNeg(a, field), field) === 0n
        );
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy sub(a, b) = (a - b) mod p', () => {
    fc.assert(
      fc.property(element, element, (a, b) => {
        const expected = (((a - b) % field.modulus) + field.modulus) % field.modulus;
        return fieldSub(a, b, field) === expected;
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy mul(a, inv(a)) = 1 for non-zero a', () => {
    fc.assert(
      fc.property(nonZero, (a) => fieldMul(a, fieldInv(a, field), field) === 1n),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should agree with the extended-Euclid inverse', () => {
    fc.assert(
      fc.property(nonZero, (a) => fieldInv(a, field) === modInverse(a, field.modulus)),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should agree with reference exponentiation for any base', () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: -(field.modulus * 4n), max: field.modulus * 4n }),
        fc.bigInt({ min: 0n, max: 1n << 80n }),
        (base, exp) => fieldPow(base, exp, field) === modPow(base, exp, field.modulus)
      ),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy pow(a, p - 1) = 1 for non-zero a (Fermat)', () => {
    fc.assert(
      fc.property(nonZero, (a) => fieldPow(a, field.modulus - 1n, field) === 1n),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should reduce any integer into the field with createFieldElement', () => {
    fc.assert(
      fc.property(fc.bigInt({ min: -(1n << 100n), max: 1n << 100n }), (value) => {
        const reduced = createFieldElement(value, field);
        return isFieldElement(reduced, field) && (value - reduced) % field.modulus === 0n;
      }),
      PROPERTY_TEST_CONFIG
    );
  });
});

describe('Field arithmetic edge cases', () => {
  const field13 = createFieldConfig(13n);

  it('should reduce a negative base before exponentiation', () => {
    // -2 ≡ 11 (mod 13), 11^3 = 1331 = 102·13 + 5
    expect(fieldPow(-2n, 3n, field13)).toBe(5n);
  });

  it('should return 1 for exponent 0', () => {
    expect(fieldPow(0n, 0n, field13)).toBe(1n);
    expect(fieldPow(7n, 0n, DEFAULT_FIELD)).toBe(1n);
  });

  it('should reject a negative exponent', () => {
    const error = catchError(() => fieldPow(2n, -1n, field13));
    expect(error).toMatchObject({ code: ErrorCode.INVALID_EXPONENT, details: { exponent: '-1' } });
  });

  it('should invert known values', () => {
    expect(fieldInv(2n, field13)).toBe(7n);
    expect(fieldInv(2n, DEFAULT_FIELD)).toBe(500000004n);
  });

  it('should negate zero to zero', () => {
    expect(fieldNeg(0n, field13)).toBe(0n);
    expect(fieldNeg(1n, field13)).toBe(12n);
  });

  it('should recognize zero once a value is reduced', () => {
    expect(isZeroFieldElement(createFieldElement(26n, field13))).toBe(true);
    expect(isZeroFieldElement(fieldSub(5n, 5n, field13))).toBe(true);
    expect(isZeroFieldElement(fieldNeg(12n, field13))).toBe(false);
  });

  it('should wrap negative integers in createFieldElement', () => {
    expect(createFieldElement(-1, DEFAULT_FIELD)).toBe(1000000006n);
    expect(createFieldElement(27n, field13)).toBe(1n);
  });

  it('should reject a number that is not a safe integer', () => {
    expect(catchError(() => createFieldElement(1.5, field13))).toMatchObject({
      code: ErrorCode.INVALID_MATRIX_ENTRY,
    });
    expect(catchError(() => createFieldElement(2 ** 60, field13))).toMatchObject({
      code: ErrorCode.INVALID_MATRIX_ENTRY,
    });
  });
});
