/**
 * Tests for matrix products and helpers
 */

import { describe, it, expect } from 'vitest';
import { catchError } from '../test-utils/errors.js';
import { ErrorCode } from '../errors.js';
import { DEFAULT_FIELD, createFieldConfig } from '../field/config.js';
import {
  cloneMatrix,
  identityMatrix,
  matrixMultiply,
  matrixVectorMultiply,
  matrixVectorMultiplyModP,
  toFieldMatrix,
} from './operations.js';

const A = [
  [1, 2, 3],
  [4, 5, 6],
  [7, 8, 9],
];
const B = [
  [9, 8, 7],
  [6, 5, 4],
  [3, 2, 1],
];

describe('matrixVectorMultiply', () => {
  it('should compute the exact product', () => {
    expect(matrixVectorMultiply([[1, 2], [3, 4]], [1, 1])).toEqual([3n, 7n]);
    expect(matrixVectorMultiply(A, [1, 0, -1])).toEqual([-2n, -2n, -2n]);
  });

  it('should not overflow beyond the safe integer range', () => {
    const max = Number.MAX_SAFE_INTEGER;
    const big = BigInt(max);
    expect(matrixVectorMultiply([[max, max]], [max, 1])).toEqual([big * big + big]);
    expect(matrixVectorMultiply([[1n << 60n]], [4n])).toEqual([1n << 62n]);
  });

  it('should reject a vector of the wrong length', () => {
    expect(catchError(() => matrixVectorMultiply(A, [1, 2]))).toMatchObject({
      code: ErrorCode.DIMENSION_MISMATCH,
      details: { columns: 3, vectorLength: 2 },
    });
  });

  it('should reject a number entry that is not a safe integer', () => {
    expect(catchError(() => matrixVectorMultiply([[1, 2 ** 60]], [1, 1]))).toMatchObject({
      code: ErrorCode.INVALID_MATRIX_ENTRY,
      details: { row: 0, column: 1 },
    });
  });

  it('should reject ragged rows', () => {
    expect(catchError(() => matrixVectorMultiply([[1, 2], [3]], [1, 1]))).toMatchObject({
      code: ErrorCode.DIMENSION_MISMATCH,
      details: { row: 1, expected: 2, actual: 1 },
    });
  });
});

describe('matrixVectorMultiplyModP', () => {
  const field13 = createFieldConfig(13n);

  it('should reduce the product into the field', () => {
    // 12·2 + 2·3 = 30 ≡ 4 (mod 13)
    expect(matrixVectorMultiplyModP([[12n, 2n]], [2n, 3n], field13)).toEqual([4n]);
  });

  it('should reject entries outside the field', () => {
    expect(catchError(() => matrixVectorMultiplyModP([[13n]], [1n], field13))).toMatchObject({
      code: ErrorCode.INVALID_FIELD_ELEMENT,
      details: { value: '13', modulus: '13', row: 0, column: 0 },
    });
    expect(catchError(() => matrixVectorMultiplyModP([[1n]], [-1n], field13))).toMatchObject({
      code: ErrorCode.INVALID_FIELD_ELEMENT,
    });
  });
});

describe('matrixMultiply', () => {
  it('should compute the 3×3 product', () => {
    expect(matrixMultiply(A, B)).toEqual([
      [30n, 24n, 18n],
      [84n, 69n, 54n],
      [138n, 114n, 90n],
    ]);
  });

  it('should multiply rectangular matrices', () => {
    expect(matrixMultiply([[1, 2, 3], [4, 5, 6]], [[1], [0], [-1]])).toEqual([[-2n], [-2n]]);
  });

  it('should reject incompatible shapes', () => {
    expect(catchError(() => matrixMultiply([[1, 2]], [[1, 2]]))).toMatchObject({
      code: ErrorCode.DIMENSION_MISMATCH,
      details: { columnsA: 2, rowsB: 1 },
    });
  });

  it('should leave the identity unchanged', () => {
    expect(matrixMultiply(A, identityMatrix(3))).toEqual(A.map((row) => row.map(BigInt)));
  });
});

describe('helpers', () => {
  it('should build the identity matrix', () => {
    expect(identityMatrix(3)).toEqual([
      [1n, 0n, 0n],
      [0n, 1n, 0n],
      [0n, 0n, 1n],
    ]);
    expect(identityMatrix(0)).toEqual([]);
  });

  it('should copy rows in cloneMatrix', () => {
    const original = [[1n, 2n], [3n, 4n]];
    const copy = cloneMatrix(original);
    copy[0][0] = 9n;
    expect(original[0][0]).toBe(1n);
  });

  it('should reduce integers into the field', () => {
    expect(toFieldMatrix([[1, -1], [1_000_000_007, 5n]], DEFAULT_FIELD)).toEqual([
      [1n, 1000000006n],
      [0n, 5n],
    ]);
  });
});
