/**
 * Matrix Operations
 *
 * Matrix–vector and matrix–matrix products plus small helpers. Products
 * over the integers use exact bigint arithmetic, so no entry size or
 * dimension can overflow silently; the `ModP` variants reduce every step
 * into the given prime field.
 */

import type {
  FieldConfig,
  FieldMatrix,
  FieldVector,
  IntegerMatrix,
  IntegerVector,
} from '../types.js';
import { dimensionMismatchError } from '../errors.js';
import { createFieldElement, toBigInt } from '../field/element.js';
import { toBigIntMatrix, validateRectangularMatrix, validateFieldMatrix } from '../validation.js';

/**
 * Matrix–vector product without shape checks
 *
 * Reduces modulo p after every multiply-add when a field is given,
 * otherwise computes exactly over the integers. Callers must have checked
 * that every row has `vector.length` entries.
 */
export function multiplyUnchecked(
  matrix: readonly (readonly bigint[])[],
  vector: readonly bigint[],
  field?: FieldConfig
): bigint[] {
  const result: bigint[] = new Array<bigint>(matrix.length);
  for (let i = 0; i < matrix.length; i++) {
    const row = matrix[i];
    let acc = 0n;
    for (let j = 0; j < vector.length; j++) {
      acc += row[j] * vector[j];
      if (field) {
        acc %= field.modulus;
      }
    }
    result[i] = acc;
  }
  return result;
}

function validateVectorLength(operation: string, columns: number, length: number): void {
  if (columns !== length) {
    throw dimensionMismatchError(operation, 'vector length must equal the matrix column count', {
      columns,
      vectorLength: length,
    });
  }
}

/**
 * Exact matrix–vector product over the integers, O(rows × columns)
 *
 * @throws IdentityTestingError (DIMENSION_MISMATCH) if the vector length differs from the column count
 */
export function matrixVectorMultiply(matrix: IntegerMatrix, vector: IntegerVector): bigint[] {
  const [, columns] = validateRectangularMatrix(matrix, 'matrixVectorMultiply');
  validateVectorLength('matrixVectorMultiply', columns, vector.length);
  return multiplyUnchecked(
    toBigIntMatrix(matrix),
    vector.map((value, j) => toBigInt(value, -1, j))
  );
}

/**
 * Matrix–vector product over Z_p
 *
 * @throws IdentityTestingError (DIMENSION_MISMATCH, INVALID_FIELD_ELEMENT)
 */
export function matrixVectorMultiplyModP(
  matrix: FieldMatrix,
  vector: FieldVector,
  field: FieldConfig
): FieldVector {
  const [, columns] = validateRectangularMatrix(matrix, 'matrixVectorMultiplyModP');
  validateVectorLength('matrixVectorMultiplyModP', columns, vector.length);
  validateFieldMatrix(matrix, field);
  validateFieldMatrix([vector], field);
  return multiplyUnchecked(matrix, vector, field);
}

/**
 * Exact matrix product over the integers, O(n³)
 *
 * @throws IdentityTestingError (DIMENSION_MISMATCH) if A's column count differs from B's row count
 */
export function matrixMultiply(a: IntegerMatrix, b: IntegerMatrix): bigint[][] {
  const [rowsA, columnsA] = validateRectangularMatrix(a, 'matrixMultiply', 'A');
  const [rowsB, columnsB] = validateRectangularMatrix(b, 'matrixMultiply', 'B');
  if (columnsA !== rowsB) {
    throw dimensionMismatchError('matrixMultiply', 'A column count must equal B row count', {
      columnsA,
      rowsB,
    });
  }

  const left = toBigIntMatrix(a);
  const right = toBigIntMatrix(b);
  const product: bigint[][] = [];
  for (let i = 0; i < rowsA; i++) {
    const row: bigint[] = new Array<bigint>(columnsB).fill(0n);
    for (let k = 0; k < columnsA; k++) {
      const lik = left[i][k];
      if (lik === 0n) continue;
      for (let j = 0; j < columnsB; j++) {
        row[j] += lik * right[k][j];
      }
    }
    product.push(row);
  }
  return product;
}

/**
 * n×n identity matrix
 */
export function identityMatrix(n: number): bigint[][] {
  const matrix: bigint[][] = [];
  for (let i = 0; i < n; i++) {
    const row = new Array<bigint>(n).fill(0n);
    row[i] = 1n;
    matrix.push(row);
  }
  return matrix;
}

/**
 * Deep copy of a matrix's rows
 */
export function cloneMatrix<T>(matrix: readonly (readonly T[])[]): T[][] {
  return matrix.map((row) => [...row]);
}

/**
 * Reduce every entry of an integer matrix into the field
 *
 * @example
 * ```typescript
 * toFieldMatrix([[1, -1]], DEFAULT_FIELD); // [[1n, 1000000006n]]
 * ```
 */
export function toFieldMatrix(matrix: IntegerMatrix, field: FieldConfig): FieldMatrix {
  return matrix.map((row, i) =>
    row.map((value, j) => createFieldElement(toBigInt(value, i, j), field))
  );
}
