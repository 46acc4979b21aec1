/**
 * Input Validation Module
 *
 * Shape and entry checks shared by the matrix routines and the verifiers.
 * Shape checks always run; entry-range checks can be switched off through
 * the `validateInputs` configuration flag.
 */

import type {
  BipartiteAdjacency,
  FieldConfig,
  FieldMatrix,
  IntegerMatrix,
} from './types.js';
import {
  dimensionMismatchError,
  invalidAdjacencyError,
} from './errors.js';
import { assertFieldElement, toBigInt } from './field/element.js';

/**
 * Check that a matrix is n×n with uniform rows and return n
 *
 * @param operation - Name of the calling operation, used in the error
 * @param name - Name of the argument, used in the error
 * @throws IdentityTestingError (DIMENSION_MISMATCH)
 */
export function validateSquareMatrix(
  matrix: IntegerMatrix,
  operation: string,
  name = 'matrix'
): number {
  const n = matrix.length;
  for (let i = 0; i < n; i++) {
    const row = matrix[i];
    if (row.length !== n) {
      throw dimensionMismatchError(operation, `${name} must be square`, {
        argument: name,
        rows: n,
        row: i,
        rowLength: row.length,
      });
    }
  }
  return n;
}

/**
 * Check that a matrix has uniform rows and return [rows, columns]
 *
 * @throws IdentityTestingError (DIMENSION_MISMATCH)
 */
export function validateRectangularMatrix(
  matrix: IntegerMatrix,
  operation: string,
  name = 'matrix'
): [number, number] {
  const rows = matrix.length;
  const columns = rows === 0 ? 0 : matrix[0].length;
  for (let i = 0; i < rows; i++) {
    if (matrix[i].length !== columns) {
      throw dimensionMismatchError(operation, `${name} has rows of different lengths`, {
        argument: name,
        row: i,
        expected: columns,
        actual: matrix[i].length,
      });
    }
  }
  return [rows, columns];
}

/**
 * Check that every named matrix is n×n for one common n and return n
 *
 * @throws IdentityTestingError (DIMENSION_MISMATCH)
 */
export function validateCommonSquareDimension(
  operation: string,
  matrices: Record<string, IntegerMatrix>
): number {
  let common: number | undefined;
  let first = '';
  for (const [name, matrix] of Object.entries(matrices)) {
    const n = validateSquareMatrix(matrix, operation, name);
    if (common === undefined) {
      common = n;
      first = name;
    } else if (n !== common) {
      throw dimensionMismatchError(operation, `${name} is ${n}×${n} but ${first} is ${common}×${common}`, {
        [first]: common,
        [name]: n,
      });
    }
  }
  return common ?? 0;
}

/**
 * Convert a caller matrix to exact bigint entries
 *
 * @throws IdentityTestingError (INVALID_MATRIX_ENTRY) for a number that is not a safe integer
 */
export function toBigIntMatrix(matrix: IntegerMatrix): bigint[][] {
  return matrix.map((row, i) => row.map((value, j) => toBigInt(value, i, j)));
}

/**
 * Check that every adjacency entry is 0 or 1
 *
 * @throws IdentityTestingError (INVALID_ADJACENCY)
 */
export function validateAdjacency(adjacency: BipartiteAdjacency): void {
  for (let i = 0; i < adjacency.length; i++) {
    const row = adjacency[i];
    for (let j = 0; j < row.length; j++) {
      const value = row[j];
      if (value !== 0 && value !== 1 && value !== 0n && value !== 1n) {
        throw invalidAdjacencyError(value, i, j);
      }
    }
  }
}

/**
 * Check that every entry of a matrix is a reduced field element
 *
 * @throws IdentityTestingError (INVALID_FIELD_ELEMENT)
 */
export function validateFieldMatrix(matrix: FieldMatrix, field: FieldConfig): void {
  for (let i = 0; i < matrix.length; i++) {
    const row = matrix[i];
    for (let j = 0; j < row.length; j++) {
      assertFieldElement(row[j], field, i, j);
    }
  }
}
