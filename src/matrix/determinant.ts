/**
 * Modular Determinant
 *
 * Determinant over Z_p by Gaussian elimination with partial pivoting. All
 * intermediate values stay in [0, p - 1].
 */

import type { FieldConfig, FieldElement, FieldMatrix } from '../types.js';
import { getConfig } from '../api.js';
import { isZeroFieldElement } from '../field/element.js';
import { fieldInv, fieldMul, fieldNeg, fieldSub } from '../field/operations.js';
import { validateFieldMatrix, validateSquareMatrix } from '../validation.js';
import { cloneMatrix } from './operations.js';

/**
 * Options for determinantModP
 */
export interface DeterminantOptions {
  /**
   * Eliminate directly in the given matrix instead of a copy (default:
   * false). The matrix is left in row-echelon form, or partly reduced if
   * elimination stopped at a missing pivot.
   */
  inPlace?: boolean;
  /** Check that every entry lies in [0, p - 1] (default: config.validateInputs) */
  validate?: boolean;
}

/**
 * Eliminate below the diagonal in place and return the determinant
 *
 * For each column k the first row at or below k with a non-zero entry
 * becomes the pivot row. If there is none the determinant is 0. A row
 * exchange negates the running sign. The pivot is non-zero whenever it is
 * inverted.
 */
function eliminate(a: FieldMatrix, field: FieldConfig): FieldElement {
  const n = a.length;
  let det = 1n % field.modulus;

  for (let k = 0; k < n; k++) {
    let pivot = k;
    while (pivot < n && isZeroFieldElement(a[pivot][k])) {
      pivot++;
    }

    if (pivot === n) {
      return 0n;
    }

    if (pivot !== k) {
      const tmp = a[k];
      a[k] = a[pivot];
      a[pivot] = tmp;
      det = fieldNeg(det, field);
    }

    const pivotRow = a[k];
    const pivotInv = fieldInv(pivotRow[k], field);

    for (let i = k + 1; i < n; i++) {
      const row = a[i];
      if (isZeroFieldElement(row[k])) continue;

      const factor = fieldMul(row[k], pivotInv, field);
      for (let j = k; j < n; j++) {
        row[j] = fieldSub(row[j], fieldMul(factor, pivotRow[j], field), field);
      }
    }
  }

  for (let i = 0; i < n; i++) {
    det = fieldMul(det, a[i][i], field);
  }

  return det;
}

/**
 * Determinant of an n×n matrix over Z_p, O(n³)
 *
 * A zero result is exact for the matrix as given, not probabilistic. The
 * determinant of the 0×0 matrix is 1.
 *
 * @example
 * ```typescript
 * determinantModP([[0n, 1n], [1n, 0n]], DEFAULT_FIELD); // 1000000006n (that is, -1)
 * ```
 *
 * @throws IdentityTestingError (DIMENSION_MISMATCH) if the matrix is not square
 * @throws IdentityTestingError (INVALID_FIELD_ELEMENT) if validation is on and an entry is out of range
 */
export function determinantModP(
  matrix: FieldMatrix,
  field: FieldConfig,
  options: DeterminantOptions = {}
): FieldElement {
  const { inPlace = false, validate = getConfig().validateInputs } = options;

  validateSquareMatrix(matrix, 'determinantModP');
  if (validate) {
    validateFieldMatrix(matrix, field);
  }

  return eliminate(inPlace ? matrix : cloneMatrix(matrix), field);
}
