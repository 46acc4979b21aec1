/**
 * Field Element Helpers
 *
 * Field elements are plain bigints in [0, p - 1]. These helpers move
 * caller integers into that range and check membership.
 */

import type { FieldConfig, FieldElement, IntegerLike } from '../types.js';
import { invalidFieldElementError, invalidMatrixEntryError } from '../errors.js';

/**
 * Convert a caller integer to a bigint
 *
 * @param row - Row index, reported on failure
 * @param column - Column index, reported on failure
 * @throws IdentityTestingError (INVALID_MATRIX_ENTRY) if a number is not a safe integer
 */
export function toBigInt(value: IntegerLike, row = -1, column = -1): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (!Number.isSafeInteger(value)) {
    throw invalidMatrixEntryError(value, row, column);
  }
  return BigInt(value);
}

/**
 * Create a field element from any integer
 *
 * The value is reduced modulo the field modulus; negative values wrap.
 *
 * @example
 * ```typescript
 * createFieldElement(-1, DEFAULT_FIELD); // 1000000006n
 * ```
 */
export function createFieldElement(value: IntegerLike, field: FieldConfig): FieldElement {
  const reduced = toBigInt(value) % field.modulus;
  return reduced < 0n ? reduced + field.modulus : reduced;
}

/**
 * Check whether a value is a reduced element of the field
 */
export function isFieldElement(value: bigint, field: FieldConfig): boolean {
  return value >= 0n && value < field.modulus;
}

/**
 * Check if a field element is zero
 */
export function isZeroFieldElement(element: FieldElement): boolean {
  return element === 0n;
}

/**
 * Throw unless value is a reduced element of the field
 *
 * @throws IdentityTestingError (INVALID_FIELD_ELEMENT)
 */
export function assertFieldElement(
  value: bigint,
  field: FieldConfig,
  row?: number,
  column?: number
): void {
  if (!isFieldElement(value, field)) {
    throw invalidFieldElementError(value.toString(), field.modulus.toString(), row, column);
  }
}
