/**
 * Error handling for randomized-identity-testing
 *
 * Verifiers return plain booleans for randomized outcomes. Only structural
 * problems with the input (dimensions, entries, parameters) are raised, as
 * IdentityTestingError instances carrying an ErrorCode and details.
 */

/**
 * Error codes for identity-testing operations
 */
export enum ErrorCode {
  // Input validation errors
  /** Matrices are ragged, non-square, or disagree in size */
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  /** Input is empty when non-empty input is required */
  EMPTY_INPUT = 'EMPTY_INPUT',
  /** A numeric matrix entry is not a safe integer */
  INVALID_MATRIX_ENTRY = 'INVALID_MATRIX_ENTRY',
  /** An adjacency entry is neither 0 nor 1 */
  INVALID_ADJACENCY = 'INVALID_ADJACENCY',
  /** Field element lies outside [0, p - 1] */
  INVALID_FIELD_ELEMENT = 'INVALID_FIELD_ELEMENT',

  // Arithmetic errors
  /** Modulus is below 2 or not prime */
  INVALID_MODULUS = 'INVALID_MODULUS',
  /** Exponent is negative */
  INVALID_EXPONENT = 'INVALID_EXPONENT',

  // Randomness and amplification errors
  /** Requested random range is empty */
  INVALID_RANGE = 'INVALID_RANGE',
  /** Trial count is not a positive integer */
  INVALID_TRIAL_COUNT = 'INVALID_TRIAL_COUNT',

  // Configuration errors
  /** Invalid configuration option provided */
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Base error class for identity-testing errors
 *
 * @example
 * ```typescript
 * try {
 *   freivaldsVerify(a, b, c, rng);
 * } catch (error) {
 *   if (error instanceof IdentityTestingError && error.code === ErrorCode.DIMENSION_MISMATCH) {
 *     console.error('Bad dimensions:', error.details);
 *   }
 * }
 * ```
 */
export class IdentityTestingError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param details - Optional details object with relevant context
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IdentityTestingError';
    Object.setPrototypeOf(this, IdentityTestingError.prototype);
  }

  /**
   * Create a string representation of the error including details
   */
  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.details) {
      str += ` (${JSON.stringify(this.details)})`;
    }
    return str;
  }

  /**
   * Convert error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is an IdentityTestingError
 */
export function isIdentityTestingError(error: unknown): error is IdentityTestingError {
  return error instanceof IdentityTestingError;
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an error for matrices whose shape does not fit the operation
 *
 * @param operation - Name of the operation
 * @param reason - What was wrong with the shape
 * @param details - Sizes involved
 */
export function dimensionMismatchError(
  operation: string,
  reason: string,
  details: Record<string, unknown> = {}
): IdentityTestingError {
  return new IdentityTestingError(
    `${operation}: ${reason}`,
    ErrorCode.DIMENSION_MISMATCH,
    { operation, ...details }
  );
}

/**
 * Create an error for empty input
 */
export function emptyInputError(operation: string): IdentityTestingError {
  return new IdentityTestingError(
    `${operation} requires non-empty input`,
    ErrorCode.EMPTY_INPUT,
    { operation }
  );
}

/**
 * Create an error for a numeric entry that cannot be used as an exact integer
 */
export function invalidMatrixEntryError(
  value: unknown,
  row: number,
  column: number
): IdentityTestingError {
  return new IdentityTestingError(
    'Matrix entries must be safe integers or bigints',
    ErrorCode.INVALID_MATRIX_ENTRY,
    { value: String(value), row, column }
  );
}

/**
 * Create an error for an adjacency entry other than 0 or 1
 */
export function invalidAdjacencyError(
  value: unknown,
  row: number,
  column: number
): IdentityTestingError {
  return new IdentityTestingError(
    'Adjacency entries must be 0 or 1',
    ErrorCode.INVALID_ADJACENCY,
    { value: String(value), row, column }
  );
}

/**
 * Create an error for a value outside the field range
 *
 * @param value - The invalid value as string
 * @param modulus - The field modulus as string
 */
export function invalidFieldElementError(
  value: string,
  modulus: string,
  row?: number,
  column?: number
): IdentityTestingError {
  const details: Record<string, unknown> = { value, modulus };
  if (row !== undefined) {
    details['row'] = row;
  }
  if (column !== undefined) {
    details['column'] = column;
  }
  return new IdentityTestingError(
    'Field element must lie in [0, p - 1]',
    ErrorCode.INVALID_FIELD_ELEMENT,
    details
  );
}

/**
 * Create an error for an unusable modulus
 */
export function invalidModulusError(
  modulus: bigint | number,
  reason: string
): IdentityTestingError {
  return new IdentityTestingError(
    `Invalid field modulus: ${reason}`,
    ErrorCode.INVALID_MODULUS,
    { modulus: String(modulus) }
  );
}

/**
 * Create an error for a negative exponent
 */
export function invalidExponentError(exponent: bigint): IdentityTestingError {
  return new IdentityTestingError(
    'Exponent must be non-negative',
    ErrorCode.INVALID_EXPONENT,
    { exponent: exponent.toString() }
  );
}

/**
 * Create an error for an empty random range
 */
export function invalidRangeError(lo: bigint, hi: bigint): IdentityTestingError {
  return new IdentityTestingError(
    `Random range [${lo}, ${hi}] is empty`,
    ErrorCode.INVALID_RANGE,
    { lo: lo.toString(), hi: hi.toString() }
  );
}

/**
 * Create an error for a trial count that is not a positive integer
 */
export function invalidTrialCountError(trials: unknown): IdentityTestingError {
  return new IdentityTestingError(
    'Trial count must be a positive integer',
    ErrorCode.INVALID_TRIAL_COUNT,
    { trials: String(trials) }
  );
}

/**
 * Create an error for invalid configuration
 *
 * @param option - Name of the invalid option
 * @param value - The invalid value
 * @param validValues - Optional list of valid values
 */
export function invalidConfigError(
  option: string,
  value: unknown,
  validValues?: unknown[]
): IdentityTestingError {
  const details: Record<string, unknown> = { option, value: String(value) };
  if (validValues) {
    details['validValues'] = validValues;
  }
  return new IdentityTestingError(
    `Invalid configuration option '${option}': ${String(value)}`,
    ErrorCode.INVALID_CONFIG,
    details
  );
}
