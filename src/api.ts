/**
 * Library configuration
 *
 * Process-wide defaults read by the verifiers when a call does not pass its
 * own options. Randomness is deliberately not part of this state: every
 * verifier takes its RandomSource as an argument.
 */

import type { FieldConfig, FreivaldsArithmetic } from './types.js';
import { invalidConfigError } from './errors.js';
import { DEFAULT_FIELD, isProbablePrime } from './field/config.js';

/**
 * Global library configuration options
 *
 * @example
 * ```typescript
 * configure({
 *   field: createFieldConfig(998_244_353n),
 *   freivaldsArithmetic: 'modular',
 * });
 * ```
 */
export interface IdentityTestingConfig {
  /** Prime field used when a call does not pass one (default: p = 10^9 + 7); the modulus must be prime */
  field?: FieldConfig;
  /** Whether to validate matrix entries (default: true) */
  validateInputs?: boolean;
  /** Arithmetic for Freivalds' products (default: 'integer') */
  freivaldsArithmetic?: FreivaldsArithmetic;
  /** Enable debug logging (default: false) */
  debug?: boolean;
}

const FREIVALDS_ARITHMETIC_MODES: readonly FreivaldsArithmetic[] = ['integer', 'modular'];

function defaultConfig(): Required<IdentityTestingConfig> {
  return {
    field: DEFAULT_FIELD,
    validateInputs: true,
    freivaldsArithmetic: 'integer',
    debug: false,
  };
}

// Global configuration state
let globalConfig: Required<IdentityTestingConfig> = defaultConfig();

/**
 * Configure global library settings
 *
 * @throws IdentityTestingError (INVALID_CONFIG) for a malformed option or a field whose modulus is not prime
 */
export function configure(config: IdentityTestingConfig): void {
  if (
    config.field !== undefined &&
    (typeof config.field.modulus !== 'bigint' || !isProbablePrime(config.field.modulus))
  ) {
    throw invalidConfigError('field', config.field.modulus);
  }
  if (config.validateInputs !== undefined && typeof config.validateInputs !== 'boolean') {
    throw invalidConfigError('validateInputs', config.validateInputs, [true, false]);
  }
  if (
    config.freivaldsArithmetic !== undefined &&
    !FREIVALDS_ARITHMETIC_MODES.includes(config.freivaldsArithmetic)
  ) {
    throw invalidConfigError('freivaldsArithmetic', config.freivaldsArithmetic, [
      ...FREIVALDS_ARITHMETIC_MODES,
    ]);
  }
  if (config.debug !== undefined && typeof config.debug !== 'boolean') {
    throw invalidConfigError('debug', config.debug, [true, false]);
  }

  const next = { ...globalConfig };
  if (config.field !== undefined) next.field = config.field;
  if (config.validateInputs !== undefined) next.validateInputs = config.validateInputs;
  if (config.freivaldsArithmetic !== undefined) next.freivaldsArithmetic = config.freivaldsArithmetic;
  if (config.debug !== undefined) next.debug = config.debug;
  globalConfig = next;
}

/**
 * Get the current library configuration
 */
export function getConfig(): Readonly<Required<IdentityTestingConfig>> {
  return { ...globalConfig };
}

/**
 * Whether the debug flag is set, without copying the configuration
 */
export function isDebugConfigured(): boolean {
  return globalConfig.debug;
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = defaultConfig();
}
