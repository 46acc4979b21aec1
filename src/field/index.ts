/**
 * Finite Field Arithmetic Module
 *
 * Prime field configuration, element helpers and modular arithmetic used by
 * the matrix routines and the verifiers.
 */

export * from './config.js';
export * from './element.js';
export * from './operations.js';
