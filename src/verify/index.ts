/**
 * Randomized Verifiers
 */

export * from './amplifier.js';
export * from './freivalds.js';
export * from './matching.js';
