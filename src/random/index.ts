/**
 * Randomness Module
 */

export * from './source.js';
export * from './sampler.js';
