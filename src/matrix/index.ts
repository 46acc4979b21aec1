/**
 * Matrix Module
 */

export * from './operations.js';
export * from './determinant.js';
