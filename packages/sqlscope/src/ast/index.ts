/**
 * AST model, rendering and node pools
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './render.js';
export * from './pool.js';
