/**
 * @sluice/types - Shared type definitions for the Sluice execution engine
 *
 * This is the leaf package in the dependency tree.
 * Every other @sluice/* package depends on this one.
 */

export * from './order.js';
export * from './errors.js';
export * from './execution.js';
export * from './metrics.js';
export * from './store.js';
export * from './schema.js';
