/**
 * Sparsify Module
 *
 * Exports the sparsify contract, the virt-sparsify executor, and
 * verbose formatting helpers.
 */

export * from './types.js';
export * from './executor.js';
export * from './verbose.js';
