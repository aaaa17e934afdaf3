/**
 * Bond analytics utilities
 *
 * Pure, synchronous calculation functions. None of them log.
 */

export * from './errors/index.js';
export * from './bond/index.js';
export * from './cash-flow/index.js';
export * from './pricing/index.js';
export * from './risk/index.js';
