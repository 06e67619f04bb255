/**
 * Scratch Store for Rendermark
 *
 * Provides:
 * - Accumulation: add numbers, concatenate text, append to sequences
 * - Direct assignment: set and get named values
 * - Map aggregation: keyed inserts read back in key order
 */

export * from './scratch-store.js';
export * from './accumulate.js';
export * from './ordering.js';
