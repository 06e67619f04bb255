/**
 * Rendermark Scratch
 *
 * Per-render scratch store: a mutable context templates share during one
 * rendering pass.
 *
 * @packageDocumentation
 */

// Core module exports
export * from './core/index.js';

// Scratch store exports
export * from './scratch/index.js';

// Render scope exports
export * from './scope/index.js';

// Template binding exports
export * from './template/index.js';

// Version
export const VERSION = '0.1.0';
