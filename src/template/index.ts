/**
 * Template surface for Rendermark Scratch
 */

export * from './bindings.js';
export * from './schema.js';
