/**
 * Core Module for Rendermark Scratch
 *
 * Foundations shared by the store and its host adapters: value model, errors,
 * the read/write guard, configuration and logging.
 */

export * from './types/value.js';
export * from './errors/scratch-error.js';
export * from './concurrency/read-write-guard.js';
export * from './config/config.js';
export * from './logging/logger.js';
