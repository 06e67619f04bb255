/**
 * Render Scopes for Rendermark
 *
 * One scope per rendering pass, one store per owner inside it.
 */

export * from './render-scope.js';
