/**
 * @parley/core - shared infrastructure
 *
 * Error taxonomy, structured logging and environment helpers used by every Parley package.
 */

// Errors
export * from './errors/index.js';

// Logger
export * from './logger/index.js';

// Utilities
export * from './utils/index.js';
