/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { ParleyBaseError } from './ParleyBaseError.js';
export { ParleyRuntimeError } from './ParleyRuntimeError.js';
export { ParleyValidationError } from './ParleyValidationError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { Issue, Severity } from './types.js';
export { ensureOk, zodToIssues } from './result-bridge.js';
