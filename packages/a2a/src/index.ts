/**
 * @parley/a2a - A2A protocol integration layer
 *
 * Drives a remote conversational agent over A2A (JSON-RPC 2.0 over HTTP):
 * discovery, message exchange, message translation, context tracking and protocol metrics.
 */

export * from './types.js';
export * from './error-codes.js';
export * from './errors.js';
export * from './config/index.js';
export * from './agent-card/index.js';
export * from './messages/index.js';
export * from './translation/index.js';
export * from './metrics/index.js';
export * from './client/index.js';
export * from './agent/index.js';
