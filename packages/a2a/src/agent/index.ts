export * from './a2a-agent.js';
export * from './state.js';
export * from './sync-bridge.js';
export * from './exchange.js';
