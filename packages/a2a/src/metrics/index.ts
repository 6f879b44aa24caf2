export * from './metrics.js';
export * from './export.js';
