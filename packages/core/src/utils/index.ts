export * from './env.js';
export * from './redactor.js';
export * from './safe-stringify.js';
