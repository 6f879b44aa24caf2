export * from './schemas.js';
export * from './env.js';
