export * from './tool-catalog.js';
export * from './message.js';
