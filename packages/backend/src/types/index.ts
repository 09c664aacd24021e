export * from './backend.js';
export * from './config.js';
export * from './error.js';
export * from './event.js';
export * from './operation.js';
