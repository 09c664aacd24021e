export * from './error.js';
export * from './message.js';
export * from './session.js';
