// Functional core exports
// Pure functions for request execution logic

export * from './attempt.js';
export * from './hooks.js';
export * from './http-utils.js';
export * from './json.js';
export * from './types.js';
