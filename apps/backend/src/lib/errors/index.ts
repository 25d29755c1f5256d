export * from './domain-errors.js';
export * from './error-handler.js';
