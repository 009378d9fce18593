// ==========================
// Public API Surface
// ==========================
export * from './logger';

// Errors
export { LogConfigError } from './model/Errors';
