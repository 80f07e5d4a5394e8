/**
 * @benchrun/core - Suite model, statuses and shared contracts for benchrun
 *
 * Dependency direction: core → runtime → cli
 */

// Constants
export * from './constants.js';
// Error system
export * from './errors/index.js';
// Logger
export * from './logger.js';
// Configuration schemas
export * from './schemas.js';
// Suite model, statuses, driver and reporter contracts
export * from './types/index.js';
// Result and time utilities
export * from './utils/result.js';
export * from './utils/time.js';
