/**
 * @stocksim/shared - Shared types, schemas, and utilities
 *
 * This package contains code shared between the simulator core and the CLI.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './logger.js';
export * from './utils/currency.js';
export * from './utils/load-env.js';
