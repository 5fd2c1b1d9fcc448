/**
 * Shared types for stocksim
 */

export * from './market.js';
export * from './portfolio.js';
