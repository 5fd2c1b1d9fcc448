export * from './portfolio.schema.js';
