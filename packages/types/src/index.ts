/**
 * @recordc/types - Type definitions for the recordc schema compiler
 */

// Schema model
export * from './schema.js';

// Parser handle contract
export * from './parser.js';

// Logging contract
export * from './logging.js';
