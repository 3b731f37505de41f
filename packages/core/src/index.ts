/**
 * batchguard core - attribute verification for batch requests
 *
 * @packageDocumentation
 */

// Errors
export * from './errors.js';

// Grammar parsers
export * from './grammar/index.js';

// Definition tables
export * from './definitions/index.js';

// Configuration
export * from './config/index.js';

// Verification engine
export * from './verify/index.js';
