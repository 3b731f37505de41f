export * from './kinds.js';
export * from './datatypes.js';
export * from './table.js';
export * from './loader.js';
