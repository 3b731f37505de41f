export * from './outcome.js';
export * from './at-list.js';
export * from './depend.js';
export * from './path.js';
export * from './range.js';
export * from './names.js';
export * from './stage.js';
export * from './select.js';
