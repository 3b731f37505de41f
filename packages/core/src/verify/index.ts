export * from './context.js';
export * from './results.js';
export * from './reporter.js';
export * from './host-resolver.js';
export * from './resource.js';
export * from './scalar.js';
export * from './lists.js';
export * from './acl.js';
export * from './select.js';
export * from './preempt-targets.js';
export * from './dispatch.js';
export * from './registry.js';
