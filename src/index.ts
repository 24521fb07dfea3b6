export * from './kernel/index.js';
export * from './cnl/index.js';
export * from './agents/index.js';
export * from './sim/index.js';
