export * from './branded.js';
export * from './classic-rule-set.js';
export * from './diagnostics.js';
export * from './display-text.js';
export * from './outcome.js';
export * from './prng.js';
export * from './rule-set.js';
export * from './runtime-error.js';
export type * from './types.js';
