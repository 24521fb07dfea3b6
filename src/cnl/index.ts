export * from './builtin-variants.js';
export * from './carry-forward.js';
export * from './compile-logger.js';
export * from './compiler-diagnostic-codes.js';
export * from './compiler-diagnostics.js';
export * from './compiler.js';
export * from './enumerate-moves.js';
export * from './load-variant-source.js';
export * from './normalize-declarations.js';
export * from './parser.js';
export * from './relation-graph.js';
export * from './schemas.js';
export type * from './stage-result.js';
export * from './variant-identity.js';
export * from './variant-spec.js';
export * from './verb-table.js';
