import { hasErrorDiagnostics, type Diagnostic } from '../kernel/diagnostics.js';
import { CLASSIC_RULE_SET } from '../kernel/classic-rule-set.js';
import { freezeRuleSet } from '../kernel/rule-set.js';
import type { RuleSet } from '../kernel/types.js';
import { carryForwardLegacyMoves } from './carry-forward.js';
import { SILENT_COMPILE_LOGGER, type CompileLogger } from './compile-logger.js';
import { finalizeDiagnostics } from './compiler-diagnostics.js';
import { enumerateMoves } from './enumerate-moves.js';
import { normalizeDeclarations } from './normalize-declarations.js';
import { buildRelationGraph } from './relation-graph.js';
import { deriveVariantIdentity } from './variant-identity.js';
import type { VariantDeclarations } from './variant-spec.js';
import { buildVerbTable, retainedVerbs } from './verb-table.js';

export interface CompileLimits {
  readonly maxMoves: number;
  readonly maxDiagnosticCount: number;
}

export interface CompileOptions {
  /** Rule set the declarations extend. Defaults to the classic game. */
  readonly previous?: RuleSet;
  readonly limits?: Partial<CompileLimits>;
  readonly logger?: CompileLogger;
}

export interface CompileResult {
  readonly ruleSet: RuleSet | null;
  readonly diagnostics: readonly Diagnostic[];
}

export const DEFAULT_COMPILE_LIMITS: CompileLimits = {
  maxMoves: 64,
  maxDiagnosticCount: 500,
};

export function resolveCompileLimits(overrides?: Partial<CompileLimits>): CompileLimits {
  return {
    maxMoves: resolveLimit(overrides?.maxMoves, DEFAULT_COMPILE_LIMITS.maxMoves, 'maxMoves'),
    maxDiagnosticCount: resolveLimit(
      overrides?.maxDiagnosticCount,
      DEFAULT_COMPILE_LIMITS.maxDiagnosticCount,
      'maxDiagnosticCount',
    ),
  };
}

export class VariantCompileError extends Error {
  readonly diagnostics: readonly Diagnostic[];

  constructor(diagnostics: readonly Diagnostic[]) {
    const errors = diagnostics.filter((diagnostic) => diagnostic.severity === 'error');
    super(
      `Variant compilation failed with ${errors.length} error(s): ${errors
        .map((diagnostic) => `${diagnostic.code} at ${diagnostic.path}`)
        .join('; ')}`,
    );
    this.name = 'VariantCompileError';
    this.diagnostics = diagnostics;
  }
}

/**
 * Compiles declarations on top of `options.previous` into a new rule set.
 * `ruleSet` is null whenever an error diagnostic is present; a partially
 * built variant is never returned.
 */
export function compileVariant(declarations: VariantDeclarations, options?: CompileOptions): CompileResult {
  const limits = resolveCompileLimits(options?.limits);
  const previous = options?.previous ?? CLASSIC_RULE_SET;
  const logger = options?.logger ?? SILENT_COMPILE_LOGGER;
  const diagnostics: Diagnostic[] = [];

  const normalized = normalizeDeclarations(
    declarations,
    previous.moves.map((move) => move.id),
  );
  diagnostics.push(...normalized.diagnostics);
  logger.debug('normalized declarations', {
    declared: [...normalized.value.specs.keys()],
    retained: normalized.value.retained,
  });

  const completed = carryForwardLegacyMoves(normalized.value, previous);
  diagnostics.push(...completed.diagnostics);
  logger.debug('carried legacy moves forward', { moves: [...completed.value.keys()] });

  const enumeration = enumerateMoves(completed.value, limits.maxMoves);
  diagnostics.push(...enumeration.diagnostics);
  logger.debug('enumerated moves', { count: enumeration.value.moves.length });

  const graph = buildRelationGraph(enumeration.value, completed.value);
  diagnostics.push(...graph.diagnostics);

  const moveOrder = new Map<string, number>(enumeration.value.moves.map((move) => [move.id, move.index]));
  const finalized = finalizeDiagnostics(diagnostics, limits.maxDiagnosticCount, moveOrder);
  for (const diagnostic of finalized) {
    if (diagnostic.severity === 'warning') {
      logger.warn(diagnostic.message, { code: diagnostic.code, path: diagnostic.path });
    }
  }

  if (graph.value === null || hasErrorDiagnostics(diagnostics)) {
    logger.debug('compilation failed', {
      errors: finalized.filter((diagnostic) => diagnostic.severity === 'error').length,
    });
    return { ruleSet: null, diagnostics: finalized };
  }

  const identity = deriveVariantIdentity(enumeration.value.moves);
  const ruleSet = freezeRuleSet({
    name: identity.name,
    displayName: identity.displayName,
    moves: enumeration.value.moves,
    hierarchy: graph.value,
    verbs: buildVerbTable(
      enumeration.value.moves,
      completed.value,
      retainedVerbs(previous.verbs, normalized.value.retained),
    ),
    inputs: enumeration.value.inputs,
  });
  logger.debug('compiled variant', { name: ruleSet.name });

  return { ruleSet, diagnostics: finalized };
}

export function compileVariantOrThrow(declarations: VariantDeclarations, options?: CompileOptions): RuleSet {
  const result = compileVariant(declarations, options);
  if (result.ruleSet === null) {
    throw new VariantCompileError(result.diagnostics);
  }
  return result.ruleSet;
}

function resolveLimit(candidate: number | undefined, fallback: number, name: keyof CompileLimits): number {
  if (candidate === undefined) {
    return fallback;
  }
  if (!Number.isInteger(candidate) || candidate < 1) {
    throw new Error(`${name} must be an integer >= 1.`);
  }
  return candidate;
}
