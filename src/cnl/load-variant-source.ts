import { readFileSync, statSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import type { Diagnostic } from '../kernel/diagnostics.js';
import type { RuleSet } from '../kernel/types.js';
import { isBuiltinVariantName, resolveBuiltinVariant } from './builtin-variants.js';
import { compileVariant, type CompileOptions, type CompileResult } from './compiler.js';
import { parseVariantDocument } from './parser.js';

export interface LoadedVariantSource {
  readonly text: string;
  readonly sourcePath: string;
}

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

export function loadVariantSource(entryPath: string): LoadedVariantSource {
  const sourcePath = resolve(entryPath);
  if (!statSync(sourcePath).isFile()) {
    throw new Error(`Variant source must be a file: ${entryPath}`);
  }
  if (!YAML_EXTENSIONS.has(extname(sourcePath).toLowerCase())) {
    throw new Error(`Variant source must be a .yaml or .yml file: ${entryPath}`);
  }
  return { text: readFileSync(sourcePath, 'utf8'), sourcePath };
}

/**
 * Loads a variant document and compiles it on top of whatever it extends:
 * a built-in variant by name, or another document by path relative to this
 * one. Documents without `extends` build on the classic game.
 */
export function compileVariantSource(
  entryPath: string,
  options: Omit<CompileOptions, 'previous'> = {},
): CompileResult {
  return compileWithAncestors(resolve(entryPath), options, []);
}

function compileWithAncestors(
  sourcePath: string,
  options: Omit<CompileOptions, 'previous'>,
  stack: readonly string[],
): CompileResult {
  if (stack.includes(sourcePath)) {
    return failed({
      code: 'RPS_LOADER_EXTENDS_CYCLE',
      path: 'document.extends',
      severity: 'error',
      message: `Variant documents extend each other in a cycle: ${[...stack, sourcePath].join(' -> ')}`,
      sourcePath,
    });
  }

  const source = loadVariantSource(sourcePath);
  const parsed = parseVariantDocument(source.text, { sourcePath: source.sourcePath });
  if (parsed.document === null) {
    return { ruleSet: null, diagnostics: parsed.diagnostics };
  }

  const base = parsed.document.extends ?? 'classic';
  let previous: RuleSet;
  if (isBuiltinVariantName(base)) {
    previous = resolveBuiltinVariant(base);
  } else {
    const ancestor = compileWithAncestors(resolve(dirname(sourcePath), base), options, [...stack, sourcePath]);
    if (ancestor.ruleSet === null) {
      return ancestor;
    }
    previous = ancestor.ruleSet;
  }

  const compiled = compileVariant(parsed.document.declarations, { ...options, previous });
  return {
    ruleSet: compiled.ruleSet,
    diagnostics: [
      ...parsed.diagnostics,
      ...compiled.diagnostics.map((diagnostic) => ({ ...diagnostic, sourcePath: diagnostic.sourcePath ?? sourcePath })),
    ],
  };
}

const failed = (diagnostic: Diagnostic): CompileResult => ({ ruleSet: null, diagnostics: [diagnostic] });
