import { BUILTIN_VARIANT_NAMES, isBuiltinVariantName, resolveBuiltinVariant } from '../../cnl/builtin-variants.js';
import { createConsoleCompileLogger, SILENT_COMPILE_LOGGER, type CompileLogger } from '../../cnl/compile-logger.js';
import type { CompileResult } from '../../cnl/compiler.js';
import { compileVariantSource } from '../../cnl/load-variant-source.js';
import type { RuleSet } from '../../kernel/types.js';
import { errorMessage, formatCommandError, isMissingFileError } from './error-formatter.js';
import { formatDiagnostics } from './format-diagnostics.js';

export interface CommandOutput {
  log(line: string): void;
  error(line: string): void;
}

export const CONSOLE_OUTPUT: CommandOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/** A built-in variant name, or a path to a variant document. */
export function resolveRuleSetSource(source: string, logger: CompileLogger): CompileResult {
  if (isBuiltinVariantName(source)) {
    return { ruleSet: resolveBuiltinVariant(source), diagnostics: [] };
  }
  return compileVariantSource(source, { logger });
}

/**
 * Compiles `source` for a command, printing its diagnostics. Returns null,
 * after printing why, when there is no rule set to work with.
 */
export function loadRuleSetForCommand(
  source: string,
  options: { readonly verbose: boolean; readonly output: CommandOutput },
): RuleSet | null {
  const { verbose, output } = options;
  let result: CompileResult;
  try {
    result = resolveRuleSetSource(source, verbose ? createConsoleCompileLogger({ verbose }) : SILENT_COMPILE_LOGGER);
  } catch (error) {
    const nextSteps = isMissingFileError(error)
      ? [`Check the path, or use a built-in variant: ${BUILTIN_VARIANT_NAMES.join(', ')}`]
      : [];
    for (const line of formatCommandError(`Could not load ${source}: ${errorMessage(error)}`, nextSteps)) {
      output.error(line);
    }
    return null;
  }

  for (const line of formatDiagnostics(result.diagnostics, { includeInfo: verbose })) {
    output.error(line);
  }
  if (result.ruleSet === null) {
    output.error(`✗ Could not compile ${source}`);
  }
  return result.ruleSet;
}
