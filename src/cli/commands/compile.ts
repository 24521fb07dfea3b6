import { Command } from 'commander';
import { listRelationEdges } from '../../kernel/rule-set.js';
import type { RuleSet } from '../../kernel/types.js';
import { CONSOLE_OUTPUT, loadRuleSetForCommand, type CommandOutput } from '../utils/resolve-rule-set.js';

export type { CommandOutput } from '../utils/resolve-rule-set.js';

export interface CompileCommandOptions {
  readonly verbose?: boolean;
  readonly output?: CommandOutput;
}

/** Returns the process exit code. */
export function runCompileCommand(source: string, options: CompileCommandOptions = {}): number {
  const output = options.output ?? CONSOLE_OUTPUT;
  const ruleSet = loadRuleSetForCommand(source, { verbose: options.verbose ?? false, output });
  if (ruleSet === null) {
    return 1;
  }

  for (const line of describeRuleSet(ruleSet)) {
    output.log(line);
  }
  return 0;
}

export function describeRuleSet(ruleSet: RuleSet): string[] {
  return [
    `Variant: ${ruleSet.name}`,
    `Moves: ${ruleSet.moves.map((move) => `${move.display} [${move.input}]`).join(', ')}`,
    ...listRelationEdges(ruleSet).map(
      (edge) => `  ${edge.winner} ${edge.verb ?? '(no verb)'} ${edge.loser}`,
    ),
  ];
}

export const compileCommand = new Command('compile')
  .description('Compile a variant document and print its moves and relations')
  .argument('<source>', 'variant document path, or a built-in variant name (classic, empty, rpsls)')
  .option('-v, --verbose', 'print compiler debug output and info diagnostics')
  .action((source: string, options: { verbose?: boolean }) => {
    process.exitCode = runCompileCommand(source, { verbose: options.verbose ?? false });
  });
