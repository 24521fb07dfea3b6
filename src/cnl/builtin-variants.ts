import { CLASSIC_RULE_SET } from '../kernel/classic-rule-set.js';
import { EMPTY_RULE_SET } from '../kernel/rule-set.js';
import type { RuleSet } from '../kernel/types.js';
import { compileVariantOrThrow, type CompileOptions } from './compiler.js';
import { declarationsFromRecord, type VariantDeclarations } from './variant-spec.js';

/**
 * Rock, Paper, Scissors, Lizard, Spock, layered on the classic game. The
 * classic moves are re-declared empty so they keep their leading positions.
 */
export const RPSLS_DECLARATIONS: VariantDeclarations = declarationsFromRecord({
  ROCK: {},
  PAPER: {},
  SCISSORS: { inputString: 'SC' },
  LIZARD: {
    beats: [
      ['spock', 'poisons'],
      ['paper', 'eats'],
    ],
    losesTo: [
      ['scissors', 'decapitates'],
      ['rock', 'crushes'],
    ],
  },
  SPOCK: {
    inputString: 'SP',
    beats: [
      ['scissors', 'smashes'],
      ['rock', 'vaporizes'],
    ],
    losesTo: [['paper', 'disproves']],
  },
});

export function compileRockPaperScissorsLizardSpock(options?: Omit<CompileOptions, 'previous'>): RuleSet {
  return compileVariantOrThrow(RPSLS_DECLARATIONS, { ...options, previous: CLASSIC_RULE_SET });
}

export const BUILTIN_VARIANT_NAMES = ['classic', 'empty', 'rpsls'] as const;

export type BuiltinVariantName = (typeof BUILTIN_VARIANT_NAMES)[number];

export const isBuiltinVariantName = (value: string): value is BuiltinVariantName =>
  BUILTIN_VARIANT_NAMES.some((name) => name === value);

export function resolveBuiltinVariant(name: BuiltinVariantName): RuleSet {
  switch (name) {
    case 'classic':
      return CLASSIC_RULE_SET;
    case 'empty':
      return EMPTY_RULE_SET;
    case 'rpsls':
      return compileRockPaperScissorsLizardSpock();
  }
}
