import { capitalizeWord } from '../kernel/display-text.js';
import type { MoveDef } from '../kernel/types.js';

export interface VariantIdentity {
  /** e.g. "RockPaperScissorsLizardSpock" */
  readonly name: string;
  /** e.g. "Rock, Paper, Scissors, Lizard, Spock" */
  readonly displayName: string;
}

export function deriveVariantIdentity(moves: readonly MoveDef[]): VariantIdentity {
  const words = moves.map((move) => capitalizeWord(move.display));
  return {
    name: words.join(''),
    displayName: words.join(', '),
  };
}
