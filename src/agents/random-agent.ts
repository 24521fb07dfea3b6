import { nextInt } from '../kernel/prng.js';
import type { Agent } from '../kernel/types.js';

export class RandomAgent implements Agent {
  chooseMove(input: Parameters<Agent['chooseMove']>[0]): ReturnType<Agent['chooseMove']> {
    const { moves } = input.ruleSet;
    if (moves.length === 0) {
      throw new Error('RandomAgent.chooseMove called with a variant that has no moves');
    }

    const [index, rng] = nextInt(input.rng, 0, moves.length - 1);
    const move = moves[index];
    if (move === undefined) {
      throw new Error(`RandomAgent.chooseMove selected out-of-range index ${index}`);
    }
    return { move: move.id, rng };
  }
}
