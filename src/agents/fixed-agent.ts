import type { MoveId } from '../kernel/branded.js';
import { requireMove } from '../kernel/rule-set.js';
import type { Agent } from '../kernel/types.js';

/** Always plays the same move. */
export class FixedAgent implements Agent {
  constructor(private readonly move: MoveId) {}

  chooseMove(input: Parameters<Agent['chooseMove']>[0]): ReturnType<Agent['chooseMove']> {
    return { move: requireMove(input.ruleSet, this.move).id, rng: input.rng };
  }
}
