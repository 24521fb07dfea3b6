import { toMoveId } from '../kernel/branded.js';
import type { Agent } from '../kernel/types.js';
import { FixedAgent } from './fixed-agent.js';
import { RandomAgent } from './random-agent.js';

/** `random`, or `fixed:<move name>`. */
export function createAgent(descriptor: string): Agent {
  const normalized = descriptor.trim();
  if (normalized === 'random') {
    return new RandomAgent();
  }
  if (normalized.startsWith('fixed:')) {
    const move = normalized.slice('fixed:'.length).trim();
    if (move.length === 0) {
      throw new Error(`Agent descriptor "${descriptor}" names no move.`);
    }
    return new FixedAgent(toMoveId(move));
  }
  throw new Error(`Unknown agent descriptor "${descriptor}". Expected "random" or "fixed:<move>".`);
}
