import { createRng } from '../kernel/prng.js';
import type { Agent, Rng, RuleSet } from '../kernel/types.js';
import { createSession, resetRound, resolveRound, submitMoves, type SessionState } from './session.js';

const AGENT_RNG_MIX = 0x9e3779b97f4a7c15n;

const validateSeed = (seed: number): void => {
  if (!Number.isSafeInteger(seed)) {
    throw new RangeError(`seed must be a safe integer, received ${String(seed)}`);
  }
};

const validateRounds = (rounds: number): void => {
  if (!Number.isSafeInteger(rounds) || rounds < 0) {
    throw new RangeError(`rounds must be a non-negative safe integer, received ${String(rounds)}`);
  }
};

export const createAgentRngs = (seed: number): readonly [Rng, Rng] => [
  createRng(BigInt(seed) ^ AGENT_RNG_MIX),
  createRng(BigInt(seed) ^ (2n * AGENT_RNG_MIX)),
];

/**
 * Plays `rounds` rounds between two agents and returns the session after
 * the last resolved round. The same seed always yields the same record.
 */
export const runRounds = (
  ruleSet: RuleSet,
  seed: number,
  agents: readonly [player: Agent, computer: Agent],
  rounds: number,
): SessionState => {
  validateSeed(seed);
  validateRounds(rounds);

  let [playerRng, computerRng] = createAgentRngs(seed);
  let state = createSession(ruleSet);

  for (let played = 0; played < rounds; played += 1) {
    if (played > 0) {
      state = resetRound(state);
    }
    const player = agents[0].chooseMove({ ruleSet, rng: playerRng });
    const computer = agents[1].chooseMove({ ruleSet, rng: computerRng });
    playerRng = player.rng;
    computerRng = computer.rng;
    state = resolveRound(submitMoves(state, player.move, computer.move));
  }

  return state;
};
