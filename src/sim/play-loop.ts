import { findMoveByInput } from '../kernel/rule-set.js';
import type { Agent, RuleSet } from '../kernel/types.js';
import { formatInstructions, formatRetryPrompt, formatRoundResult } from './present.js';
import { createSession, resetRound, resolveRound, submitMoves, summarizeRecord, type SessionState } from './session.js';
import { createAgentRngs } from './simulator.js';

export interface PlayIO {
  /** Resolves null once input is exhausted. */
  readLine(prompt: string): Promise<string | null>;
  write(text: string): void;
}

export interface PlayLoopOptions {
  readonly io: PlayIO;
  readonly computer: Agent;
  readonly seed: number;
  /** Stop after this many rounds without asking to play again. */
  readonly maxRounds?: number;
}

const YES = 'y';
const NO = 'n';

/**
 * Interactive rounds against `computer` until the player declines another
 * round, input runs out, or `maxRounds` is reached.
 */
export async function playInteractive(ruleSet: RuleSet, options: PlayLoopOptions): Promise<SessionState> {
  const { io, computer } = options;
  let [, computerRng] = createAgentRngs(options.seed);
  let state = createSession(ruleSet);
  let played = 0;

  io.write(formatInstructions(ruleSet));
  while (true) {
    const choice = computer.chooseMove({ ruleSet, rng: computerRng });
    computerRng = choice.rng;

    const playerMove = await readMove(ruleSet, io);
    if (playerMove === null) {
      return state;
    }

    state = resolveRound(submitMoves(state, playerMove, choice.move));
    played += 1;
    io.write(formatRoundResult(state));
    io.write(summarizeRecord(state));

    if (options.maxRounds !== undefined && played >= options.maxRounds) {
      return state;
    }
    if (!(await askPlayAgain(io))) {
      return state;
    }
    state = resetRound(state);
  }
}

async function readMove(ruleSet: RuleSet, io: PlayIO): Promise<SessionState['playerMove']> {
  while (true) {
    const line = await io.readLine('> ');
    if (line === null) {
      return null;
    }
    const move = findMoveByInput(ruleSet, line);
    if (move !== null) {
      return move.id;
    }
    io.write(formatRetryPrompt(ruleSet));
  }
}

async function askPlayAgain(io: PlayIO): Promise<boolean> {
  let prompt = `Play again ${YES}/${NO}? `;
  while (true) {
    const answer = await io.readLine(prompt);
    if (answer === null) {
      return false;
    }
    const normalized = answer.trim().toLowerCase();
    if (normalized === YES || normalized === NO) {
      return normalized === YES;
    }
    prompt = `That wasn't ${YES} or ${NO}, ${YES}/${NO}? `;
  }
}
