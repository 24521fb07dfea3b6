import type { MoveId } from '../kernel/branded.js';
import { resolveOutcome } from '../kernel/outcome.js';
import { requireMove } from '../kernel/rule-set.js';
import { kernelRuntimeError } from '../kernel/runtime-error.js';
import type { RoundOutcome, RuleSet, SessionStage } from '../kernel/types.js';

export interface SessionState {
  readonly ruleSet: RuleSet;
  readonly stage: SessionStage;
  /** 1-based; also the number of rounds started. */
  readonly round: number;
  readonly record: readonly RoundOutcome[];
  readonly playerMove: MoveId | null;
  readonly computerMove: MoveId | null;
  readonly outcome: RoundOutcome | null;
}

export interface RecordTally {
  readonly win: number;
  readonly loss: number;
  readonly draw: number;
}

export const createSession = (ruleSet: RuleSet): SessionState => ({
  ruleSet,
  stage: 'initial',
  round: 1,
  record: [],
  playerMove: null,
  computerMove: null,
  outcome: null,
});

export const submitMoves = (state: SessionState, playerMove: MoveId, computerMove: MoveId): SessionState => {
  if (state.stage !== 'initial') {
    throw kernelRuntimeError('GAME_SEQUENCE_VIOLATION', 'This round has already begun.', {
      operation: 'submitMoves',
      stage: state.stage,
    });
  }
  return {
    ...state,
    stage: 'moved',
    playerMove: requireMove(state.ruleSet, playerMove).id,
    computerMove: requireMove(state.ruleSet, computerMove).id,
  };
};

export const resolveRound = (state: SessionState): SessionState => {
  if (state.stage !== 'moved' || state.playerMove === null || state.computerMove === null) {
    throw kernelRuntimeError('GAME_SEQUENCE_VIOLATION', "The players haven't gone yet.", {
      operation: 'resolveRound',
      stage: state.stage,
      ...(state.outcome === null ? {} : { outcome: state.outcome }),
    });
  }
  const outcome = resolveOutcome(state.ruleSet, state.playerMove, state.computerMove);
  return {
    ...state,
    stage: 'resolved',
    outcome,
    record: [...state.record, outcome],
  };
};

/** Starts the next round. Also abandons a round whose moves were submitted but not resolved. */
export const resetRound = (state: SessionState): SessionState => {
  if (state.stage === 'initial') {
    throw kernelRuntimeError('GAME_SEQUENCE_VIOLATION', 'There is no round in progress to reset.', {
      operation: 'resetRound',
      stage: state.stage,
    });
  }
  return {
    ...state,
    stage: 'initial',
    round: state.round + 1,
    playerMove: null,
    computerMove: null,
    outcome: null,
  };
};

export const tallyRecord = (record: readonly RoundOutcome[]): RecordTally => ({
  win: record.filter((outcome) => outcome === 'win').length,
  loss: record.filter((outcome) => outcome === 'loss').length,
  draw: record.filter((outcome) => outcome === 'draw').length,
});

export const summarizeRecord = (state: SessionState): string => {
  const tally = tallyRecord(state.record);
  return `Current record: W: ${tally.win} L: ${tally.loss} D: ${tally.draw} Rounds: ${state.round}`;
};

/**
 * Combines the records of two sessions of the same variant into a fresh
 * session waiting for its next round.
 */
export const mergeSessions = (left: SessionState, right: SessionState): SessionState => {
  if (left.ruleSet.name !== right.ruleSet.name) {
    throw kernelRuntimeError('VARIANT_MISMATCH', 'Cannot merge sessions of different variants.', {
      left: left.ruleSet.name,
      right: right.ruleSet.name,
    });
  }
  return {
    ...createSession(left.ruleSet),
    round: left.round + right.round - 1,
    record: [...left.record, ...right.record],
  };
};

/** Orders sessions by number of wins. */
export const compareSessionsByWins = (left: SessionState, right: SessionState): number =>
  tallyRecord(left.record).win - tallyRecord(right.record).win;
