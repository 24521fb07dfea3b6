import type { MoveId } from './branded.js';
import { capitalizeWord } from './display-text.js';
import { beats, lookupVerb, requireMove } from './rule-set.js';
import { missingVerbError } from './runtime-error.js';
import type { RoundOutcome, RuleSet } from './types.js';

/**
 * Outcome from the player's point of view. A pair with no edge in either
 * direction is a draw.
 */
export const resolveOutcome = (ruleSet: RuleSet, player: MoveId, opponent: MoveId): RoundOutcome => {
  requireMove(ruleSet, player);
  requireMove(ruleSet, opponent);
  if (player === opponent) {
    return 'draw';
  }
  if (beats(ruleSet, player, opponent)) {
    return 'win';
  }
  if (beats(ruleSet, opponent, player)) {
    return 'loss';
  }
  return 'draw';
};

/**
 * Narrates a decided pair, e.g. "Rock crushes scissors.". Draws narrate as
 * the empty string. Throws MISSING_VERB when the deciding edge has no verb.
 */
export const describeOutcome = (ruleSet: RuleSet, player: MoveId, opponent: MoveId): string => {
  const outcome = resolveOutcome(ruleSet, player, opponent);
  if (outcome === 'draw') {
    return '';
  }
  const [winner, loser] = outcome === 'win' ? [player, opponent] : [opponent, player];
  return describeEdge(ruleSet, winner, loser);
};

export const describeEdge = (ruleSet: RuleSet, winner: MoveId, loser: MoveId): string => {
  const verb = lookupVerb(ruleSet.verbs, winner, loser);
  if (verb === undefined) {
    throw missingVerbError(ruleSet.name, winner, loser);
  }
  const winnerMove = requireMove(ruleSet, winner);
  const loserMove = requireMove(ruleSet, loser);
  return `${capitalizeWord(winnerMove.display)} ${verb} ${loserMove.display}.`;
};
