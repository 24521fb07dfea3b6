import { capitalizeWord } from '../kernel/display-text.js';
import { describeOutcome } from '../kernel/outcome.js';
import { lookupVerb, movesBeatenBy, requireMove } from '../kernel/rule-set.js';
import { missingVerbError } from '../kernel/runtime-error.js';
import type { RuleSet } from '../kernel/types.js';
import type { SessionState } from './session.js';

/** "a, b, or c"; a single item is returned as is. */
export function joinWithOr(items: readonly string[]): string {
  if (items.length <= 1) {
    return items.join('');
  }
  return `${items.slice(0, -1).join(', ')}, or ${items[items.length - 1] ?? ''}`;
}

export const formatMoveList = (ruleSet: RuleSet): string =>
  joinWithOr(ruleSet.moves.map((move) => capitalizeWord(move.display)));

export const formatInputOptions = (ruleSet: RuleSet): string => joinWithOr(ruleSet.moves.map((move) => move.input));

/**
 * One line per move that beats something, e.g.
 * "Rock crushes scissors, crushes lizard". Throws MISSING_VERB for an edge
 * without a verb.
 */
export function formatRelationSummary(ruleSet: RuleSet): readonly string[] {
  const lines: string[] = [];
  for (const move of ruleSet.moves) {
    const losers = movesBeatenBy(ruleSet, move.id);
    if (losers.length === 0) {
      continue;
    }
    const clauses = losers.map((loser) => {
      const verb = lookupVerb(ruleSet.verbs, move.id, loser);
      if (verb === undefined) {
        throw missingVerbError(ruleSet.name, move.id, loser);
      }
      return `${verb} ${requireMove(ruleSet, loser).display}`;
    });
    lines.push(`${capitalizeWord(move.display)} ${clauses.join(', ')}`);
  }
  return lines;
}

export function formatInstructions(ruleSet: RuleSet): string {
  const summary = formatRelationSummary(ruleSet);
  return [
    `Welcome to ${ruleSet.displayName}!`,
    summary.length === 0 ? 'Every pairing is a draw.' : `${summary.join(';\n')}.`,
    `Type ${formatInputOptions(ruleSet)} for ${formatMoveList(ruleSet)}.`,
    'Then, press Enter.',
    'The computer will go simultaneously and a winner shall be decided!',
  ].join('\n');
}

export function formatRetryPrompt(ruleSet: RuleSet): string {
  return `That isn't a move in ${ruleSet.displayName}. Enter ${formatInputOptions(ruleSet)}.`;
}

export function formatRoundResult(state: SessionState): string {
  if (state.stage !== 'resolved' || state.playerMove === null || state.computerMove === null) {
    throw new Error('formatRoundResult requires a resolved round.');
  }
  const { ruleSet } = state;
  const player = requireMove(ruleSet, state.playerMove);
  const computer = requireMove(ruleSet, state.computerMove);
  const narration = describeOutcome(ruleSet, player.id, computer.id);
  const verdict =
    state.outcome === 'win' ? 'The player wins!' : state.outcome === 'loss' ? 'The computer wins!' : "It's a draw!";

  return [
    `The computer chose ${computer.display} and the player chose ${player.display}.`,
    ...(narration === '' ? [] : [narration]),
    verdict,
  ].join('\n');
}
