import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { compileRockPaperScissorsLizardSpock, compileVariantOrThrow, declarationsFromRecord } from '../../src/cnl/index.js';
import { CLASSIC_RULE_SET, EMPTY_RULE_SET, freezeRuleSet, isKernelRuntimeError } from '../../src/kernel/index.js';
import {
  createSession,
  formatInputOptions,
  formatInstructions,
  formatMoveList,
  formatRelationSummary,
  formatRetryPrompt,
  formatRoundResult,
  joinWithOr,
  resolveRound,
  submitMoves,
} from '../../src/sim/index.js';
import { id } from '../helpers/rule-set-helpers.js';

describe('presentation', () => {
  it('joins lists with a final "or"', () => {
    assert.equal(joinWithOr([]), '');
    assert.equal(joinWithOr(['R']), 'R');
    assert.equal(joinWithOr(['R', 'P']), 'R, or P');
    assert.equal(joinWithOr(['R', 'P', 'S']), 'R, P, or S');
  });

  it('lists moves and inputs in enumeration order', () => {
    const paperScissors = compileVariantOrThrow(declarationsFromRecord({ rock: null }));
    assert.equal(formatMoveList(paperScissors), 'Paper, or Scissors');
    assert.equal(formatInputOptions(paperScissors), 'P, or S');
  });

  it('summarizes what each move beats', () => {
    assert.deepEqual(formatRelationSummary(compileRockPaperScissorsLizardSpock()), [
      'Rock crushes scissors, crushes lizard',
      'Paper covers rock, disproves spock',
      'Scissors cuts paper, decapitates lizard',
      'Lizard poisons spock, eats paper',
      'Spock smashes scissors, vaporizes rock',
    ]);
  });

  it('refuses to summarize an edge without a verb', () => {
    const silent = freezeRuleSet({ ...CLASSIC_RULE_SET, verbs: new Map() });
    assert.throws(
      () => formatRelationSummary(silent),
      (error: unknown) => isKernelRuntimeError(error, 'MISSING_VERB') && error.context?.winner === 'ROCK',
    );
  });

  it('writes the welcome instructions', () => {
    assert.equal(
      formatInstructions(CLASSIC_RULE_SET),
      [
        'Welcome to Rock, Paper, Scissors!',
        'Rock crushes scissors;',
        'Paper covers rock;',
        'Scissors cuts paper.',
        'Type R, P, or S for Rock, Paper, or Scissors.',
        'Then, press Enter.',
        'The computer will go simultaneously and a winner shall be decided!',
      ].join('\n'),
    );
    assert.equal(formatInstructions(EMPTY_RULE_SET).split('\n')[1], 'Every pairing is a draw.');
  });

  it('prompts again after an unknown input', () => {
    assert.equal(formatRetryPrompt(CLASSIC_RULE_SET), "That isn't a move in Rock, Paper, Scissors. Enter R, P, or S.");
  });

  it('narrates each kind of round result', () => {
    const play = (player: string, computer: string): string =>
      formatRoundResult(resolveRound(submitMoves(createSession(CLASSIC_RULE_SET), id(player), id(computer))));

    assert.equal(
      play('ROCK', 'SCISSORS'),
      'The computer chose scissors and the player chose rock.\nRock crushes scissors.\nThe player wins!',
    );
    assert.equal(
      play('SCISSORS', 'ROCK'),
      'The computer chose rock and the player chose scissors.\nRock crushes scissors.\nThe computer wins!',
    );
    assert.equal(play('PAPER', 'PAPER'), "The computer chose paper and the player chose paper.\nIt's a draw!");
  });

  it('refuses to narrate an unresolved round', () => {
    assert.throws(() => formatRoundResult(createSession(CLASSIC_RULE_SET)), /requires a resolved round/);
  });
});
