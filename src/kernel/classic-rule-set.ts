import { asMoveId } from './branded.js';
import { freezeRuleSet } from './rule-set.js';
import type { RuleSet } from './types.js';

const ROCK = asMoveId('ROCK');
const PAPER = asMoveId('PAPER');
const SCISSORS = asMoveId('SCISSORS');

/** The built-in three-move game every variant starts from by default. */
export const CLASSIC_RULE_SET: RuleSet = freezeRuleSet({
  name: 'RockPaperScissors',
  displayName: 'Rock, Paper, Scissors',
  moves: [
    { id: ROCK, index: 0, display: 'rock', input: 'R' },
    { id: PAPER, index: 1, display: 'paper', input: 'P' },
    { id: SCISSORS, index: 2, display: 'scissors', input: 'S' },
  ],
  hierarchy: new Map([
    [ROCK, new Set([SCISSORS])],
    [PAPER, new Set([ROCK])],
    [SCISSORS, new Set([PAPER])],
  ]),
  verbs: new Map([
    [ROCK, new Map([[SCISSORS, 'crushes']])],
    [PAPER, new Map([[ROCK, 'covers']])],
    [SCISSORS, new Map([[PAPER, 'cuts']])],
  ]),
  inputs: new Map([
    ['R', ROCK],
    ['P', PAPER],
    ['S', SCISSORS],
  ]),
});
