import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { RandomAgent } from '../../../src/agents/random-agent.js';
import { compileRockPaperScissorsLizardSpock } from '../../../src/cnl/index.js';
import { CLASSIC_RULE_SET, createRng, EMPTY_RULE_SET, nextInt } from '../../../src/kernel/index.js';

describe('RandomAgent', () => {
  it('throws descriptive error when the variant has no moves', () => {
    const agent = new RandomAgent();
    assert.throws(
      () => agent.chooseMove({ ruleSet: EMPTY_RULE_SET, rng: createRng(1n) }),
      /RandomAgent\.chooseMove called with a variant that has no moves/,
    );
  });

  it('picks the move at the index nextInt draws and returns the advanced rng', () => {
    const rng = createRng(42n);
    const [expectedIndex, expectedRng] = nextInt(rng, 0, CLASSIC_RULE_SET.moves.length - 1);
    const result = new RandomAgent().chooseMove({ ruleSet: CLASSIC_RULE_SET, rng });

    assert.equal(result.move, CLASSIC_RULE_SET.moves[expectedIndex]?.id);
    assert.deepEqual(result.rng, expectedRng);
  });

  it('eventually picks every move of the variant', () => {
    const ruleSet = compileRockPaperScissorsLizardSpock();
    const agent = new RandomAgent();
    const seen = new Set<string>();
    let rng = createRng(3n);
    for (let draw = 0; draw < 200; draw += 1) {
      const result = agent.chooseMove({ ruleSet, rng });
      seen.add(result.move);
      rng = result.rng;
    }
    assert.deepEqual([...seen].sort(), ['LIZARD', 'PAPER', 'ROCK', 'SCISSORS', 'SPOCK']);
  });
});
