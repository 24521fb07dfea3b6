import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { compileVariant, relation, REMOVED, type RelationEntry, type VariantDeclarations } from '../../../src/cnl/index.js';
import { capitalizeWord, CLASSIC_RULE_SET, createRng, EMPTY_RULE_SET, nextInt, type Rng, type RuleSet } from '../../../src/kernel/index.js';
import { hasAsymmetricRelations, sortedEdgeSignatures, verbSignatures } from '../../helpers/rule-set-helpers.js';

const NAME_POOL = ['rock', 'paper', 'scissors', 'lizard', 'spock', 'well', 'fire'] as const;
const VERB_POOL = ['beats', 'crushes', 'smothers'] as const;
const SEEDS = Array.from({ length: 48 }, (_, index) => BigInt(index + 1));

const pick = <T>(rng: Rng, items: readonly T[]): readonly [T, Rng] => {
  const [index, next] = nextInt(rng, 0, items.length - 1);
  const item = items[index];
  if (item === undefined) {
    throw new RangeError(`index ${index} out of range`);
  }
  return [item, next];
};

const randomEntries = (rng: Rng): readonly [readonly RelationEntry[] | undefined, Rng] => {
  const [count, afterCount] = nextInt(rng, -1, 2);
  if (count < 0) {
    return [undefined, afterCount];
  }
  const entries: RelationEntry[] = [];
  let cursor = afterCount;
  for (let index = 0; index < count; index += 1) {
    const [target, afterTarget] = pick(cursor, NAME_POOL);
    const [verb, afterVerb] = pick(afterTarget, VERB_POOL);
    entries.push([target, verb]);
    cursor = afterVerb;
  }
  return [entries, cursor];
};

const randomDeclarations = (seed: bigint): VariantDeclarations => {
  let [count, rng] = nextInt(createRng(seed), 0, 4);
  const declarations: [string, ReturnType<typeof relation> | typeof REMOVED][] = [];
  for (let index = 0; index < count; index += 1) {
    const [name, afterName] = pick(rng, NAME_POOL);
    const [kind, afterKind] = nextInt(afterName, 0, 4);
    if (kind === 0) {
      declarations.push([name, REMOVED]);
      rng = afterKind;
      continue;
    }
    const [beats, afterBeats] = randomEntries(afterKind);
    const [losesTo, afterLosesTo] = randomEntries(afterBeats);
    declarations.push([
      name,
      relation({
        ...(beats === undefined ? {} : { beats }),
        ...(losesTo === undefined ? {} : { losesTo }),
      }),
    ]);
    rng = afterLosesTo;
  }
  return declarations;
};

const compiledSamples = (previous: RuleSet): RuleSet[] =>
  SEEDS.flatMap((seed) => {
    const result = compileVariant(randomDeclarations(seed), { previous });
    return result.ruleSet === null ? [] : [result.ruleSet];
  });

describe('compiler properties', () => {
  for (const [label, previous] of [
    ['classic', CLASSIC_RULE_SET],
    ['empty', EMPTY_RULE_SET],
  ] as const) {
    it(`never lets two moves beat each other (${label} base)`, () => {
      for (const ruleSet of compiledSamples(previous)) {
        assert.equal(hasAsymmetricRelations(ruleSet), true, ruleSet.name);
      }
    });

    it(`keeps the graph within the enumerated moves (${label} base)`, () => {
      for (const ruleSet of compiledSamples(previous)) {
        const ids = ruleSet.moves.map((move) => move.id);
        assert.deepEqual([...ruleSet.hierarchy.keys()], ids);
        assert.deepEqual(
          ruleSet.moves.map((move) => move.index),
          ids.map((_, index) => index),
        );
        for (const [winner, losers] of ruleSet.hierarchy) {
          for (const loser of losers) {
            assert.notEqual(winner, loser);
            assert.ok(ids.includes(loser));
          }
        }
        assert.equal(ruleSet.name, ruleSet.moves.map((move) => capitalizeWord(move.display)).join(''));
      }
    });

    it(`reproduces a compiled variant from no declarations (${label} base)`, () => {
      for (const ruleSet of compiledSamples(previous)) {
        const again = compileVariant([], { previous: ruleSet });
        assert.ok(again.ruleSet !== null);
        assert.deepEqual(sortedEdgeSignatures(again.ruleSet), sortedEdgeSignatures(ruleSet));
        assert.deepEqual(verbSignatures(again.ruleSet.verbs), verbSignatures(ruleSet.verbs));
        assert.equal(again.ruleSet.name, ruleSet.name);
      }
    });
  }

  it('compiles a share of the generated declarations', () => {
    assert.ok(compiledSamples(CLASSIC_RULE_SET).length > 0);
  });

  it('is deterministic for the same declarations', () => {
    for (const seed of SEEDS) {
      const first = compileVariant(randomDeclarations(seed));
      const second = compileVariant(randomDeclarations(seed));
      assert.deepEqual(first.diagnostics, second.diagnostics);
      assert.deepEqual(
        first.ruleSet === null ? null : sortedEdgeSignatures(first.ruleSet),
        second.ruleSet === null ? null : sortedEdgeSignatures(second.ruleSet),
      );
    }
  });
});
