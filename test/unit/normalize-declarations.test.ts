import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { normalizeDeclarations, relation, REMOVED } from '../../src/cnl/index.js';
import { CLASSIC_RULE_SET } from '../../src/kernel/index.js';
import { id } from '../helpers/rule-set-helpers.js';

const CLASSIC_IDS = CLASSIC_RULE_SET.moves.map((move) => move.id);

describe('normalizeDeclarations', () => {
  it('upper-cases move names and relation targets but keeps verbs as written', () => {
    const result = normalizeDeclarations(
      [
        ['rock', relation({ string: 'stone', beats: [['scissors', 'smashes']] })],
        ['lizard', relation({ losesTo: [['rock']] })],
      ],
      CLASSIC_IDS,
    );

    assert.deepEqual(result.diagnostics, []);
    assert.deepEqual([...result.value.specs.keys()], ['ROCK', 'LIZARD']);
    assert.deepEqual([...result.value.specs.values()][0], {
      string: 'stone',
      beats: [['SCISSORS', 'smashes']],
    });
    assert.deepEqual([...result.value.specs.values()][1], { losesTo: [['ROCK']] });
    assert.deepEqual(result.value.retained, ['ROCK', 'PAPER', 'SCISSORS']);
  });

  it('removes previous moves and warns about removals of unknown moves', () => {
    const result = normalizeDeclarations(
      [
        ['paper', REMOVED],
        ['spock', REMOVED],
      ],
      CLASSIC_IDS,
    );

    assert.deepEqual(result.value.retained, ['ROCK', 'SCISSORS']);
    assert.equal(result.value.specs.size, 0);
    assert.deepEqual(result.diagnostics, [
      {
        code: 'RPS_COMPILER_REMOVAL_TARGET_UNKNOWN',
        path: 'moves.SPOCK',
        severity: 'warning',
        message: 'Removal of "spock" ignored; no such move is carried from the previous rule set.',
        alternatives: ['ROCK', 'SCISSORS'],
        moveId: 'SPOCK',
      },
    ]);
  });

  it('leaves a move removed and redeclared in one call out of the retained list', () => {
    const result = normalizeDeclarations(
      [
        ['rock', REMOVED],
        ['ROCK', relation({})],
      ],
      CLASSIC_IDS,
    );

    assert.deepEqual(result.value.retained, ['PAPER', 'SCISSORS']);
    assert.deepEqual([...result.value.specs.keys()], ['ROCK']);
    assert.deepEqual(
      result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.path]),
      [['RPS_COMPILER_DUPLICATE_MOVE_NAME', 'moves.ROCK']],
    );
  });

  it('lets a later removal cancel an earlier declaration of the same move', () => {
    for (const previousMoves of [CLASSIC_IDS, []]) {
      const result = normalizeDeclarations(
        [
          ['well', relation({ beats: [['rock', 'drowns']] })],
          ['rock', relation({})],
          ['WELL', REMOVED],
          ['ROCK', REMOVED],
        ],
        previousMoves,
      );

      assert.equal(result.value.specs.size, 0);
      assert.equal(result.value.retained.includes(id('ROCK')), false);
      assert.deepEqual(
        result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.path]),
        [
          ['RPS_COMPILER_DUPLICATE_MOVE_NAME', 'moves.WELL'],
          ['RPS_COMPILER_DUPLICATE_MOVE_NAME', 'moves.ROCK'],
        ],
      );
    }
  });

  it('keeps the first position of a repeated name and the last value', () => {
    const result = normalizeDeclarations(
      [
        ['a', relation({ string: 'first' })],
        ['b', relation({})],
        ['A', relation({ string: 'second' })],
      ],
      [],
    );

    assert.deepEqual([...result.value.specs.keys()], ['A', 'B']);
    assert.deepEqual([...result.value.specs.values()][0], { string: 'second' });
    assert.equal(result.diagnostics[0]?.severity, 'warning');
  });

  it('rejects blank move names', () => {
    const result = normalizeDeclarations([['  ', relation({})]], CLASSIC_IDS);

    assert.equal(result.value.specs.size, 0);
    assert.deepEqual(
      result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity]),
      [['RPS_COMPILER_MOVE_NAME_INVALID', 'error']],
    );
  });
});
