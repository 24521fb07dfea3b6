import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { buildRelationGraph, enumerateMoves, type CompletedSpecs } from '../../src/cnl/index.js';
import type { RelationGraph } from '../../src/kernel/index.js';
import { completedSpecs } from '../helpers/rule-set-helpers.js';

const build = (completed: CompletedSpecs) => buildRelationGraph(enumerateMoves(completed, 64).value, completed);

const edgesOf = (graph: RelationGraph | null): readonly string[] =>
  graph === null ? [] : [...graph].flatMap(([winner, losers]) => [...losers].map((loser) => `${winner}>${loser}`));

describe('buildRelationGraph', () => {
  it('keys every move and adds edges from both beats and losesTo', () => {
    const result = build(
      completedSpecs([
        ['ROCK', { beats: [['SCISSORS', 'crushes']] }],
        ['PAPER', { losesTo: [['SCISSORS', 'cuts']] }],
        ['SCISSORS', {}],
        ['WELL', {}],
      ]),
    );

    assert.deepEqual(result.diagnostics, []);
    assert.deepEqual([...(result.value?.keys() ?? [])], ['ROCK', 'PAPER', 'SCISSORS', 'WELL']);
    assert.deepEqual(edgesOf(result.value), ['ROCK>SCISSORS', 'SCISSORS>PAPER']);
  });

  it('reports every unknown target and builds no graph', () => {
    const result = build(
      completedSpecs([
        ['LIZARD', { beats: [['SPOK', 'poisons']], losesTo: [['ROCK', 'crushes'], ['STONE', 'crushes']] }],
        ['ROCK', {}],
      ]),
    );

    assert.equal(result.value, null);
    assert.deepEqual(
      result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.path, diagnostic.moveId]),
      [
        ['RPS_COMPILER_UNKNOWN_MOVE_REFERENCE', 'moves.LIZARD.beats.0', 'SPOK'],
        ['RPS_COMPILER_UNKNOWN_MOVE_REFERENCE', 'moves.LIZARD.losesTo.1', 'STONE'],
      ],
    );
    assert.deepEqual(result.diagnostics[0]?.alternatives, ['LIZARD', 'ROCK']);
  });

  it('rejects a move that relates to itself', () => {
    const result = build(completedSpecs([['ROCK', { losesTo: [['ROCK', 'crushes']] }]]));

    assert.equal(result.value, null);
    assert.deepEqual(
      result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.message]),
      [['RPS_COMPILER_SELF_RELATION', 'Move ROCK cannot lose to itself.']],
    );
  });

  it('lets a later declaration reverse an earlier one and warns about the conflict', () => {
    const result = build(
      completedSpecs([
        ['FIRE', { beats: [['WATER', 'boils']] }],
        ['WATER', { beats: [['FIRE', 'douses']] }],
      ]),
    );

    assert.deepEqual(edgesOf(result.value), ['WATER>FIRE']);
    assert.deepEqual(result.diagnostics, [
      {
        code: 'RPS_COMPILER_RELATION_CONFLICT',
        path: 'moves.WATER.beats.0',
        severity: 'warning',
        message: 'WATER now beats FIRE, overriding the opposite relation declared at moves.FIRE.beats.0.',
        moveId: 'WATER',
      },
    ]);
  });

  it('applies losesTo after beats within one move without a warning', () => {
    const result = build(
      completedSpecs([
        ['A', { beats: [['B', 'x']], losesTo: [['B', 'y']] }],
        ['B', {}],
      ]),
    );

    assert.deepEqual(edgesOf(result.value), ['B>A']);
    assert.deepEqual(result.diagnostics, []);
  });

  it('does not warn when both sides declare the same direction', () => {
    const result = build(
      completedSpecs([
        ['ROCK', { beats: [['SCISSORS', 'crushes']] }],
        ['SCISSORS', { losesTo: [['ROCK', 'crushes']] }],
      ]),
    );

    assert.deepEqual(edgesOf(result.value), ['ROCK>SCISSORS']);
    assert.deepEqual(result.diagnostics, []);
  });
});
