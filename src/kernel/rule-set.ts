import type { MoveId } from './branded.js';
import { kernelRuntimeError } from './runtime-error.js';
import type { MoveDef, RelationGraph, RuleSet, VerbTable } from './types.js';

export interface RelationEdge {
  readonly winner: MoveId;
  readonly loser: MoveId;
  readonly verb?: string;
}

/** Copies the tables, so later changes to the caller's maps do not reach the rule set. */
export const freezeRuleSet = (ruleSet: RuleSet): RuleSet =>
  Object.freeze({
    ...ruleSet,
    moves: Object.freeze(ruleSet.moves.map((move) => Object.freeze({ ...move }))),
    hierarchy: new Map(
      [...ruleSet.hierarchy].map(([winner, losers]): [MoveId, ReadonlySet<MoveId>] => [winner, new Set(losers)]),
    ),
    verbs: new Map(
      [...ruleSet.verbs].map(([winner, byLoser]): [MoveId, ReadonlyMap<MoveId, string>] => [winner, new Map(byLoser)]),
    ),
    inputs: new Map(ruleSet.inputs),
  });

export const EMPTY_RULE_SET: RuleSet = freezeRuleSet({
  name: '',
  displayName: '',
  moves: [],
  hierarchy: new Map(),
  verbs: new Map(),
  inputs: new Map(),
});

export const getMove = (ruleSet: RuleSet, id: string): MoveDef | undefined =>
  ruleSet.moves.find((move) => move.id === id);

export const requireMove = (ruleSet: RuleSet, id: string): MoveDef => {
  const move = getMove(ruleSet, id);
  if (move === undefined) {
    throw kernelRuntimeError('UNKNOWN_MOVE', `Unknown move ${id} in variant ${ruleSet.name}`, {
      variant: ruleSet.name,
      moveId: id,
    });
  }
  return move;
};

export const beats = (ruleSet: RuleSet, winner: MoveId, loser: MoveId): boolean =>
  ruleSet.hierarchy.get(winner)?.has(loser) ?? false;

export const movesBeatenBy = (ruleSet: RuleSet, winner: MoveId): readonly MoveId[] => [
  ...(ruleSet.hierarchy.get(winner) ?? []),
];

export const movesThatBeat = (ruleSet: RuleSet, loser: MoveId): readonly MoveId[] =>
  ruleSet.moves.filter((move) => beats(ruleSet, move.id, loser)).map((move) => move.id);

export const lookupVerb = (verbs: VerbTable, winner: MoveId, loser: MoveId): string | undefined =>
  verbs.get(winner)?.get(loser);

export const findMoveByInput = (ruleSet: RuleSet, input: string): MoveDef | null => {
  const id = ruleSet.inputs.get(input.trim().toUpperCase());
  if (id === undefined) {
    return null;
  }
  return getMove(ruleSet, id) ?? null;
};

export const listRelationEdges = (ruleSet: RuleSet): readonly RelationEdge[] =>
  collectEdges(ruleSet.hierarchy, ruleSet.verbs);

export const findMissingVerbs = (ruleSet: RuleSet): readonly RelationEdge[] =>
  listRelationEdges(ruleSet).filter((edge) => edge.verb === undefined);

function collectEdges(hierarchy: RelationGraph, verbs: VerbTable): readonly RelationEdge[] {
  const edges: RelationEdge[] = [];
  for (const [winner, losers] of hierarchy) {
    for (const loser of losers) {
      const verb = lookupVerb(verbs, winner, loser);
      edges.push(verb === undefined ? { winner, loser } : { winner, loser, verb });
    }
  }
  return edges;
}
