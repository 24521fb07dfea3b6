import type { MoveId } from './branded.js';

export interface MoveDef {
  readonly id: MoveId;
  readonly index: number;
  readonly display: string;
  readonly input: string;
}

export type RelationGraph = ReadonlyMap<MoveId, ReadonlySet<MoveId>>;

/** Winner, then loser. */
export type VerbTable = ReadonlyMap<MoveId, ReadonlyMap<MoveId, string>>;

/**
 * A compiled variant. Built once by the compiler and never mutated; a
 * different variant needs a new compilation.
 */
export interface RuleSet {
  readonly name: string;
  readonly displayName: string;
  readonly moves: readonly MoveDef[];
  readonly hierarchy: RelationGraph;
  readonly verbs: VerbTable;
  readonly inputs: ReadonlyMap<string, MoveId>;
}

export type RoundOutcome = 'win' | 'loss' | 'draw';

export type SessionStage = 'initial' | 'moved' | 'resolved';

export interface Rng {
  readonly state: {
    readonly algorithm: 'pcg-dxsm-128';
    readonly version: 1;
    readonly state: readonly bigint[];
  };
}

export interface Agent {
  chooseMove(input: { readonly ruleSet: RuleSet; readonly rng: Rng }): { readonly move: MoveId; readonly rng: Rng };
}
