/**
 * One `[targetMoveName, verb]` pair under `beats` or `losesTo`. The verb is
 * only absent on relations inherited from a rule set that lacked one.
 */
export type RelationEntry = readonly [target: string, verb?: string];

/**
 * Partial description of one move. An absent field means "inherit from the
 * previous rule set, or default".
 */
export interface RelationSpec {
  readonly string?: string;
  readonly inputString?: string;
  readonly beats?: readonly RelationEntry[];
  readonly losesTo?: readonly RelationEntry[];
}

export interface RelationDeclaration {
  readonly kind: 'relation';
  readonly spec: RelationSpec;
}

export interface RemovedDeclaration {
  readonly kind: 'removed';
}

export type MoveDeclaration = RelationDeclaration | RemovedDeclaration;

/** Declaration order is significant: it becomes the move enumeration order. */
export type VariantDeclarations = readonly (readonly [name: string, declaration: MoveDeclaration])[];

export const relation = (spec: RelationSpec = {}): RelationDeclaration => ({ kind: 'relation', spec });

export const REMOVED: RemovedDeclaration = Object.freeze({ kind: 'removed' });

/**
 * Builds declarations from a plain object map. Object values are relation
 * specs; any other value (null, false, a string) removes the move.
 */
export function declarationsFromRecord(record: Readonly<Record<string, RelationSpec | null | boolean | string>>): VariantDeclarations {
  return Object.entries(record).map(([name, value]) => [
    name,
    typeof value === 'object' && value !== null ? relation(value) : REMOVED,
  ] as const);
}

/** A spec with every field present, after carry-forward. */
export interface CompletedRelationSpec {
  readonly string: string;
  readonly inputString: string;
  readonly beats: readonly RelationEntry[];
  readonly losesTo: readonly RelationEntry[];
}
