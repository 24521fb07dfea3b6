import type { CompletedSpecs } from '../../src/cnl/carry-forward.js';
import type { CompletedRelationSpec } from '../../src/cnl/variant-spec.js';
import { asMoveId, type MoveId } from '../../src/kernel/branded.js';
import { listRelationEdges } from '../../src/kernel/rule-set.js';
import type { RuleSet, VerbTable } from '../../src/kernel/types.js';

export const id = (name: string): MoveId => asMoveId(name);

export const moveIds = (ruleSet: RuleSet): readonly string[] => ruleSet.moves.map((move) => move.id);

/** `WINNER>LOSER:verb` for every graph edge, in hierarchy order. */
export const edgeSignatures = (ruleSet: RuleSet): readonly string[] =>
  listRelationEdges(ruleSet).map((edge) => `${edge.winner}>${edge.loser}:${edge.verb ?? ''}`);

export const sortedEdgeSignatures = (ruleSet: RuleSet): readonly string[] => [...edgeSignatures(ruleSet)].sort();

export const verbSignatures = (verbs: VerbTable): readonly string[] => {
  const signatures: string[] = [];
  for (const [winner, byLoser] of verbs) {
    for (const [loser, verb] of byLoser) {
      signatures.push(`${winner}>${loser}:${verb}`);
    }
  }
  return signatures.sort();
};

export const hasAsymmetricRelations = (ruleSet: RuleSet): boolean =>
  ruleSet.moves.every((left) =>
    ruleSet.moves.every(
      (right) =>
        !((ruleSet.hierarchy.get(left.id)?.has(right.id) ?? false) && (ruleSet.hierarchy.get(right.id)?.has(left.id) ?? false)),
    ),
  );

/** Completed specs in the given order; missing fields default to the lower-cased name, its first letter, and no relations. */
export const completedSpecs = (
  entries: readonly (readonly [name: string, spec: Partial<CompletedRelationSpec>])[],
): CompletedSpecs =>
  new Map(
    entries.map(([name, spec]): readonly [MoveId, CompletedRelationSpec] => [
      id(name),
      {
        string: spec.string ?? name.toLowerCase(),
        inputString: spec.inputString ?? name.charAt(0),
        beats: spec.beats ?? [],
        losesTo: spec.losesTo ?? [],
      },
    ]),
  );
