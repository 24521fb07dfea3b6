import { toMoveId, type MoveId } from '../kernel/branded.js';
import type { MoveDef, VerbTable } from '../kernel/types.js';
import type { CompletedSpecs } from './carry-forward.js';

const NO_VERBS: VerbTable = new Map();

/**
 * Verbs of `previous` whose winner and loser both survive into the new
 * rule set, including verbs no graph edge uses any more.
 */
export function retainedVerbs(previous: VerbTable, survivors: readonly MoveId[]): VerbTable {
  const alive = new Set(survivors);
  const retained = new Map<MoveId, ReadonlyMap<MoveId, string>>();
  for (const [winner, byLoser] of previous) {
    if (!alive.has(winner)) {
      continue;
    }
    const kept = new Map([...byLoser].filter(([loser]) => alive.has(loser)));
    if (kept.size > 0) {
      retained.set(winner, kept);
    }
  }
  return retained;
}

/**
 * Starts from `inherited`, then records a verb for every declared (winner,
 * loser) pair, in enumeration order with `beats` before `losesTo`; a later
 * declaration of the same ordered pair overwrites the earlier verb. Entries
 * are taken from the declarations, not from the final graph, so a pair whose
 * edge was later reversed keeps its (unused) verb.
 */
export function buildVerbTable(
  moves: readonly MoveDef[],
  completed: CompletedSpecs,
  inherited: VerbTable = NO_VERBS,
): VerbTable {
  const verbs = new Map<MoveId, Map<MoveId, string>>(
    [...inherited].map(([winner, byLoser]): [MoveId, Map<MoveId, string>] => [winner, new Map(byLoser)]),
  );

  const record = (winner: MoveId, loser: MoveId, verb: string | undefined): void => {
    if (verb === undefined) {
      return;
    }
    const byLoser = verbs.get(winner) ?? new Map<MoveId, string>();
    byLoser.set(loser, verb);
    verbs.set(winner, byLoser);
  };

  for (const move of moves) {
    const spec = completed.get(move.id);
    if (spec === undefined) {
      continue;
    }
    for (const [loser, verb] of spec.beats) {
      record(move.id, toMoveId(loser), verb);
    }
    for (const [winner, verb] of spec.losesTo) {
      record(toMoveId(winner), move.id, verb);
    }
  }

  return verbs;
}
