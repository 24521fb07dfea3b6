import type { Diagnostic } from '../kernel/diagnostics.js';
import { toMoveId, type MoveId } from '../kernel/branded.js';
import type { RelationGraph } from '../kernel/types.js';
import type { CompletedSpecs } from './carry-forward.js';
import { buildUnknownMoveReferenceDiagnostic, RPS_COMPILER_DIAGNOSTIC_CODES } from './compiler-diagnostic-codes.js';
import type { MoveEnumeration } from './enumerate-moves.js';
import type { StageResult } from './stage-result.js';

interface EdgeOrigin {
  readonly declarer: MoveId;
  readonly path: string;
}

/**
 * Checks every `beats`/`losesTo` target against the enumeration. Unknown
 * and self references are all reported at once.
 */
export function validateRelationTargets(enumeration: MoveEnumeration, completed: CompletedSpecs): readonly Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const known = enumeration.moves.map((move) => move.id);
  const knownSet = new Set<string>(known);

  for (const move of enumeration.moves) {
    const spec = completed.get(move.id);
    if (spec === undefined) {
      continue;
    }
    for (const key of ['beats', 'losesTo'] as const) {
      for (const [index, [target]] of spec[key].entries()) {
        const path = `moves.${move.id}.${key}.${index}`;
        if (!knownSet.has(target)) {
          diagnostics.push(buildUnknownMoveReferenceDiagnostic(path, target, known));
        } else if (target === move.id) {
          diagnostics.push({
            code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_SELF_RELATION,
            path,
            severity: 'error',
            message: `Move ${move.id} cannot ${key === 'beats' ? 'beat' : 'lose to'} itself.`,
            moveId: move.id,
          });
        }
      }
    }
  }

  return diagnostics;
}

/**
 * Applies each move's relations in enumeration order, `beats` before
 * `losesTo`. Writing one direction of a pair deletes the other, so the last
 * declaration processed decides the pair. Returns a null graph when any
 * target is invalid; no partial graph is produced.
 */
export function buildRelationGraph(
  enumeration: MoveEnumeration,
  completed: CompletedSpecs,
): StageResult<RelationGraph | null> {
  const targetDiagnostics = validateRelationTargets(enumeration, completed);
  if (targetDiagnostics.length > 0) {
    return { value: null, diagnostics: targetDiagnostics };
  }

  const diagnostics: Diagnostic[] = [];
  const hierarchy = new Map<MoveId, Set<MoveId>>(enumeration.moves.map((move) => [move.id, new Set<MoveId>()]));
  const origins = new Map<string, EdgeOrigin>();

  const addEdge = (winner: MoveId, loser: MoveId, origin: EdgeOrigin): void => {
    const reverseKey = pairKey(loser, winner);
    const reverseOrigin = origins.get(reverseKey);
    if (hierarchy.get(loser)?.delete(winner) === true && reverseOrigin !== undefined) {
      origins.delete(reverseKey);
      if (reverseOrigin.declarer !== origin.declarer) {
        diagnostics.push({
          code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_RELATION_CONFLICT,
          path: origin.path,
          severity: 'warning',
          message: `${winner} now beats ${loser}, overriding the opposite relation declared at ${reverseOrigin.path}.`,
          moveId: origin.declarer,
        });
      }
    }
    hierarchy.get(winner)?.add(loser);
    origins.set(pairKey(winner, loser), origin);
  };

  for (const move of enumeration.moves) {
    const spec = completed.get(move.id);
    if (spec === undefined) {
      continue;
    }
    for (const [index, [target]] of spec.beats.entries()) {
      addEdge(move.id, toMoveId(target), { declarer: move.id, path: `moves.${move.id}.beats.${index}` });
    }
    for (const [index, [target]] of spec.losesTo.entries()) {
      addEdge(toMoveId(target), move.id, { declarer: move.id, path: `moves.${move.id}.losesTo.${index}` });
    }
  }

  return { value: hierarchy, diagnostics };
}

export const pairKey = (winner: MoveId, loser: MoveId): string => `${winner}\u001f${loser}`;
