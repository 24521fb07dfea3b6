import type { Diagnostic } from '../kernel/diagnostics.js';
import { toMoveId, type MoveId } from '../kernel/branded.js';
import { RPS_COMPILER_DIAGNOSTIC_CODES } from './compiler-diagnostic-codes.js';
import type { StageResult } from './stage-result.js';
import type { RelationEntry, RelationSpec, VariantDeclarations } from './variant-spec.js';

export interface NormalizedDeclarations {
  /** Upper-cased names of caller-declared moves, in declaration order. */
  readonly specs: ReadonlyMap<MoveId, RelationSpec>;
  /** Previous moves that survive the removals of this call, in previous order. */
  readonly retained: readonly MoveId[];
}

/**
 * Canonicalizes move names and relation targets to upper case and applies
 * removals to the previous move list. A name both removed and declared in
 * one call is left out of `retained`, so it starts fresh when the declaration
 * comes last; a removal that comes last also drops the declaration.
 */
export function normalizeDeclarations(
  declarations: VariantDeclarations,
  previousMoves: readonly MoveId[],
): StageResult<NormalizedDeclarations> {
  const diagnostics: Diagnostic[] = [];
  const specs = new Map<MoveId, RelationSpec>();
  const retained = new Set<MoveId>(previousMoves);
  const seen = new Set<MoveId>();

  for (const [rawName, declaration] of declarations) {
    const id = toMoveId(rawName);
    if (id.length === 0) {
      diagnostics.push({
        code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_MOVE_NAME_INVALID,
        path: `moves.${rawName}`,
        severity: 'error',
        message: `Move name "${rawName}" must be a non-empty string.`,
      });
      continue;
    }

    if (seen.has(id)) {
      diagnostics.push({
        code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_DUPLICATE_MOVE_NAME,
        path: `moves.${id}`,
        severity: 'warning',
        message: `Move "${rawName}" repeats an earlier declaration of ${id}; the later declaration wins.`,
        moveId: id,
      });
    }
    seen.add(id);

    if (declaration.kind === 'removed') {
      const cancelled = specs.delete(id);
      if (!retained.delete(id) && !cancelled) {
        diagnostics.push({
          code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_REMOVAL_TARGET_UNKNOWN,
          path: `moves.${id}`,
          severity: 'warning',
          message: `Removal of "${rawName}" ignored; no such move is carried from the previous rule set.`,
          alternatives: [...retained],
          moveId: id,
        });
      }
      continue;
    }

    specs.set(id, normalizeRelationSpec(declaration.spec));
  }

  return {
    value: {
      specs,
      retained: previousMoves.filter((id) => retained.has(id)),
    },
    diagnostics,
  };
}

export function normalizeRelationSpec(spec: RelationSpec): RelationSpec {
  return {
    ...(spec.string === undefined ? {} : { string: spec.string }),
    ...(spec.inputString === undefined ? {} : { inputString: spec.inputString }),
    ...(spec.beats === undefined ? {} : { beats: spec.beats.map(normalizeRelationEntry) }),
    ...(spec.losesTo === undefined ? {} : { losesTo: spec.losesTo.map(normalizeRelationEntry) }),
  };
}

const normalizeRelationEntry = ([target, verb]: RelationEntry): RelationEntry =>
  verb === undefined ? [toMoveId(target)] : [toMoveId(target), verb];
