import type { Diagnostic } from '../kernel/diagnostics.js';
import type { MoveId } from '../kernel/branded.js';
import type { MoveDef } from '../kernel/types.js';
import type { CompletedSpecs } from './carry-forward.js';
import { buildEmptyMoveSetDiagnostic, RPS_COMPILER_DIAGNOSTIC_CODES } from './compiler-diagnostic-codes.js';
import type { StageResult } from './stage-result.js';

export interface MoveEnumeration {
  readonly moves: readonly MoveDef[];
  readonly inputs: ReadonlyMap<string, MoveId>;
}

/**
 * Assigns each completed spec its position in the variant. Iteration order of
 * `completed` is the enumeration order and is never re-sorted.
 */
export function enumerateMoves(completed: CompletedSpecs, maxMoves: number): StageResult<MoveEnumeration> {
  const diagnostics: Diagnostic[] = [];
  const moves: MoveDef[] = [];
  const inputs = new Map<string, MoveId>();

  if (completed.size === 0) {
    diagnostics.push(buildEmptyMoveSetDiagnostic());
  }
  if (completed.size > maxMoves) {
    diagnostics.push({
      code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_MAX_MOVES_EXCEEDED,
      path: 'moves',
      severity: 'error',
      message: `Variant has ${completed.size} moves, more than maxMoves (${maxMoves}).`,
      suggestion: 'Remove moves or raise limits.maxMoves.',
    });
  }

  for (const [id, spec] of completed) {
    const input = spec.inputString.trim().toUpperCase();
    if (input.length === 0) {
      diagnostics.push({
        code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_INPUT_TOKEN_INVALID,
        path: `moves.${id}.inputString`,
        severity: 'error',
        message: `Move ${id} has an empty input token.`,
        moveId: id,
      });
    }

    const holder = inputs.get(input);
    if (holder !== undefined) {
      diagnostics.push({
        code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_DUPLICATE_INPUT_TOKEN,
        path: `moves.${id}.inputString`,
        severity: 'warning',
        message: `Input "${input}" of ${id} shadows the same input of ${holder}; ${holder} can no longer be chosen by it.`,
        suggestion: 'Give one of the moves a distinct inputString.',
        moveId: id,
      });
    }
    inputs.set(input, id);
    moves.push({ id, index: moves.length, display: spec.string, input });
  }

  return { value: { moves, inputs }, diagnostics };
}
