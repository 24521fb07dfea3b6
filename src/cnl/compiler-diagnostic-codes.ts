import type { Diagnostic } from '../kernel/diagnostics.js';

export const RPS_COMPILER_DIAGNOSTIC_CODES = Object.freeze({
  RPS_COMPILER_MOVE_NAME_INVALID: 'RPS_COMPILER_MOVE_NAME_INVALID',
  RPS_COMPILER_DUPLICATE_MOVE_NAME: 'RPS_COMPILER_DUPLICATE_MOVE_NAME',
  RPS_COMPILER_REMOVAL_TARGET_UNKNOWN: 'RPS_COMPILER_REMOVAL_TARGET_UNKNOWN',
  RPS_COMPILER_EMPTY_MOVE_SET: 'RPS_COMPILER_EMPTY_MOVE_SET',
  RPS_COMPILER_MAX_MOVES_EXCEEDED: 'RPS_COMPILER_MAX_MOVES_EXCEEDED',
  RPS_COMPILER_DUPLICATE_INPUT_TOKEN: 'RPS_COMPILER_DUPLICATE_INPUT_TOKEN',
  RPS_COMPILER_INPUT_TOKEN_INVALID: 'RPS_COMPILER_INPUT_TOKEN_INVALID',
  RPS_COMPILER_LEGACY_RELATION_SUPERSEDED: 'RPS_COMPILER_LEGACY_RELATION_SUPERSEDED',
  RPS_COMPILER_UNKNOWN_MOVE_REFERENCE: 'RPS_COMPILER_UNKNOWN_MOVE_REFERENCE',
  RPS_COMPILER_SELF_RELATION: 'RPS_COMPILER_SELF_RELATION',
  RPS_COMPILER_RELATION_CONFLICT: 'RPS_COMPILER_RELATION_CONFLICT',
  RPS_COMPILER_DIAGNOSTICS_TRUNCATED: 'RPS_COMPILER_DIAGNOSTICS_TRUNCATED',
} as const);

export type RpsCompilerDiagnosticCode =
  (typeof RPS_COMPILER_DIAGNOSTIC_CODES)[keyof typeof RPS_COMPILER_DIAGNOSTIC_CODES];

export function buildUnknownMoveReferenceDiagnostic(
  path: string,
  target: string,
  knownMoves: readonly string[],
): Diagnostic {
  return {
    code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_UNKNOWN_MOVE_REFERENCE,
    path,
    severity: 'error',
    message: `Move "${target}" is referenced but is not part of the compiled move set.`,
    suggestion: 'Declare the move, or reference one of the known moves.',
    alternatives: [...knownMoves],
    moveId: target,
  };
}

export function buildEmptyMoveSetDiagnostic(): Diagnostic {
  return {
    code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_EMPTY_MOVE_SET,
    path: 'moves',
    severity: 'error',
    message: 'The declarations leave no moves in the variant.',
    suggestion: 'Keep or declare at least one move.',
  };
}
