import type { Diagnostic, DiagnosticSeverity } from '../kernel/diagnostics.js';
import { RPS_COMPILER_DIAGNOSTIC_CODES } from './compiler-diagnostic-codes.js';

const DIAGNOSTIC_SEVERITY_RANK: Readonly<Record<DiagnosticSeverity, number>> = {
  error: 0,
  warning: 1,
  info: 2,
};

const NO_SOURCE_ORDER = Number.POSITIVE_INFINITY;
const MOVE_PATH_PATTERN = /^moves\.([^.]+)/;

/** Declaration position of each move name, used to order diagnostics. */
export type MoveDeclarationOrder = ReadonlyMap<string, number>;

export function getDiagnosticSeverityRank(severity: DiagnosticSeverity): number {
  return DIAGNOSTIC_SEVERITY_RANK[severity];
}

export interface DiagnosticSortKey {
  readonly sourceOrder: number;
  readonly path: string;
  readonly severityRank: number;
  readonly code: string;
}

export function getDiagnosticSortKey(diagnostic: Diagnostic, moveOrder?: MoveDeclarationOrder): DiagnosticSortKey {
  return {
    sourceOrder: resolveSourceOrder(diagnostic.path, moveOrder),
    path: diagnostic.path,
    severityRank: getDiagnosticSeverityRank(diagnostic.severity),
    code: diagnostic.code,
  };
}

export function compareDiagnosticsDeterministic(
  left: Diagnostic,
  right: Diagnostic,
  moveOrder?: MoveDeclarationOrder,
): number {
  const leftKey = getDiagnosticSortKey(left, moveOrder);
  const rightKey = getDiagnosticSortKey(right, moveOrder);

  if (leftKey.sourceOrder !== rightKey.sourceOrder) {
    return leftKey.sourceOrder < rightKey.sourceOrder ? -1 : 1;
  }

  const pathComparison = leftKey.path.localeCompare(rightKey.path);
  if (pathComparison !== 0) {
    return pathComparison;
  }

  if (leftKey.severityRank !== rightKey.severityRank) {
    return leftKey.severityRank - rightKey.severityRank;
  }

  const codeComparison = leftKey.code.localeCompare(rightKey.code);
  if (codeComparison !== 0) {
    return codeComparison;
  }

  return left.message.localeCompare(right.message);
}

export function sortDiagnosticsDeterministic(
  diagnostics: readonly Diagnostic[],
  moveOrder?: MoveDeclarationOrder,
): readonly Diagnostic[] {
  return [...diagnostics].sort((left, right) => compareDiagnosticsDeterministic(left, right, moveOrder));
}

export function dedupeDiagnostics(diagnostics: readonly Diagnostic[]): readonly Diagnostic[] {
  const seen = new Set<string>();
  const deduped: Diagnostic[] = [];

  for (const diagnostic of diagnostics) {
    const key = serializeDiagnosticForDeduping(diagnostic);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    deduped.push(diagnostic);
  }

  return deduped;
}

/**
 * Keeps at most `maxDiagnosticCount` entries. When entries are dropped the
 * last kept slot holds a truncation warning.
 */
export function capDiagnostics(diagnostics: readonly Diagnostic[], maxDiagnosticCount: number): readonly Diagnostic[] {
  if (!Number.isInteger(maxDiagnosticCount) || maxDiagnosticCount < 1) {
    throw new Error('maxDiagnosticCount must be an integer >= 1.');
  }

  if (diagnostics.length <= maxDiagnosticCount) {
    return [...diagnostics];
  }

  const kept = diagnostics.slice(0, maxDiagnosticCount - 1);
  const truncationWarning: Diagnostic = {
    code: RPS_COMPILER_DIAGNOSTIC_CODES.RPS_COMPILER_DIAGNOSTICS_TRUNCATED,
    path: 'compiler.diagnostics',
    severity: 'warning',
    message: `Diagnostic limit reached; ${diagnostics.length - kept.length} additional diagnostic(s) were truncated.`,
  };
  return [...kept, truncationWarning];
}

export function finalizeDiagnostics(
  diagnostics: readonly Diagnostic[],
  maxDiagnosticCount: number,
  moveOrder?: MoveDeclarationOrder,
): readonly Diagnostic[] {
  const sorted = sortDiagnosticsDeterministic(diagnostics, moveOrder);
  return capDiagnostics(dedupeDiagnostics(sorted), maxDiagnosticCount);
}

function serializeDiagnosticForDeduping(diagnostic: Diagnostic): string {
  const alternatives = diagnostic.alternatives === undefined ? '' : diagnostic.alternatives.join('\u001f');
  return [
    diagnostic.code,
    diagnostic.path,
    diagnostic.severity,
    diagnostic.message,
    diagnostic.suggestion ?? '',
    alternatives,
    diagnostic.moveId ?? '',
    diagnostic.sourcePath ?? '',
  ].join('\u001e');
}

function resolveSourceOrder(path: string, moveOrder?: MoveDeclarationOrder): number {
  if (moveOrder === undefined) {
    return NO_SOURCE_ORDER;
  }
  const match = MOVE_PATH_PATTERN.exec(path);
  const name = match?.[1];
  if (name === undefined) {
    return NO_SOURCE_ORDER;
  }
  return moveOrder.get(name) ?? NO_SOURCE_ORDER;
}
