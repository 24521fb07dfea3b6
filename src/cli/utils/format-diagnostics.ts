import type { Diagnostic } from '../../kernel/diagnostics.js';

const SEVERITY_MARK: Readonly<Record<Diagnostic['severity'], string>> = {
  error: '✗',
  warning: '!',
  info: '·',
};

/**
 * One line per diagnostic, plus an indented suggestion line when present:
 *   ✗ RPS_COMPILER_UNKNOWN_MOVE_REFERENCE moves.LIZARD.beats.0: Move "SPOK" ...
 *     → Declare the move, or reference one of the known moves.
 */
export function formatDiagnostics(diagnostics: readonly Diagnostic[], options: { readonly includeInfo?: boolean } = {}): string[] {
  const lines: string[] = [];
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === 'info' && options.includeInfo !== true) {
      continue;
    }
    const location = diagnostic.sourcePath === undefined ? diagnostic.path : `${diagnostic.sourcePath} ${diagnostic.path}`;
    lines.push(`${SEVERITY_MARK[diagnostic.severity]} ${diagnostic.code} ${location}: ${diagnostic.message}`);
    if (diagnostic.suggestion !== undefined) {
      lines.push(`  → ${diagnostic.suggestion}`);
    }
  }
  return lines;
}
