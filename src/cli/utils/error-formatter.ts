/**
 * Command failures outside the compiler's diagnostics:
 *   ✗ Main error message
 *
 *   → Next action
 */
export function formatCommandError(title: string, nextSteps: readonly string[] = []): string[] {
  const lines = [`✗ ${title}`];
  if (nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }
  return lines;
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';
