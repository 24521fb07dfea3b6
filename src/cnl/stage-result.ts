import type { Diagnostic } from '../kernel/diagnostics.js';

export interface StageResult<TValue> {
  readonly value: TValue;
  readonly diagnostics: readonly Diagnostic[];
}
