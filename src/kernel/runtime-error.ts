import type { MoveId } from './branded.js';
import type { RoundOutcome, SessionStage } from './types.js';

export type KernelRuntimeErrorCode =
  | 'MISSING_VERB'
  | 'UNKNOWN_MOVE'
  | 'GAME_SEQUENCE_VIOLATION'
  | 'VARIANT_MISMATCH';

export interface KernelRuntimeErrorContextByCode {
  readonly MISSING_VERB: Readonly<{
    readonly variant: string;
    readonly winner: MoveId;
    readonly loser: MoveId;
  }>;
  readonly UNKNOWN_MOVE: Readonly<{
    readonly variant: string;
    readonly moveId: string;
  }>;
  readonly GAME_SEQUENCE_VIOLATION: Readonly<{
    readonly operation: 'submitMoves' | 'resolveRound' | 'resetRound';
    readonly stage: SessionStage;
    readonly outcome?: RoundOutcome;
  }>;
  readonly VARIANT_MISMATCH: Readonly<{
    readonly left: string;
    readonly right: string;
  }>;
}

export type KernelRuntimeErrorContext<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> =
  KernelRuntimeErrorContextByCode[C];

function formatMessage<C extends KernelRuntimeErrorCode>(message: string, context?: KernelRuntimeErrorContext<C>): string {
  if (context === undefined) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export class KernelRuntimeError<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> extends Error {
  readonly code: C;
  readonly context?: KernelRuntimeErrorContext<C>;

  constructor(code: C, message: string, context?: KernelRuntimeErrorContext<C>, cause?: unknown) {
    super(formatMessage(message, context));
    this.name = 'KernelRuntimeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (cause !== undefined) {
      (this as Error & { cause?: unknown }).cause = cause;
    }
  }
}

export const kernelRuntimeError = <C extends KernelRuntimeErrorCode>(
  code: C,
  message: string,
  context?: KernelRuntimeErrorContext<C>,
  cause?: unknown,
): KernelRuntimeError<C> => new KernelRuntimeError(code, message, context, cause);

export const isKernelRuntimeError = <C extends KernelRuntimeErrorCode>(
  error: unknown,
  code?: C,
): error is KernelRuntimeError<C> =>
  error instanceof KernelRuntimeError && (code === undefined || error.code === code);

export const missingVerbError = (
  variant: string,
  winner: MoveId,
  loser: MoveId,
): KernelRuntimeError<'MISSING_VERB'> =>
  new KernelRuntimeError(
    'MISSING_VERB',
    `No verb describes how ${winner} beats ${loser} in variant ${variant}`,
    { variant, winner, loser },
  );
