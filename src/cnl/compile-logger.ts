export type CompileLogData = Readonly<Record<string, unknown>>;

export interface CompileLogger {
  debug(message: string, data?: CompileLogData): void;
  warn(message: string, data?: CompileLogData): void;
}

/** Console abstraction so tests can capture output. */
export interface LoggerConsole {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

export const SILENT_COMPILE_LOGGER: CompileLogger = {
  debug: () => undefined,
  warn: () => undefined,
};

export function createConsoleCompileLogger(
  options: { readonly verbose?: boolean; readonly console?: LoggerConsole } = {},
): CompileLogger {
  const target = options.console ?? console;
  const verbose = options.verbose ?? false;
  return {
    debug(message, data) {
      if (!verbose) {
        return;
      }
      if (data === undefined) {
        target.debug(`[rps-variants] ${message}`);
      } else {
        target.debug(`[rps-variants] ${message}`, data);
      }
    },
    warn(message, data) {
      if (data === undefined) {
        target.warn(`[rps-variants] ${message}`);
      } else {
        target.warn(`[rps-variants] ${message}`, data);
      }
    },
  };
}
