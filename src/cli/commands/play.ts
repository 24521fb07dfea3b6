import { createInterface } from 'node:readline/promises';
import { Command, InvalidArgumentError } from 'commander';
import { createAgent } from '../../agents/factory.js';
import { isKernelRuntimeError } from '../../kernel/runtime-error.js';
import type { Agent, RuleSet } from '../../kernel/types.js';
import { playInteractive, type PlayIO } from '../../sim/play-loop.js';
import { errorMessage, formatCommandError } from '../utils/error-formatter.js';
import { CONSOLE_OUTPUT, loadRuleSetForCommand, type CommandOutput } from '../utils/resolve-rule-set.js';

interface PlayCommandOptions {
  readonly seed: number;
  readonly rounds?: number;
  readonly computer: string;
  readonly verbose?: boolean;
}

export interface PlaySettings {
  readonly computer: Agent;
  readonly seed: number;
  readonly rounds?: number;
}

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, received "${value}".`);
  }
  return parsed;
}

/** Plays `ruleSet` over `io` and returns the process exit code. */
export async function playRuleSet(
  ruleSet: RuleSet,
  settings: PlaySettings,
  io: PlayIO,
  output: CommandOutput,
): Promise<number> {
  try {
    await playInteractive(ruleSet, {
      io,
      computer: settings.computer,
      seed: settings.seed,
      ...(settings.rounds === undefined ? {} : { maxRounds: settings.rounds }),
    });
    return 0;
  } catch (error) {
    const nextSteps = isKernelRuntimeError(error, 'MISSING_VERB')
      ? ['Give every relation a verb; rps-variants compile <source> marks the ones without one']
      : [];
    for (const line of formatCommandError(`Game stopped: ${errorMessage(error)}`, nextSteps)) {
      output.error(line);
    }
    return 1;
  }
}

async function runPlayCommand(source: string, options: PlayCommandOptions): Promise<number> {
  const output = CONSOLE_OUTPUT;
  const ruleSet = loadRuleSetForCommand(source, { verbose: options.verbose ?? false, output });
  if (ruleSet === null) {
    return 1;
  }

  let computer: Agent;
  try {
    computer = createAgent(options.computer);
  } catch (error) {
    for (const line of formatCommandError(`Invalid computer agent: ${errorMessage(error)}`, ['Use random or fixed:<move>'])) {
      output.error(line);
    }
    return 1;
  }

  const readline = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  const closedSignal = new Promise<null>((resolve) => {
    readline.once('close', () => {
      closed = true;
      resolve(null);
    });
  });
  const io: PlayIO = {
    readLine: async (prompt) => {
      if (closed) {
        return null;
      }
      const answer = readline.question(prompt).catch((error: unknown) => {
        // Closing stdin aborts the pending question.
        if (closed) {
          return null;
        }
        throw error;
      });
      return Promise.race([answer, closedSignal]);
    },
    write: (text) => output.log(text),
  };

  try {
    return await playRuleSet(
      ruleSet,
      { computer, seed: options.seed, ...(options.rounds === undefined ? {} : { rounds: options.rounds }) },
      io,
      output,
    );
  } finally {
    readline.close();
  }
}

export const playCommand = new Command('play')
  .description('Play a variant against the computer in the terminal')
  .argument('[source]', 'variant document path, or a built-in variant name', 'classic')
  .option('-s, --seed <n>', 'seed for the computer player', parseIntegerOption, Date.now())
  .option('-r, --rounds <n>', 'stop after this many rounds', parseIntegerOption)
  .option('-c, --computer <agent>', 'computer agent: random or fixed:<move>', 'random')
  .option('-v, --verbose', 'print compiler debug output')
  .action(async (source: string, options: PlayCommandOptions) => {
    process.exitCode = await runPlayCommand(source, options);
  });
