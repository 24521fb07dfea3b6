#!/usr/bin/env node
/**
 * rps-variants: compile and play rock-paper-scissors variants.
 */

import { Command } from 'commander';
import { compileCommand } from './commands/compile.js';
import { playCommand } from './commands/play.js';

const program = new Command();

program
  .name('rps-variants')
  .description('Compile and play rock-paper-scissors variants')
  .version('0.1.0');

program.addCommand(compileCommand);
program.addCommand(playCommand);

await program.parseAsync();
