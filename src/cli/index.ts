#!/usr/bin/env node

import { Command } from 'commander';
import { registerActionsCommand } from './commands/actions.js';
import { registerRunCommand } from './commands/run.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('feedgrab')
    .description('Batch dispatcher for short-video content backends')
    .version('0.1.0');

  registerRunCommand(program);
  registerActionsCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
