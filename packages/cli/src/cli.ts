#!/usr/bin/env node

/**
 * Main CLI entry point for TaskDesk
 */

import { Command } from 'commander';
import { createDemoCommand, createStatsCommand } from './commands/index';
import type { ContextDependencies } from './commands/index';
import { formatError } from './utils/index';

export function createProgram(deps: ContextDependencies = {}): Command {
  const program = new Command();

  program
    .name('taskdesk')
    .description('TaskDesk - track tasks in memory and inspect them from the terminal')
    .version('0.1.0')
    .option('-c, --config <path>', 'configuration file (JSON or YAML)')
    .option('-l, --log-level <level>', 'override the configured log level');

  program.addCommand(createDemoCommand(deps));
  program.addCommand(createStatsCommand(deps));

  return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync([...argv]);
  } catch (error) {
    console.error(formatError('TaskDesk failed', error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
