/**
 * @fileoverview Base command class and common functionality
 */

import { Command, Option } from 'commander';
import { TaskStore } from '@taskdesk/core';
import { createLogger, loadConfig } from '@taskdesk/shared';
import type { LoggerConfig } from '@taskdesk/shared';
import { OUTPUT_FORMATS } from '../types/index';
import type { CommandContext, CommandOptions, CommandResult } from '../types/index';
import { formatError } from '../utils/index';

/**
 * Hooks that let tests and embedders redirect I/O
 */
export interface ContextDependencies {
  readonly write?: (text: string) => void;
  readonly writeError?: (text: string) => void;
  readonly env?: NodeJS.ProcessEnv;
  readonly loadDotenv?: boolean;
  readonly logDestination?: LoggerConfig['destination'];
}

/**
 * Base command class
 */
export abstract class BaseCommand<T = unknown> {
  protected context: CommandContext;

  constructor(context: CommandContext) {
    this.context = context;
  }

  /**
   * Execute the command
   */
  abstract execute(): CommandResult<T>;

  /**
   * Execute and print, returning the process exit code
   */
  run(): number {
    return this.outputResult(this.execute());
  }

  /**
   * Output result based on format
   */
  outputResult(result: CommandResult<T>): number {
    if (!result.success) {
      this.context.writeError(formatError(result.error || 'Command failed', undefined, this.context.colors));
      return 1;
    }

    if (result.output) {
      this.context.write(result.output);
    }
    return 0;
  }
}

/**
 * Resolve configuration and wire a fresh store for one command run
 */
export function createContext(options: CommandOptions, deps: ContextDependencies = {}): CommandContext {
  const config = loadConfig({
    env: deps.env,
    loadDotenv: deps.loadDotenv,
    configFile: options.config,
    overrides: options.logLevel ? { logLevel: options.logLevel } : undefined
  });
  const logger = createLogger(config, {
    destination: deps.logDestination ?? 'stderr',
    baseContext: { component: 'cli' }
  });

  return {
    store: new TaskStore({
      logger: logger.child({ component: 'store' }),
      defaultPriority: config.defaultPriority
    }),
    logger,
    outputFormat: options.format,
    colors: options.color,
    write: deps.write ?? ((text) => console.log(text)),
    writeError: deps.writeError ?? ((text) => console.error(text))
  };
}

/**
 * Add output options shared by every command
 */
export function addCommonOptions(command: Command): Command {
  return command
    .addOption(new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('text'))
    .option('--no-color', 'disable coloured output');
}
