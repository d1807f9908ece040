/**
 * @fileoverview CLI types and interfaces
 */

import { z } from 'zod';
import { LogLevelSchema } from '@taskdesk/core';
import type { TaskStore } from '@taskdesk/core';
import type { Logger } from '@taskdesk/shared';

/**
 * Output format options
 */
export const OUTPUT_FORMATS = ['text', 'table', 'json', 'yaml'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Options shared by every command, after commander has parsed them
 */
export const CommandOptionsSchema = z.object({
  format: z.enum(OUTPUT_FORMATS).default('text'),
  color: z.boolean().default(true),
  config: z.string().optional(),
  logLevel: LogLevelSchema.optional()
});

export type CommandOptions = z.infer<typeof CommandOptionsSchema>;

/**
 * Command context
 */
export interface CommandContext {
  readonly store: TaskStore;
  readonly logger: Logger;
  readonly outputFormat: OutputFormat;
  readonly colors: boolean;
  readonly write: (text: string) => void;
  readonly writeError: (text: string) => void;
}

/**
 * Command execution result
 */
export interface CommandResult<T = unknown> {
  readonly success: boolean;
  readonly data?: T;
  readonly output?: string;
  readonly error?: string;
}
