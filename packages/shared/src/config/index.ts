/**
 * @fileoverview Configuration management for TaskDesk
 */

import { config as dotenvConfig } from 'dotenv';
import { readFileSync } from 'fs';
import { extname, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, ErrorFactory, LogLevel, LogLevelSchema, TaskPriority } from '@taskdesk/core';

/**
 * Environment enumeration
 */
export enum Environment {
  DEVELOPMENT = 'development',
  STAGING = 'staging',
  PRODUCTION = 'production',
  TEST = 'test'
}

export const ENV_PREFIX = 'TASKDESK_';

/**
 * Application configuration schema
 */
export const AppConfigSchema = z.object({
  environment: z.nativeEnum(Environment).default(Environment.DEVELOPMENT),
  logLevel: LogLevelSchema.default(LogLevel.INFO),
  prettyPrint: z.boolean().default(false),
  serviceName: z.string().min(1).default('taskdesk'),
  version: z.string().default('0.1.0'),
  defaultPriority: z.nativeEnum(TaskPriority).default(TaskPriority.MEDIUM)
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

/**
 * Configuration loading options
 */
export interface LoadConfigOptions {
  /** Variables to read; defaults to `process.env` */
  readonly env?: NodeJS.ProcessEnv;
  /** Load `.env` from the working directory into `process.env` first */
  readonly loadDotenv?: boolean;
  /** JSON or YAML file applied below environment variables */
  readonly configFile?: string;
  /** Applied last */
  readonly overrides?: AppConfigInput;
}

/**
 * Resolve configuration from defaults, an optional file, `TASKDESK_*`
 * variables and explicit overrides, in that order.
 *
 * @throws ConfigurationError listing every schema violation
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  if (options.loadDotenv ?? true) {
    dotenvConfig();
  }

  const env = options.env ?? process.env;
  const fileValues = options.configFile ? readConfigFile(options.configFile) : {};

  const merged: Record<string, unknown> = {
    ...fileValues,
    ...readEnvironment(env),
    ...options.overrides
  };

  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(
      'Configuration validation failed',
      ErrorFactory.describeZodIssues(result.error)
    );
  }

  return result.data;
}

/**
 * Map prefixed variables to camelCase keys, e.g. `TASKDESK_LOG_LEVEL` to
 * `logLevel`. A recognised `NODE_ENV` seeds `environment` when no prefixed value is set.
 */
export function readEnvironment(env: NodeJS.ProcessEnv, prefix = ENV_PREFIX): Record<string, unknown> {
  const values: Record<string, unknown> = {};

  const nodeEnv = env.NODE_ENV;
  if (nodeEnv && Object.values(Environment).some(value => value === nodeEnv)) {
    values['environment'] = nodeEnv;
  }

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(prefix) || value === undefined) {
      continue;
    }

    values[toCamelCase(key.slice(prefix.length))] = coerceValue(value);
  }

  return values;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  const absolutePath = resolve(filePath);
  let content: string;
  try {
    content = readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read configuration from ${filePath}`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  const extension = extname(absolutePath).toLowerCase();
  let data: unknown;
  try {
    data = extension === '.yaml' || extension === '.yml' ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse configuration from ${filePath}`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigurationError(`Configuration in ${filePath} must be an object`, []);
  }

  return Object.fromEntries(Object.entries(data));
}

function toCamelCase(key: string): string {
  return key
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

function coerceValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}
