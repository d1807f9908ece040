/**
 * @fileoverview Shared configuration and logging for TaskDesk
 * @version 0.1.0
 */

// Configuration Management
export type {
  AppConfig,
  AppConfigInput,
  LoadConfigOptions
} from './config';
export {
  AppConfigSchema,
  ENV_PREFIX,
  Environment,
  loadConfig,
  readEnvironment
} from './config';

// Structured Logging
export type {
  LogContext,
  LoggerConfig
} from './logger';
export {
  Logger,
  Timer,
  createLogger
} from './logger';
