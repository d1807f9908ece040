/**
 * @fileoverview Common utility types for TaskDesk
 */

import { z } from 'zod';

/**
 * Log level enumeration
 */
export enum LogLevel {
  TRACE = 'trace',
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export const LogLevelSchema = z.nativeEnum(LogLevel);

/**
 * Minimal structured logger accepted by core components.
 * The shared package's Logger satisfies it.
 */
export interface StructuredLogger {
  debug(message: string, context?: Record<string, unknown>): void;
}
