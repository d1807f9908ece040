/**
 * @fileoverview Structured logging framework using Pino for TaskDesk
 */

import { hostname } from 'os';
import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger, LoggerOptions } from 'pino';
import pinoPretty from 'pino-pretty';
import { LogLevel } from '@taskdesk/core';
import type { StructuredLogger } from '@taskdesk/core';
import { Environment } from '../config';
import type { AppConfig } from '../config';

/**
 * Log context interface for structured logging
 */
export interface LogContext {
  readonly component?: string;
  readonly operation?: string;
  readonly taskId?: number;
  readonly duration?: number;
  readonly [key: string]: unknown;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  readonly level: LogLevel;
  readonly environment: Environment;
  readonly serviceName: string;
  readonly serviceVersion: string;
  readonly prettyPrint?: boolean;
  readonly destination?: string | DestinationStream; // 'stdout', 'stderr', a file path or a custom sink
}

/**
 * Performance timing helper
 */
export class Timer {
  private startTime: number;
  private endTime?: number;

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Stop the timer and return duration in milliseconds
   */
  stop(): number {
    this.endTime = Date.now();
    return this.duration();
  }

  duration(): number {
    const end = this.endTime ?? Date.now();
    return end - this.startTime;
  }
}

/**
 * Thin wrapper over pino that keeps a base context and accepts either a
 * message or an error first
 */
export class Logger implements StructuredLogger {
  private pino: PinoLogger;
  private baseContext: LogContext;
  private config: LoggerConfig;

  constructor(config: LoggerConfig, baseContext: LogContext = {}, instance?: PinoLogger) {
    this.config = config;
    this.baseContext = baseContext;
    this.pino = instance ?? this.createPinoLogger(config);
  }

  private createPinoLogger(config: LoggerConfig): PinoLogger {
    const options: LoggerOptions = {
      name: config.serviceName,
      level: config.level,
      base: {
        service: config.serviceName,
        version: config.serviceVersion,
        environment: config.environment,
        pid: process.pid,
        hostname: process.env.HOSTNAME || hostname()
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label })
      }
    };

    if (config.prettyPrint && config.environment === Environment.DEVELOPMENT) {
      return pino(options, pinoPretty({
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service,version,environment',
        destination: prettyDestination(config.destination)
      }));
    }

    return pino(options, resolveDestination(config.destination));
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(this.config, { ...this.baseContext, ...context }, this.pino);
  }

  timer(): Timer {
    return new Timer();
  }

  trace(message: string, context?: LogContext): void;
  trace(error: Error, message: string, context?: LogContext): void;
  trace(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.TRACE, messageOrError, messageOrContext, context);
  }

  debug(message: string, context?: LogContext): void;
  debug(error: Error, message: string, context?: LogContext): void;
  debug(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.DEBUG, messageOrError, messageOrContext, context);
  }

  info(message: string, context?: LogContext): void;
  info(error: Error, message: string, context?: LogContext): void;
  info(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.INFO, messageOrError, messageOrContext, context);
  }

  warn(message: string, context?: LogContext): void;
  warn(error: Error, message: string, context?: LogContext): void;
  warn(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.WARN, messageOrError, messageOrContext, context);
  }

  error(message: string, context?: LogContext): void;
  error(error: Error, message?: string, context?: LogContext): void;
  error(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.ERROR, messageOrError, messageOrContext, context);
  }

  fatal(message: string, context?: LogContext): void;
  fatal(error: Error, message?: string, context?: LogContext): void;
  fatal(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.FATAL, messageOrError, messageOrContext, context);
  }

  private log(
    level: LogLevel,
    messageOrError: string | Error,
    messageOrContext?: string | LogContext,
    context?: LogContext
  ): void {
    const logContext: Record<string, unknown> = {
      ...this.baseContext,
      ...(typeof messageOrContext === 'object' ? messageOrContext : {}),
      ...context
    };

    let message: string;
    if (messageOrError instanceof Error) {
      message = typeof messageOrContext === 'string' ? messageOrContext : messageOrError.message;
      logContext['error'] = {
        name: messageOrError.name,
        message: messageOrError.message,
        stack: messageOrError.stack
      };
    } else {
      message = messageOrError;
    }

    this.pino[level](logContext, message);
  }

  /**
   * Flush pending log entries (useful before process exit)
   */
  flush(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.pino.flush((error) => (error ? reject(error) : resolve()));
    });
  }
}

function prettyDestination(destination: LoggerConfig['destination']): number | string | DestinationStream {
  if (destination === undefined || destination === 'stdout') {
    return 1;
  }
  if (destination === 'stderr') {
    return 2;
  }
  return destination;
}

function resolveDestination(destination: LoggerConfig['destination']): DestinationStream {
  if (destination === undefined || destination === 'stdout') {
    return process.stdout;
  }
  if (destination === 'stderr') {
    return process.stderr;
  }
  if (typeof destination === 'string') {
    return pino.destination({ dest: destination, sync: false, mkdir: true });
  }
  return destination;
}

/**
 * Build the application logger from resolved configuration
 */
export function createLogger(
  config: AppConfig,
  options: Pick<LoggerConfig, 'destination'> & { baseContext?: LogContext } = {}
): Logger {
  return new Logger(
    {
      level: config.logLevel,
      environment: config.environment,
      serviceName: config.serviceName,
      serviceVersion: config.version,
      prettyPrint: config.prettyPrint,
      destination: options.destination
    },
    options.baseContext
  );
}
