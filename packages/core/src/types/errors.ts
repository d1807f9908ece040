/**
 * @fileoverview Error handling types and custom error classes for TaskDesk
 */

import { z } from 'zod';

/**
 * Error category enumeration
 */
export enum ErrorCategory {
  VALIDATION_ERROR = 'validation_error',
  CONFIGURATION_ERROR = 'configuration_error'
}

/**
 * Base error information interface
 */
export interface ErrorInfo {
  readonly code: string;
  readonly message: string;
  readonly category: ErrorCategory;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown> | undefined;
  readonly stackTrace?: string | undefined;
}

/**
 * Base TaskDesk error class
 */
export abstract class TaskDeskError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown> | undefined;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    context?: Record<string, unknown> | undefined
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.timestamp = new Date();
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to serializable object
   */
  toJSON(): ErrorInfo {
    return {
      code: this.code,
      message: this.message,
      category: this.category,
      timestamp: this.timestamp,
      context: this.context,
      stackTrace: this.stack
    };
  }
}

/**
 * Raised when a task field value violates its constraints
 */
export class ValidationError extends TaskDeskError {
  public readonly field: string;

  constructor(
    field: string,
    value: unknown,
    constraint: string
  ) {
    super(
      'VALIDATION_ERROR',
      `Validation failed for field '${field}': ${constraint}`,
      ErrorCategory.VALIDATION_ERROR,
      { field, value, constraint }
    );
    this.field = field;
  }
}

/**
 * Raised when configuration sources do not satisfy the config schema
 */
export class ConfigurationError extends TaskDeskError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super(
      'CONFIGURATION_ERROR',
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      ErrorCategory.CONFIGURATION_ERROR,
      { issues }
    );
    this.issues = issues;
  }
}

/**
 * Error factory for creating typed errors
 */
export class ErrorFactory {
  /**
   * Wrap the first issue of a failed zod parse
   */
  static fromZodError(field: string, value: unknown, error: z.ZodError): ValidationError {
    const issue = error.issues[0];
    return new ValidationError(field, value, issue ? issue.message : 'Invalid value');
  }

  /**
   * Flatten zod issues into `path: message` strings
   */
  static describeZodIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
  }
}
