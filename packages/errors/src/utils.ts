/**
 * Error handling utilities and helper functions
 */

import { getCurrentErrorContext } from './context.js';
import {
  FileSystemError,
  FileNotFoundError,
  ValidationError,
  ConfigurationError,
} from './domain-errors.js';
import { FileKitError, type DomainErrorOptions, type ErrorContext } from './types.js';

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: E };

export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function failure<E = Error>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap a sync operation to return a Result instead of throwing
 */
export function safe<T>(operation: () => T): Result<T, Error> {
  try {
    return success(operation());
  } catch (error) {
    return failure(toError(error));
  }
}

/**
 * Read the errno code (`ENOENT`, `EXDEV`, ...) from an error raised by Node's fs
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

type FactoryOptions = DomainErrorOptions & { context?: Partial<ErrorContext> };

function contextFor(operation: string, options: FactoryOptions): ErrorContext {
  return { ...getCurrentErrorContext({ operation }), ...options.context };
}

/**
 * Error factory functions that pick up the current error context
 */
export class ErrorFactory {
  static filesystem(message: string, options: FactoryOptions = {}): FileSystemError {
    return new FileSystemError(message, contextFor('filesystem_operation', options), options);
  }

  static notFound(message: string, options: FactoryOptions = {}): FileNotFoundError {
    return new FileNotFoundError(message, contextFor('filesystem_operation', options), options);
  }

  static validation(message: string, options: FactoryOptions = {}): ValidationError {
    return new ValidationError(message, contextFor('validation', options), options);
  }

  static configuration(message: string, options: FactoryOptions = {}): ConfigurationError {
    return new ConfigurationError(message, contextFor('configuration', options), options);
  }
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof FileKitError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}
