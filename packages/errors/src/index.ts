/**
 * Error handling module - standardized errors for filekit packages
 *
 * Features:
 * - Domain-specific error types with metadata
 * - Error context tracking with correlation IDs
 * - Result types for safe error handling
 * - Error factory functions for consistent error creation
 */

export {
  ErrorSeverity,
  RetryClassification,
  ErrorCategory,
  FileKitError,
  type DomainErrorOptions,
  type ErrorContext,
  type ErrorMetadata,
} from './types.js';

export {
  FileSystemError,
  FileNotFoundError,
  ValidationError,
  ConfigurationError,
} from './domain-errors.js';

export {
  ErrorContextManager,
  runWithErrorContext,
  getCurrentErrorContext,
  type ContextOptions,
} from './context.js';

export {
  type Result,
  success,
  failure,
  safe,
  toError,
  errnoCode,
  ErrorFactory,
  extractErrorInfo,
} from './utils.js';
