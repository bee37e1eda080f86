/**
 * Domain-specific error classes
 */

import {
  FileKitError,
  ErrorSeverity,
  ErrorCategory,
  RetryClassification,
  type DomainErrorOptions,
  type ErrorContext,
  type ErrorMetadata,
} from './types.js';

type RequiredMetadata = Partial<ErrorMetadata> & {
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: ErrorContext;
};

function buildMetadata(
  category: ErrorCategory,
  context: ErrorContext,
  options: DomainErrorOptions,
  defaults: { severity: ErrorSeverity; retryClassification: RetryClassification },
  recoveryActions: string[]
): RequiredMetadata {
  const metadata: RequiredMetadata = {
    severity: options.severity ?? defaults.severity,
    category,
    retryClassification: options.retryClassification ?? defaults.retryClassification,
    context,
    recoveryActions,
  };

  if (options.cause !== undefined) {
    metadata.cause = options.cause;
  }
  if (options.data !== undefined) {
    metadata.data = options.data;
  }

  return metadata;
}

/**
 * File system errors (missing entries, wrong entry type, failed rename or unlink)
 */
export class FileSystemError extends FileKitError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'FILESYSTEM_ERROR',
      buildMetadata(
        ErrorCategory.FILESYSTEM,
        context,
        options,
        {
          severity: ErrorSeverity.HIGH,
          retryClassification: RetryClassification.CONDITIONALLY_RETRYABLE,
        },
        [
          'Check file permissions',
          'Check file path validity',
          'Ensure source and destination are on the same volume',
        ]
      )
    );
  }
}

/**
 * A path that was required to exist does not
 */
export class FileNotFoundError extends FileSystemError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(message, context, {
      retryClassification: RetryClassification.NON_RETRYABLE,
      ...options,
      code: options.code ?? 'FILE_NOT_FOUND',
    });
  }
}

/**
 * Invalid input
 */
export class ValidationError extends FileKitError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'VALIDATION_ERROR',
      buildMetadata(
        ErrorCategory.VALIDATION,
        context,
        options,
        { severity: ErrorSeverity.MEDIUM, retryClassification: RetryClassification.NON_RETRYABLE },
        ['Check input values']
      )
    );
  }
}

/**
 * Invalid configuration
 */
export class ConfigurationError extends FileKitError {
  constructor(message: string, context: ErrorContext, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'CONFIGURATION_ERROR',
      buildMetadata(
        ErrorCategory.CONFIGURATION,
        context,
        options,
        {
          severity: ErrorSeverity.CRITICAL,
          retryClassification: RetryClassification.NON_RETRYABLE,
        },
        ['Check FILEKIT_* environment variables']
      )
    );
  }
}
