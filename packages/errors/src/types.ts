/**
 * Error types and base classes for standardized error handling across filekit packages
 */

/**
 * Error severity levels for classification and handling
 */
export enum ErrorSeverity {
  /** Low severity - informational errors that don't affect operation */
  LOW = 'low',
  /** Medium severity - errors that may affect some functionality */
  MEDIUM = 'medium',
  /** High severity - errors that significantly impact functionality */
  HIGH = 'high',
  /** Critical severity - errors that prevent core functionality */
  CRITICAL = 'critical',
}

/**
 * Error retry classification. Nothing in filekit retries on its own; callers may.
 */
export enum RetryClassification {
  NON_RETRYABLE = 'non_retryable',
  RETRYABLE = 'retryable',
  CONDITIONALLY_RETRYABLE = 'conditionally_retryable',
}

/**
 * Error categories for domain-specific error handling
 */
export enum ErrorCategory {
  /** File system errors (missing entries, wrong entry type, failed primitives) */
  FILESYSTEM = 'filesystem',
  /** Invalid input */
  VALIDATION = 'validation',
  /** Invalid runtime configuration */
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown',
}

/**
 * Error context for tracking operations and debugging
 */
export interface ErrorContext {
  /** Unique correlation ID for tracking errors across operations */
  correlationId: string;
  /** Operation name, e.g. `move` */
  operation?: string;
  /** Component where the error occurred */
  component?: string;
  /** Additional metadata for debugging */
  metadata?: Record<string, unknown>;
  timestamp: Date;
}

export interface ErrorMetadata {
  severity: ErrorSeverity;
  category: ErrorCategory;
  retryClassification: RetryClassification;
  context: ErrorContext;
  /** Original error that caused this error (error chaining) */
  cause?: Error;
  /** Additional error-specific data */
  data?: Record<string, unknown>;
  /** Suggested recovery actions */
  recoveryActions?: string[];
}

/**
 * Options accepted by every domain error constructor
 */
export interface DomainErrorOptions {
  code?: string;
  cause?: Error;
  data?: Record<string, unknown>;
  severity?: ErrorSeverity;
  retryClassification?: RetryClassification;
}

/**
 * Base error class with metadata and context tracking
 */
export abstract class FileKitError extends Error {
  public readonly code: string;
  public readonly metadata: ErrorMetadata;

  constructor(
    message: string,
    code: string,
    metadata: Partial<ErrorMetadata> & {
      severity: ErrorSeverity;
      category: ErrorCategory;
      context: ErrorContext;
    }
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    this.metadata = {
      retryClassification: RetryClassification.NON_RETRYABLE,
      ...metadata,
    };

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.metadata.severity,
      category: this.metadata.category,
      retryClassification: this.metadata.retryClassification,
      correlationId: this.metadata.context.correlationId,
      operation: this.metadata.context.operation,
      component: this.metadata.context.component,
      timestamp: this.metadata.context.timestamp,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(this.metadata.cause && { cause: this.metadata.cause.message }),
    };
  }

  isConditionallyRetryable(): boolean {
    return this.metadata.retryClassification === RetryClassification.CONDITIONALLY_RETRYABLE;
  }
}
