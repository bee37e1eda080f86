/**
 * Error context utilities for correlation tracking and operation context
 */

import { randomUUID } from 'crypto';

import type { ErrorContext } from './types.js';

export interface ContextOptions {
  operation?: string;
  component?: string;
  metadata?: Record<string, unknown>;
  correlationId?: string;
}

/**
 * Context manager for tracking operations and generating correlation IDs
 */
export class ErrorContextManager {
  private static instance: ErrorContextManager | undefined;
  private contextStack: ErrorContext[] = [];
  private currentContext: ErrorContext | null = null;

  private constructor() {}

  static getInstance(): ErrorContextManager {
    if (!ErrorContextManager.instance) {
      ErrorContextManager.instance = new ErrorContextManager();
    }
    return ErrorContextManager.instance;
  }

  static generateCorrelationId(): string {
    return randomUUID();
  }

  static createContext(options: ContextOptions): ErrorContext {
    const context: ErrorContext = {
      correlationId: options.correlationId || ErrorContextManager.generateCorrelationId(),
      timestamp: new Date(),
    };

    if (options.operation !== undefined) {
      context.operation = options.operation;
    }
    if (options.component !== undefined) {
      context.component = options.component;
    }
    if (options.metadata !== undefined) {
      context.metadata = options.metadata;
    }

    return context;
  }

  getCurrentContext(): ErrorContext | null {
    return this.currentContext;
  }

  /**
   * Push a new context onto the stack (for nested operations)
   */
  pushContext(context: ErrorContext): void {
    if (this.currentContext) {
      this.contextStack.push(this.currentContext);
    }
    this.currentContext = context;
  }

  /**
   * Pop the previous context from the stack
   */
  popContext(): ErrorContext | null {
    this.currentContext = this.contextStack.pop() ?? null;
    return this.currentContext;
  }

  clearContext(): void {
    this.currentContext = null;
    this.contextStack = [];
  }
}

/**
 * Run a synchronous operation with an error context. Nested calls inherit the
 * correlation ID of the enclosing context.
 */
export function runWithErrorContext<T>(operation: () => T, contextOptions: ContextOptions): T {
  const contextManager = ErrorContextManager.getInstance();
  const parent = contextManager.getCurrentContext();

  const options: ContextOptions = { ...contextOptions };
  if (options.correlationId === undefined && parent) {
    options.correlationId = parent.correlationId;
  }

  contextManager.pushContext(ErrorContextManager.createContext(options));

  try {
    return operation();
  } finally {
    contextManager.popContext();
  }
}

/**
 * Get current error context or create a default one
 */
export function getCurrentErrorContext(fallbackOptions?: {
  operation?: string;
  component?: string;
}): ErrorContext {
  const currentContext = ErrorContextManager.getInstance().getCurrentContext();

  if (currentContext) {
    return currentContext;
  }

  const defaultOptions: ContextOptions = {
    operation: fallbackOptions?.operation || 'unknown',
  };
  if (fallbackOptions?.component !== undefined) {
    defaultOptions.component = fallbackOptions.component;
  }

  return ErrorContextManager.createContext(defaultOptions);
}
