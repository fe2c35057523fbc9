/**
 * Standardized error handling utilities for the knowledge graph
 *
 * Provides consistent error logging, categorization and typed error classes
 * across sync, storage, inference and retrieval.
 */

/**
 * Error categories for classification and handling
 */
export enum ErrorCategory {
  SYNC = 'sync',
  SOURCE = 'source',
  STORAGE = 'storage',
  INFERENCE = 'inference',
  EMBEDDING = 'embedding',
  RETRIEVAL = 'retrieval',
  GRAPH = 'graph',
  CONFIGURATION = 'configuration'
}

/**
 * Error severity levels for prioritization
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export type ErrorContext = Record<string, string | number | boolean | null | undefined>;

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  originalError?: Error;
  context?: ErrorContext;
  timestamp: Date;
  recoveryHint?: string;
}

export interface ErrorResult {
  success: false;
  error: ErrorInfo;
}

export interface SuccessResult<T> {
  success: true;
  data: T;
}

/**
 * Combined result type for fallible operations
 */
export type OperationResult<T> = SuccessResult<T> | ErrorResult;

/**
 * Base class for errors raised by this package
 */
export class KnowledgeGraphError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.category = category;
  }
}

/** Invalid graph mutation (unknown node, wrong endpoint kinds, capacity) */
export class GraphError extends KnowledgeGraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCategory.GRAPH, message, options);
  }
}

/** Persisted graph could not be written or is malformed */
export class StorageError extends KnowledgeGraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCategory.STORAGE, message, options);
  }
}

/** External artifact store delivered unreadable data */
export class SourceError extends KnowledgeGraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCategory.SOURCE, message, options);
  }
}

/** Embedding collaborator failed or timed out */
export class EmbeddingError extends KnowledgeGraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCategory.EMBEDDING, message, options);
  }
}

export class ConfigurationError extends KnowledgeGraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCategory.CONFIGURATION, message, options);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Standard error handler with categorization and recovery hints
 */
export class ErrorHandler {
  private static errorCounts = new Map<string, number>();

  /**
   * Handle an error with categorization and logging
   */
  static handle(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: ErrorContext,
    recoveryHint?: string
  ): ErrorInfo {
    const errorInfo: ErrorInfo = {
      category,
      severity,
      message,
      originalError,
      context,
      timestamp: new Date(),
      recoveryHint
    };

    this.logError(errorInfo);
    this.trackErrorFrequency(category, message);

    return errorInfo;
  }

  static createErrorResult(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: ErrorContext,
    recoveryHint?: string
  ): ErrorResult {
    return {
      success: false,
      error: this.handle(category, severity, message, originalError, context, recoveryHint)
    };
  }

  static createSuccessResult<T>(data: T): SuccessResult<T> {
    return {
      success: true,
      data
    };
  }

  /**
   * Wrap an operation with error handling. Failures are logged and returned,
   * never rethrown.
   */
  static async wrapOperation<T>(
    operation: () => Promise<T>,
    category: ErrorCategory,
    operationName: string,
    context?: ErrorContext,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM
  ): Promise<OperationResult<T>> {
    try {
      const result = await operation();
      return this.createSuccessResult(result);
    } catch (error) {
      const cause = toError(error);
      const errorCategory = cause instanceof KnowledgeGraphError ? cause.category : category;
      return this.createErrorResult(
        errorCategory,
        severity,
        `Failed to ${operationName}`,
        cause,
        context,
        `Check ${errorCategory} inputs and retry`
      );
    }
  }

  /**
   * Log error with formatting appropriate to its severity
   */
  private static logError(errorInfo: ErrorInfo): void {
    const emoji = this.getSeverityEmoji(errorInfo.severity);

    const logMessage = [
      `${emoji} [${errorInfo.category.toUpperCase()}] ${errorInfo.message}`,
      `   Severity: ${errorInfo.severity}`,
      `   Time: ${errorInfo.timestamp.toISOString()}`,
      errorInfo.context ? `   Context: ${JSON.stringify(errorInfo.context)}` : '',
      errorInfo.recoveryHint ? `   💡 Hint: ${errorInfo.recoveryHint}` : '',
      errorInfo.originalError ? `   Original: ${errorInfo.originalError.message}` : ''
    ].filter(Boolean).join('\n');

    if (errorInfo.severity === ErrorSeverity.CRITICAL) {
      console.error(logMessage);
    } else if (errorInfo.severity === ErrorSeverity.HIGH || errorInfo.severity === ErrorSeverity.MEDIUM) {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }
  }

  private static trackErrorFrequency(category: ErrorCategory, message: string): void {
    const key = `${category}:${message}`;
    const currentCount = this.errorCounts.get(key) ?? 0;
    this.errorCounts.set(key, currentCount + 1);

    if (currentCount > 5) {
      console.warn(`🔔 Frequent error detected: ${key} (${currentCount + 1} times)`);
    }
  }

  private static getSeverityEmoji(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.CRITICAL: return '🚨';
      case ErrorSeverity.HIGH: return '⚠️';
      case ErrorSeverity.MEDIUM: return '⚡';
      case ErrorSeverity.LOW: return 'ℹ️';
    }
  }

  /**
   * Error statistics for monitoring
   */
  static getErrorStats(): Record<string, number> {
    return Object.fromEntries(this.errorCounts.entries());
  }

  static resetErrorStats(): void {
    this.errorCounts.clear();
  }
}
