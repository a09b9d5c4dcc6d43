/**
 * SQLScope Error Hierarchy
 *
 * All errors extend SqlScopeError which provides:
 * - Required error codes
 * - Timestamps
 * - Context preservation
 * - JSON serialization for downstream formatters
 * - Recovery hints
 * - Structured logging support
 *
 * @packageDocumentation
 */

// =============================================================================
// Error Context
// =============================================================================

/**
 * Context that can be attached to any error
 */
export interface ErrorContext {
  /** SQL text that caused the error */
  sql?: string;
  /** Zero-based index of the statement within a batch */
  statementIndex?: number;
  /** Fingerprint of the statement being analyzed */
  fingerprint?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Serialized error format for formatters and log pipelines
 */
export interface SerializedError {
  /** Error class name */
  name: string;
  /** Machine-readable error code */
  code: string;
  /** Human-readable error message */
  message: string;
  /** Timestamp when error occurred */
  timestamp: number;
  /** Error context */
  context?: ErrorContext;
  /** Stack trace (optional, may be omitted in production) */
  stack?: string;
  /** Serialized cause error */
  cause?: SerializedError;
}

/**
 * Log entry format for structured logging
 */
export interface ErrorLogEntry {
  /** Log level */
  level: 'error' | 'warn';
  /** ISO timestamp */
  timestamp: string;
  /** Error details */
  error: {
    name: string;
    code: string;
    message: string;
    stack?: string;
  };
  /** Additional metadata */
  metadata: Record<string, unknown>;
}

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories for consistent handling by callers
 */
export enum ErrorCategory {
  /** Malformed query text */
  SYNTAX = 'SYNTAX',
  /** Query text is well formed but not supported */
  UNSUPPORTED = 'UNSUPPORTED',
  /** Caller cancelled the operation */
  CANCELLED = 'CANCELLED',
  /** Invalid configuration or API misuse */
  VALIDATION = 'VALIDATION',
  /** Internal errors (bugs, unexpected states) */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// Base SQLScope Error
// =============================================================================

/**
 * Base error class for all SQLScope errors
 *
 * @example
 * ```typescript
 * const { errors } = parse('SELECT FROM t');
 * for (const error of errors) {
 *   console.log(error.code);        // 'SYNTAX_NO_PREFIX_PARSE'
 *   console.log(error.toJSON());    // serializable form
 * }
 * ```
 */
export abstract class SqlScopeError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  /** Error category for consistent handling */
  abstract readonly category: ErrorCategory;

  /** Timestamp when error occurred */
  readonly timestamp: number;

  /** Error context */
  context?: ErrorContext;

  /** Recovery hint for developers */
  recoveryHint?: string;

  constructor(message: string, options?: { cause?: Error; context?: ErrorContext }) {
    super(message, { cause: options?.cause });
    this.timestamp = Date.now();
    this.context = options?.context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get a user-friendly error message
   * Override in subclasses for specific messages
   */
  toUserMessage(): string {
    return this.message;
  }

  /**
   * Serialize error for formatters
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };

    if (this.context) {
      result.context = this.context;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause instanceof SqlScopeError) {
      result.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      result.cause = {
        name: this.cause.name,
        code: 'UNKNOWN',
        message: this.cause.message,
        timestamp: this.timestamp,
        stack: this.cause.stack,
      };
    }

    return result;
  }

  /**
   * Format error for structured logging
   */
  toLogEntry(): ErrorLogEntry {
    return {
      level: 'error',
      timestamp: new Date(this.timestamp).toISOString(),
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        stack: this.stack,
      },
      metadata: {
        category: this.category,
        recoveryHint: this.recoveryHint,
        ...this.context,
      },
    };
  }

  /**
   * Create error with additional context
   */
  withContext(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }

  /**
   * Set recovery hint
   */
  withRecoveryHint(hint: string): this {
    this.recoveryHint = hint;
    return this;
  }
}

// =============================================================================
// Generic Error
// =============================================================================

/**
 * Error wrapping a foreign exception that has no dedicated class
 */
export class GenericSqlScopeError extends SqlScopeError {
  readonly code: string;
  readonly category = ErrorCategory.INTERNAL;

  constructor(code: string, message: string, options?: { cause?: Error; context?: ErrorContext }) {
    super(message, options);
    this.name = 'GenericSqlScopeError';
    this.code = code;
  }
}
