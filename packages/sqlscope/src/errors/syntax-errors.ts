/**
 * Parse Diagnostic Classes
 *
 * Every diagnostic the parser records carries a source location so it can be
 * surfaced verbatim with line and column.
 *
 * @packageDocumentation
 */

import { SqlScopeError, ErrorCategory, type ErrorContext } from './base.js';
import { SyntaxErrorCode, ParserErrorCode } from './codes.js';
import { describeTokenType, type SourceLocation, type Token, type TokenType } from '../lexer/types.js';

export type { SourceLocation } from '../lexer/types.js';

/**
 * Quote a token for a diagnostic message
 */
function describeToken(token: Token): string {
  return token.type === 'EOF' ? 'end of input' : `'${token.literal}'`;
}

// =============================================================================
// Parse Diagnostic Base
// =============================================================================

/**
 * Base class for everything the parser records in its error list
 */
export abstract class ParseDiagnostic extends SqlScopeError {
  /** Source location where the diagnostic applies */
  readonly location: SourceLocation;

  /** Original SQL input */
  sql?: string;

  /** Suggested fix (if available) */
  suggestion?: string;

  constructor(
    message: string,
    location: SourceLocation,
    sql?: string,
    options?: { cause?: Error; context?: ErrorContext }
  ) {
    super(`${message} at line ${location.line}, column ${location.column}`, options);
    this.location = location;
    this.sql = sql;

    if (sql) {
      this.context = { ...this.context, sql };
    }
  }

  /**
   * Get the problematic portion of SQL near the error
   */
  getNearbyContext(contextLength = 20): string | undefined {
    if (!this.sql) return undefined;

    const start = Math.max(0, this.location.offset - contextLength);
    const end = Math.min(this.sql.length, this.location.offset + contextLength);

    let context = this.sql.slice(start, end);
    if (start > 0) context = '...' + context;
    if (end < this.sql.length) context = context + '...';

    return context;
  }

  /**
   * Format error with a caret under the offending column
   */
  format(): string {
    const parts: string[] = [this.message];

    if (this.sql) {
      const lines = this.sql.split('\n');
      const line = lines[this.location.line - 1];
      if (line !== undefined) {
        parts.push(`  ${line}`);
        parts.push(`  ${' '.repeat(this.location.column - 1)}^`);
      }
    }

    if (this.suggestion) {
      parts.push(`  Suggestion: ${this.suggestion}`);
    }

    if (this.recoveryHint) {
      parts.push(`  Hint: ${this.recoveryHint}`);
    }

    return parts.join('\n');
  }
}

// =============================================================================
// SQL Syntax Error
// =============================================================================

/**
 * SQL syntax error with location information
 *
 * @example
 * ```typescript
 * const { errors } = parse('SELECT * FORM users');
 * const [error] = errors;
 * if (error instanceof SQLSyntaxError) {
 *   console.log(error.code);      // 'SYNTAX_UNEXPECTED_TOKEN'
 *   console.log(error.location);  // { line: 1, column: 15, offset: 14 }
 *   console.log(error.format());  // message, source line and caret
 * }
 * ```
 */
export class SQLSyntaxError extends ParseDiagnostic {
  readonly code: SyntaxErrorCode;
  readonly category = ErrorCategory.SYNTAX;

  constructor(
    code: SyntaxErrorCode,
    message: string,
    location: SourceLocation,
    sql?: string,
    options?: { cause?: Error; context?: ErrorContext }
  ) {
    super(message, location, sql, options);
    this.name = 'SQLSyntaxError';
    this.code = code;
    this.recoveryHint = 'Check the SQL syntax near the indicated location';
  }

  toUserMessage(): string {
    return 'There is a syntax error in your SQL. ' + this.message;
  }
}

// =============================================================================
// Expected Token Error
// =============================================================================

/**
 * The peek token did not match the token the grammar required
 */
export class ExpectedTokenError extends SQLSyntaxError {
  /** Token type the grammar required */
  readonly expected: TokenType;
  /** Token type actually found */
  readonly actual: TokenType;

  constructor(expected: TokenType, actual: Token, sql?: string) {
    super(
      SyntaxErrorCode.EXPECTED_TOKEN,
      `Expected next token to be ${describeTokenType(expected)}, got ${describeTokenType(actual.type)} instead`,
      actual.location,
      sql
    );
    this.name = 'ExpectedTokenError';
    this.expected = expected;
    this.actual = actual.type;
  }
}

// =============================================================================
// No Prefix Parse Error
// =============================================================================

/**
 * The current token cannot begin any expression
 */
export class NoPrefixParseError extends SQLSyntaxError {
  /** Type of the token that could not start an expression */
  readonly tokenType: TokenType;

  constructor(token: Token, sql?: string) {
    super(
      SyntaxErrorCode.NO_PREFIX_PARSE,
      `No expression can start with ${describeToken(token)}`,
      token.location,
      sql
    );
    this.name = 'NoPrefixParseError';
    this.tokenType = token.type;
  }
}

// =============================================================================
// Unexpected Token Error
// =============================================================================

/**
 * The current token is invalid where it appears
 */
export class UnexpectedTokenError extends SQLSyntaxError {
  /** The unexpected token value */
  readonly token: string;

  /** Human description of what was expected */
  readonly expected: string;

  constructor(token: Token, expected: string, sql?: string) {
    const message = token.type === 'EOF'
      ? `Unexpected end of input, expected ${expected}`
      : `Unexpected token '${token.literal}', expected ${expected}`;

    super(SyntaxErrorCode.UNEXPECTED_TOKEN, message, token.location, sql);
    this.name = 'UnexpectedTokenError';
    this.token = token.literal;
    this.expected = expected;
  }
}

// =============================================================================
// Invalid Literal Error
// =============================================================================

/**
 * A numeric literal could not be converted to a value
 */
export class InvalidLiteralError extends SQLSyntaxError {
  readonly literal: string;

  constructor(token: Token, reason: string, sql?: string) {
    super(
      SyntaxErrorCode.INVALID_LITERAL,
      `Invalid numeric literal '${token.literal}': ${reason}`,
      token.location,
      sql
    );
    this.name = 'InvalidLiteralError';
    this.literal = token.literal;
  }
}

// =============================================================================
// Illegal Token Error
// =============================================================================

/**
 * The tokenizer produced an ILLEGAL token (unknown character, unterminated
 * string or quoted identifier)
 */
export class IllegalTokenError extends SQLSyntaxError {
  readonly literal: string;

  constructor(token: Token, sql?: string) {
    super(
      SyntaxErrorCode.ILLEGAL_TOKEN,
      `Illegal input ${JSON.stringify(token.literal)}`,
      token.location,
      sql
    );
    this.name = 'IllegalTokenError';
    this.literal = token.literal;
  }
}

// =============================================================================
// Unsupported Statement Error
// =============================================================================

/**
 * Statement keyword the parser cannot handle: either unknown, or known with
 * no body parser
 */
export class UnsupportedStatementError extends ParseDiagnostic {
  readonly code: ParserErrorCode.UNSUPPORTED_STATEMENT | ParserErrorCode.NOT_IMPLEMENTED;
  readonly category = ErrorCategory.UNSUPPORTED;

  /** Leading token of the statement */
  readonly statement: string;

  constructor(token: Token, notImplemented: boolean, sql?: string) {
    const keyword = token.literal.toUpperCase();
    super(
      notImplemented
        ? `${keyword} statement parsing is not implemented`
        : `Unsupported statement type: ${token.type === 'EOF' ? 'end of input' : token.literal}`,
      token.location,
      sql
    );
    this.name = 'UnsupportedStatementError';
    this.code = notImplemented ? ParserErrorCode.NOT_IMPLEMENTED : ParserErrorCode.UNSUPPORTED_STATEMENT;
    this.statement = token.literal;
    this.recoveryHint = 'Only SELECT statements are parsed';
  }
}

// =============================================================================
// Parse Cancelled Error
// =============================================================================

export type CancellationReason = 'aborted' | 'deadline';

/**
 * Cooperative cancellation was observed before a token advance
 */
export class ParseCancelledError extends ParseDiagnostic {
  readonly code = ParserErrorCode.CANCELLED;
  readonly category = ErrorCategory.CANCELLED;

  readonly reason: CancellationReason;

  constructor(reason: CancellationReason, location: SourceLocation, sql?: string) {
    super(
      reason === 'deadline'
        ? 'Parsing cancelled: deadline exceeded'
        : 'Parsing cancelled: signal aborted',
      location,
      sql
    );
    this.name = 'ParseCancelledError';
    this.reason = reason;
  }
}
