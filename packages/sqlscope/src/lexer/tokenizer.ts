/**
 * SQL Server Tokenizer
 *
 * Forward-only scanner that hands the parser one token at a time. Handles
 * keywords, identifiers (plain, [bracketed] and "quoted"), numbers, string
 * literals (including N'...'), operators, punctuation and comments.
 *
 * @packageDocumentation
 */

import { lookupKeyword, type SourceLocation, type Token, type TokenType } from './types.js';

// =============================================================================
// CHARACTER CLASSES
// =============================================================================

const NON_ASCII_LETTER = /\p{L}/u;

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r' || char === '\f' || char === '\v';
}

function isIdentifierStart(char: string): boolean {
  return (char >= 'a' && char <= 'z')
    || (char >= 'A' && char <= 'Z')
    || char === '_'
    || char === '@'
    || char === '#'
    || (char > '\x7f' && NON_ASCII_LETTER.test(char));
}

function isIdentifierPart(char: string): boolean {
  return isIdentifierStart(char) || isDigit(char) || char === '$';
}

// =============================================================================
// TOKENIZER CLASS
// =============================================================================

/**
 * SQL Tokenizer
 *
 * @example
 * ```typescript
 * const tokenizer = new Tokenizer('SELECT a FROM t');
 * tokenizer.next(); // { type: 'SELECT', literal: 'SELECT', location: { line: 1, column: 1, offset: 0 } }
 * ```
 */
export class Tokenizer {
  private readonly sql: string;
  private pos = 0;
  private line = 1;
  private column = 1;
  private eof: Token | null = null;

  constructor(sql: string) {
    this.sql = sql;
  }

  /**
   * Scan and return the next token. Once the input is exhausted every call
   * returns the same EOF token.
   */
  next(): Token {
    if (this.eof) {
      return this.eof;
    }

    this.skipTrivia();
    const loc = this.location();

    if (this.pos >= this.sql.length) {
      this.eof = { type: 'EOF', literal: '', location: loc };
      return this.eof;
    }

    const char = this.peek();

    if ((char === 'N' || char === 'n') && this.peek(1) === "'") {
      this.advance(); // N prefix
      return this.readString(loc);
    }

    if (char === "'") {
      return this.readString(loc);
    }

    if (char === '[') {
      return this.readDelimitedIdentifier(loc, ']');
    }

    if (char === '"') {
      return this.readDelimitedIdentifier(loc, '"');
    }

    if (isDigit(char) || (char === '.' && isDigit(this.peek(1)))) {
      return this.readNumber(loc);
    }

    if (isIdentifierStart(char)) {
      return this.readIdentifier(loc);
    }

    return this.readOperator(loc, char);
  }

  /**
   * Get current source location
   */
  private location(): SourceLocation {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  /**
   * Advance position by one character
   */
  private advance(): string {
    const char = this.sql[this.pos] ?? '';
    this.pos++;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  /**
   * Peek at character at offset from current position
   */
  private peek(offset = 0): string {
    return this.sql[this.pos + offset] ?? '';
  }

  private token(type: TokenType, literal: string, location: SourceLocation): Token {
    return { type, literal, location };
  }

  /**
   * Skip whitespace, `--` line comments and `/* *\/` block comments
   */
  private skipTrivia(): void {
    while (this.pos < this.sql.length) {
      const char = this.peek();

      if (isWhitespace(char)) {
        this.advance();
        continue;
      }

      if (char === '-' && this.peek(1) === '-') {
        while (this.pos < this.sql.length && this.peek() !== '\n') {
          this.advance();
        }
        continue;
      }

      if (char === '/' && this.peek(1) === '*') {
        this.advance(); // /
        this.advance(); // *
        while (this.pos < this.sql.length && !(this.peek() === '*' && this.peek(1) === '/')) {
          this.advance();
        }
        if (this.pos < this.sql.length) {
          this.advance(); // *
          this.advance(); // /
        }
        continue;
      }

      return;
    }
  }

  /**
   * Read a single-quoted string literal; a doubled quote is one quote
   */
  private readString(loc: SourceLocation): Token {
    const start = this.pos;
    let value = '';
    this.advance(); // opening quote

    while (this.pos < this.sql.length) {
      const char = this.peek();
      if (char === "'") {
        if (this.peek(1) === "'") {
          value += "'";
          this.advance();
          this.advance();
          continue;
        }
        this.advance(); // closing quote
        return this.token('STRING', value, loc);
      }
      value += this.advance();
    }

    return this.token('ILLEGAL', this.sql.slice(start), loc);
  }

  /**
   * Read a [bracketed] or "quoted" identifier; a doubled closing delimiter is
   * one literal character
   */
  private readDelimitedIdentifier(loc: SourceLocation, close: string): Token {
    const start = this.pos;
    let value = '';
    this.advance(); // opening delimiter

    while (this.pos < this.sql.length) {
      const char = this.peek();
      if (char === close) {
        if (this.peek(1) === close) {
          value += close;
          this.advance();
          this.advance();
          continue;
        }
        this.advance(); // closing delimiter
        return this.token('IDENT', value, loc);
      }
      value += this.advance();
    }

    return this.token('ILLEGAL', this.sql.slice(start), loc);
  }

  /**
   * Read numeric literal text; conversion happens in the parser
   */
  private readNumber(loc: SourceLocation): Token {
    const start = this.pos;

    while (isDigit(this.peek())) {
      this.advance();
    }

    if (this.peek() === '.' && isDigit(this.peek(1))) {
      this.advance(); // .
      while (isDigit(this.peek())) {
        this.advance();
      }
    }

    const marker = this.peek();
    if (marker === 'e' || marker === 'E') {
      const sign = this.peek(1);
      const hasSign = sign === '+' || sign === '-';
      if (isDigit(this.peek(hasSign ? 2 : 1))) {
        this.advance(); // e
        if (hasSign) {
          this.advance();
        }
        while (isDigit(this.peek())) {
          this.advance();
        }
      }
    }

    return this.token('NUMBER', this.sql.slice(start, this.pos), loc);
  }

  /**
   * Read identifier or keyword
   */
  private readIdentifier(loc: SourceLocation): Token {
    const start = this.pos;

    while (this.pos < this.sql.length && isIdentifierPart(this.peek())) {
      this.advance();
    }

    const literal = this.sql.slice(start, this.pos);
    return this.token(lookupKeyword(literal) ?? 'IDENT', literal, loc);
  }

  /**
   * Read operator or punctuation
   */
  private readOperator(loc: SourceLocation, char: string): Token {
    const next = this.peek(1);

    switch (char) {
      case '<':
        if (next === '=' || next === '>') {
          this.advance();
          this.advance();
          return this.token(next === '=' ? 'LTE' : 'NOT_EQ', char + next, loc);
        }
        break;
      case '>':
        if (next === '=') {
          this.advance();
          this.advance();
          return this.token('GTE', '>=', loc);
        }
        break;
      case '!':
        if (next === '=') {
          this.advance();
          this.advance();
          return this.token('NOT_EQ', '!=', loc);
        }
        break;
    }

    this.advance();

    switch (char) {
      case '=': return this.token('EQ', char, loc);
      case '<': return this.token('LT', char, loc);
      case '>': return this.token('GT', char, loc);
      case '+': return this.token('PLUS', char, loc);
      case '-': return this.token('MINUS', char, loc);
      case '*': return this.token('ASTERISK', char, loc);
      case '/': return this.token('SLASH', char, loc);
      case '%': return this.token('MODULO', char, loc);
      case ',': return this.token('COMMA', char, loc);
      case ';': return this.token('SEMICOLON', char, loc);
      case '(': return this.token('LPAREN', char, loc);
      case ')': return this.token('RPAREN', char, loc);
      case '.': return this.token('DOT', char, loc);
      default: return this.token('ILLEGAL', char, loc);
    }
  }
}

// =============================================================================
// CONVENIENCE FUNCTIONS
// =============================================================================

/**
 * Tokenize a whole SQL string; the last element is always the EOF token
 */
export function tokenize(sql: string): Token[] {
  const tokenizer = new Tokenizer(sql);
  const tokens: Token[] = [];

  for (;;) {
    const token = tokenizer.next();
    tokens.push(token);
    if (token.type === 'EOF') {
      return tokens;
    }
  }
}
