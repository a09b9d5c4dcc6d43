/**
 * SQL Server Query Parser
 *
 * Recursive-descent parser over a current/peek token window. Grammar errors
 * are recorded, never thrown; a failed statement yields no AST and the parser
 * resynchronizes at the next statement boundary.
 *
 * Expression chaining is flat and left-associative: `a + b * c` parses as
 * `(a + b) * c`. Parentheses are the only grouping.
 *
 * @packageDocumentation
 */

import { Tokenizer } from '../lexer/tokenizer.js';
import { STATEMENT_KEYWORDS, type SourceLocation, type Token, type TokenType } from '../lexer/types.js';
import type {
  BinaryOperator,
  Expression,
  FromClause,
  JoinClause,
  JoinType,
  Literal,
  OrderByClause,
  SelectStatement,
  Statement,
  StatementKind,
  TableReference,
  TopClause,
} from '../ast/types.js';
import {
  createParseContext,
  releaseExpression,
  releaseStatement,
  type ParseContext,
} from '../ast/pool.js';
import {
  ExpectedTokenError,
  IllegalTokenError,
  InvalidLiteralError,
  NoPrefixParseError,
  ParseCancelledError,
  UnexpectedTokenError,
  UnsupportedStatementError,
  type CancellationReason,
  type ParseDiagnostic,
} from '../errors/index.js';
import { getDefaultLogger, type StructuredLogger } from '../logging/index.js';
import { resolveParserConfig, type ParserConfig, type ParserConfigInput } from '../config.js';
import type { SqlScopeMetrics } from '../observability/index.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ParserOptions {
  /** Cancels the parse at the next token advance once aborted */
  signal?: AbortSignal;
  /** Epoch milliseconds after which the parse is cancelled */
  deadline?: number;
  /** Node pools to draw from; a fresh context is created when omitted */
  context?: ParseContext;
  logger?: StructuredLogger;
  config?: ParserConfigInput;
  /** Receives one observation per parseProgram call */
  metrics?: SqlScopeMetrics;
  /** Clock used for the deadline check */
  now?: () => number;
}

export interface ParseMetrics {
  parseDurationMs: number;
  tokensProcessed: number;
  tokensPerSecond: number;
  errorCount: number;
}

export interface ParseResult {
  statements: Statement[];
  errors: ParseDiagnostic[];
  metrics: ParseMetrics;
}

const INT64_MAX = 9223372036854775807n;

const STATEMENT_KINDS: ReadonlySet<TokenType> = new Set<TokenType>(
  ['SELECT', 'INSERT', 'UPDATE', 'DELETE'] satisfies StatementKind[]
);

const INFIX_OPERATORS: ReadonlyMap<TokenType, BinaryOperator> = new Map<TokenType, BinaryOperator>([
  ['EQ', '='],
  ['NOT_EQ', '<>'],
  ['LT', '<'],
  ['GT', '>'],
  ['LTE', '<='],
  ['GTE', '>='],
  ['AND', 'AND'],
  ['OR', 'OR'],
  ['PLUS', '+'],
  ['MINUS', '-'],
  ['ASTERISK', '*'],
  ['SLASH', '/'],
  ['MODULO', '%'],
  ['LIKE', 'LIKE'],
  ['IN', 'IN'],
]);

function isWord(token: Token, word: string): boolean {
  return token.type === 'IDENT' && token.literal.toUpperCase() === word;
}

// =============================================================================
// PARSER
// =============================================================================

/**
 * Parser for one SQL text
 *
 * @example
 * ```typescript
 * const parser = new Parser('SELECT a FROM t; SELECT b FROM u');
 * const { statements, errors } = parser.parseProgram();
 * ```
 */
export class Parser {
  private readonly sql: string;
  private readonly tokenizer: Tokenizer;
  private readonly config: ParserConfig;
  private readonly context: ParseContext;
  private readonly logger: StructuredLogger;
  private readonly signal?: AbortSignal;
  private readonly deadline?: number;
  private readonly now: () => number;
  private readonly metricsSink?: SqlScopeMetrics;
  private readonly startedAt: number;

  private cur: Token;
  private peek: Token;
  private readonly errors: ParseDiagnostic[] = [];
  private cancelled = false;
  private tokensProcessed = 0;

  constructor(sql: string, options: ParserOptions = {}) {
    this.sql = sql;
    this.config = resolveParserConfig(options.config);
    this.context = options.context ?? createParseContext({ pooling: this.config.pooling });
    this.logger = options.logger ?? getDefaultLogger();
    this.signal = options.signal;
    this.deadline = options.deadline;
    this.now = options.now ?? Date.now;
    this.metricsSink = options.metrics;
    this.startedAt = performance.now();

    this.tokenizer = new Tokenizer(sql);
    this.cur = this.pull();
    this.peek = this.pull();

    const reason = this.cancellationRequested();
    if (reason) {
      this.cancel(reason, this.cur.location);
    }
  }

  // ===========================================================================
  // TOKEN WINDOW
  // ===========================================================================

  private pull(): Token {
    const token = this.tokenizer.next();
    if (token.type !== 'EOF') {
      this.tokensProcessed++;
    }
    return token;
  }

  private cancellationRequested(): CancellationReason | null {
    if (this.signal?.aborted) return 'aborted';
    if (this.deadline !== undefined && this.now() >= this.deadline) return 'deadline';
    return null;
  }

  /**
   * Record the single cancellation diagnostic and pin the window to EOF
   */
  private cancel(reason: CancellationReason, location: SourceLocation): void {
    this.errors.push(new ParseCancelledError(reason, location, this.sql));
    this.cancelled = true;
    const eof: Token = { type: 'EOF', literal: '', location };
    this.cur = eof;
    this.peek = eof;
    this.logger.debug('Parse cancelled ({reason}) at line {line}', { reason, line: location.line });
  }

  /**
   * Shift peek into current and read a new peek, checking cancellation first
   */
  private advance(): void {
    if (this.cancelled) return;

    const reason = this.cancellationRequested();
    if (reason) {
      this.cancel(reason, this.peek.location);
      return;
    }

    this.cur = this.peek;
    this.peek = this.pull();
  }

  /**
   * Advance onto peek when it has the given type; otherwise record an
   * ExpectedTokenError and stay put
   */
  expectPeek(type: TokenType): boolean {
    if (this.peek.type === type) {
      this.advance();
      return !this.cancelled;
    }
    this.report(
      this.peek.type === 'ILLEGAL'
        ? new IllegalTokenError(this.peek, this.sql)
        : new ExpectedTokenError(type, this.peek, this.sql)
    );
    return false;
  }

  /**
   * Consume the current token when it has the given type
   */
  private expectCurrent(type: TokenType): boolean {
    if (this.cur.type === type) {
      this.advance();
      return !this.cancelled;
    }
    this.report(
      this.cur.type === 'ILLEGAL'
        ? new IllegalTokenError(this.cur, this.sql)
        : new ExpectedTokenError(type, this.cur, this.sql)
    );
    return false;
  }

  // ===========================================================================
  // DIAGNOSTICS
  // ===========================================================================

  private report(error: ParseDiagnostic): void {
    if (this.cancelled) return;
    this.errors.push(error);
  }

  private unexpected(token: Token, expected: string): null {
    this.report(
      token.type === 'ILLEGAL'
        ? new IllegalTokenError(token, this.sql)
        : new UnexpectedTokenError(token, expected, this.sql)
    );
    return null;
  }

  private noPrefix(token: Token): null {
    this.report(
      token.type === 'ILLEGAL'
        ? new IllegalTokenError(token, this.sql)
        : new NoPrefixParseError(token, this.sql)
    );
    return null;
  }

  getErrors(): readonly ParseDiagnostic[] {
    return this.errors;
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  getMetrics(): ParseMetrics {
    const parseDurationMs = performance.now() - this.startedAt;
    return {
      parseDurationMs,
      tokensProcessed: this.tokensProcessed,
      tokensPerSecond: parseDurationMs > 0 ? this.tokensProcessed / (parseDurationMs / 1000) : 0,
      errorCount: this.errors.length,
    };
  }

  // ===========================================================================
  // PROGRAM
  // ===========================================================================

  /**
   * Parse every statement in the input
   */
  parseProgram(): ParseResult {
    const statements: Statement[] = [];

    while (this.cur.type !== 'EOF' && !this.cancelled) {
      if (this.cur.type === 'SEMICOLON') {
        this.advance();
        continue;
      }

      const start = this.cur;
      const statement = this.parseStatement();

      if (statement && this.finishStatement()) {
        statements.push(statement);
        continue;
      }

      if (statement) {
        releaseStatement(this.context, statement);
      }
      if (this.cancelled) {
        break;
      }

      this.logger.debug('Statement at line {line}, column {column} failed to parse', {
        line: start.location.line,
        column: start.location.column,
        errors: this.errors.length,
      });

      if (!this.config.recover || this.errors.length >= this.config.maxErrors) {
        break;
      }

      this.synchronize(start);
      this.logger.debug('Resynchronized at {token}', { token: this.cur.type });
    }

    const result: ParseResult = {
      statements,
      errors: [...this.errors],
      metrics: this.getMetrics(),
    };

    this.metricsSink?.recordParse({
      statements: statements.length,
      errorCodes: result.errors.map((error) => error.code),
      durationMs: result.metrics.parseDurationMs,
      tokensProcessed: result.metrics.tokensProcessed,
      cancelled: this.cancelled,
    });

    return result;
  }

  /**
   * After a statement the next token must end it or start the next one
   */
  private finishStatement(): boolean {
    if (this.cur.type === 'SEMICOLON') {
      this.advance();
      return !this.cancelled;
    }
    if (this.cur.type === 'EOF') {
      return !this.cancelled;
    }
    if (STATEMENT_KEYWORDS.has(this.cur.type)) {
      return true;
    }
    this.unexpected(this.cur, "';' or end of input");
    return false;
  }

  /**
   * Discard tokens up to and including the next `;`, or up to the next
   * statement keyword other than `start`
   */
  synchronize(start: Token = this.cur): void {
    while (this.cur.type !== 'EOF') {
      if (this.cur.type === 'SEMICOLON') {
        this.advance();
        return;
      }
      if (this.cur !== start && STATEMENT_KEYWORDS.has(this.cur.type)) {
        return;
      }
      this.advance();
    }
  }

  /**
   * Parse one statement that must make up the whole input
   */
  parseSingleStatement(): StatementResult {
    const statement = this.parseStatement();

    if (statement) {
      if (this.cur.type === 'SEMICOLON') {
        this.advance();
      }
      if (this.cur.type !== 'EOF') {
        this.unexpected(this.cur, 'end of input');
      }
      if (this.errors.length > 0) {
        releaseStatement(this.context, statement);
      }
    }

    const errors = [...this.errors];
    return {
      statement: statement && errors.length === 0 ? statement : null,
      errors,
    };
  }

  // ===========================================================================
  // STATEMENTS
  // ===========================================================================

  /**
   * Parse the statement starting at the current token
   */
  parseStatement(): Statement | null {
    const token = this.cur;

    if (!STATEMENT_KINDS.has(token.type)) {
      if (token.type === 'ILLEGAL') {
        return this.noPrefix(token);
      }
      this.report(new UnsupportedStatementError(token, false, this.sql));
      return null;
    }

    if (token.type !== 'SELECT') {
      this.report(new UnsupportedStatementError(token, true, this.sql));
      return null;
    }

    const statement = this.parseSelectStatement();
    if (statement && this.cancelled) {
      releaseStatement(this.context, statement);
      return null;
    }
    return statement;
  }

  private parseSelectStatement(): SelectStatement | null {
    const stmt = this.context.selects.acquire();
    stmt.location = this.cur.location;
    const abandon = (): null => {
      releaseStatement(this.context, stmt);
      return null;
    };

    this.advance(); // SELECT

    if (this.cur.type === 'DISTINCT') {
      stmt.distinct = true;
      this.advance();
    }

    if (this.cur.type === 'TOP') {
      const top = this.parseTopClause();
      if (!top) return abandon();
      stmt.top = top;
    }

    const columns = this.parseExpressionSeries();
    if (!columns) return abandon();
    stmt.columns = columns;

    if (this.cur.type === 'FROM') {
      const from = this.parseFromClause();
      if (!from) return abandon();
      stmt.from = from;
    }

    const joins: JoinClause[] = [];
    stmt.joins = joins;
    while (this.isJoinStart()) {
      const join = this.parseJoinClause();
      if (!join) return abandon();
      joins.push(join);
    }

    if (this.cur.type === 'WHERE') {
      this.advance();
      const where = this.parseExpression();
      if (!where) return abandon();
      stmt.where = where;
    }

    if (this.cur.type === 'GROUP') {
      if (!this.expectPeek('BY')) return abandon();
      this.advance(); // BY
      const groupBy = this.parseExpressionSeries();
      if (!groupBy) return abandon();
      stmt.groupBy = groupBy;
    }

    if (this.cur.type === 'HAVING') {
      this.advance();
      const having = this.parseExpression();
      if (!having) return abandon();
      stmt.having = having;
    }

    if (this.cur.type === 'ORDER') {
      const orderBy = this.parseOrderByClause();
      if (!orderBy) return abandon();
      stmt.orderBy = orderBy;
    }

    return stmt;
  }

  // ===========================================================================
  // CLAUSES
  // ===========================================================================

  private parseTopClause(): TopClause | null {
    this.advance(); // TOP

    if (this.cur.type !== 'NUMBER') {
      this.expectCurrent('NUMBER');
      return null;
    }

    const token = this.cur;
    const count = Number(token.literal);
    if (!/^\d+$/.test(token.literal) || !Number.isSafeInteger(count)) {
      this.report(new InvalidLiteralError(token, 'TOP requires a whole number', this.sql));
      return null;
    }
    this.advance();

    let percent = false;
    if (isWord(this.cur, 'PERCENT')) {
      percent = true;
      this.advance();
    }

    return { count, percent };
  }

  private parseFromClause(): FromClause | null {
    this.advance(); // FROM

    const tables: TableReference[] = [];
    for (;;) {
      const table = this.parseTableReference();
      if (!table) return null;
      tables.push(table);
      if (this.cur.type !== 'COMMA') break;
      this.advance();
    }

    return { tables };
  }

  /**
   * `IDENT ['.' IDENT] [[AS] IDENT]`
   */
  parseTableReference(): TableReference | null {
    if (this.cur.type !== 'IDENT') {
      return this.unexpected(this.cur, 'table name');
    }

    let schema: string | undefined;
    let name = this.cur.literal;
    this.advance();

    if (this.cur.type === 'DOT') {
      this.advance();
      if (this.cur.type !== 'IDENT') {
        return this.unexpected(this.cur, 'table name after schema');
      }
      schema = name;
      name = this.cur.literal;
      this.advance();
    }

    let alias: string | undefined;
    if (this.cur.type === 'AS') {
      this.advance();
      if (this.cur.type !== 'IDENT') {
        return this.unexpected(this.cur, 'alias');
      }
      alias = this.cur.literal;
      this.advance();
    } else if (this.cur.type === 'IDENT') {
      alias = this.cur.literal;
      this.advance();
    }

    const table: { schema?: string; name: string; alias?: string } = { name };
    if (schema !== undefined) table.schema = schema;
    if (alias !== undefined) table.alias = alias;
    return table;
  }

  private isJoinStart(): boolean {
    switch (this.cur.type) {
      case 'JOIN':
      case 'INNER':
      case 'LEFT':
      case 'RIGHT':
      case 'FULL':
        return true;
      default:
        return false;
    }
  }

  private joinTypeOf(token: Token): JoinType {
    switch (token.type) {
      case 'LEFT':
        return 'LEFT';
      case 'RIGHT':
        return 'RIGHT';
      case 'FULL':
        return 'FULL';
      default:
        return 'INNER';
    }
  }

  private parseJoinClause(): JoinClause | null {
    const join = this.context.joins.acquire();
    const joinType = this.joinTypeOf(this.cur);

    if (this.cur.type !== 'JOIN') {
      // LEFT/RIGHT/FULL may carry OUTER
      if (joinType !== 'INNER' && isWord(this.peek, 'OUTER')) {
        this.advance();
      }
      if (!this.expectPeek('JOIN')) {
        this.context.joins.release(join);
        return null;
      }
    }
    this.advance(); // JOIN

    const table = this.parseTableReference();
    if (!table || !this.expectCurrent('ON')) {
      this.context.joins.release(join);
      return null;
    }

    const condition = this.parseExpression();
    if (!condition) {
      this.context.joins.release(join);
      return null;
    }

    join.joinType = joinType;
    join.table = table;
    join.condition = condition;
    return join;
  }

  private parseOrderByClause(): OrderByClause[] | null {
    if (!this.expectPeek('BY')) return null;
    this.advance(); // BY

    const items: OrderByClause[] = [];
    for (;;) {
      const expression = this.parseExpression();
      if (!expression) {
        for (const item of items) releaseExpression(this.context, item.expression);
        return null;
      }

      let direction: OrderByClause['direction'] = 'ASC';
      if (isWord(this.cur, 'ASC')) {
        this.advance();
      } else if (isWord(this.cur, 'DESC')) {
        direction = 'DESC';
        this.advance();
      }
      items.push({ expression, direction });

      if (this.cur.type !== 'COMMA') return items;
      this.advance();
    }
  }

  /**
   * `expr (',' expr)*`; releases what it parsed when an item fails
   */
  private parseExpressionSeries(): Expression[] | null {
    const items: Expression[] = [];
    for (;;) {
      const expression = this.parseExpression();
      if (!expression) {
        for (const item of items) releaseExpression(this.context, item);
        return null;
      }
      items.push(expression);
      if (this.cur.type !== 'COMMA') return items;
      this.advance();
    }
  }

  // ===========================================================================
  // EXPRESSIONS
  // ===========================================================================

  /**
   * `primary (infixOp primary)*`, chained left to right
   */
  parseExpression(): Expression | null {
    let left = this.parsePrimaryExpression();
    if (!left) return null;

    for (;;) {
      const operator = INFIX_OPERATORS.get(this.cur.type);
      if (!operator) return left;
      this.advance();

      const right = operator === 'IN' && this.cur.type === 'LPAREN'
        ? this.parseParenthesized(true)
        : this.parsePrimaryExpression();
      if (!right) {
        releaseExpression(this.context, left);
        return null;
      }

      const node = this.context.binaries.acquire();
      node.left = left;
      node.operator = operator;
      node.right = right;
      left = node;
    }
  }

  private parsePrimaryExpression(): Expression | null {
    switch (this.cur.type) {
      case 'IDENT':
        return this.parseIdentifierExpression();
      case 'NUMBER':
        return this.parseNumberLiteral();
      case 'STRING':
        return this.parseStringLiteral();
      case 'ASTERISK':
        this.advance();
        return { type: 'star' };
      case 'LPAREN':
        return this.parseParenthesized(false);
      default:
        return this.noPrefix(this.cur);
    }
  }

  /**
   * Column, qualified column, `t.*` or function call
   */
  private parseIdentifierExpression(): Expression | null {
    const name = this.cur.literal;
    this.advance();

    if (this.cur.type === 'LPAREN') {
      return this.parseFunctionCall(name);
    }

    if (this.cur.type === 'DOT') {
      this.advance();
      if (this.cur.type === 'ASTERISK') {
        this.advance();
        return { type: 'star', table: name };
      }
      if (this.cur.type !== 'IDENT') {
        this.expectCurrent('IDENT');
        return null;
      }
      const column = this.context.columns.acquire();
      column.table = name;
      column.column = this.cur.literal;
      this.advance();
      return column;
    }

    const column = this.context.columns.acquire();
    column.column = name;
    return column;
  }

  private parseFunctionCall(name: string): Expression | null {
    this.advance(); // (

    if (this.cur.type === 'RPAREN') {
      this.advance();
      return { type: 'function', name, arguments: [] };
    }

    const args = this.parseExpressionSeries();
    if (!args) return null;
    if (!this.expectCurrent('RPAREN')) {
      for (const arg of args) releaseExpression(this.context, arg);
      return null;
    }

    return { type: 'function', name, arguments: args };
  }

  /**
   * `( expr )` is the expression itself; `( expr, expr, ... )` is a list.
   * With `asList` a single item is still wrapped in a list.
   */
  private parseParenthesized(asList: boolean): Expression | null {
    this.advance(); // (

    const items = this.parseExpressionSeries();
    if (!items) return null;
    if (!this.expectCurrent('RPAREN')) {
      for (const item of items) releaseExpression(this.context, item);
      return null;
    }

    const [first] = items;
    if (!asList && items.length === 1 && first) {
      return first;
    }
    return { type: 'list', items };
  }

  private parseNumberLiteral(): Literal | null {
    const token = this.cur;
    const raw = token.literal;

    if (/[.eE]/.test(raw)) {
      const value = Number(raw);
      if (!Number.isFinite(value)) {
        this.report(new InvalidLiteralError(token, 'value is out of range', this.sql));
        return null;
      }
      this.advance();
      return { type: 'literal', dataType: 'float', value, raw };
    }

    const value = BigInt(raw);
    if (value > INT64_MAX) {
      this.report(new InvalidLiteralError(token, 'integer exceeds the 64-bit range', this.sql));
      return null;
    }
    this.advance();
    return {
      type: 'literal',
      dataType: 'integer',
      value: value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value,
      raw,
    };
  }

  private parseStringLiteral(): Literal {
    const token = this.cur;
    this.advance();
    return { type: 'literal', dataType: 'string', value: token.literal, raw: token.literal };
  }
}

// =============================================================================
// CONVENIENCE FUNCTIONS
// =============================================================================

/**
 * Parse a batch of statements
 */
export function parse(sql: string, options?: ParserOptions): ParseResult {
  return new Parser(sql, options).parseProgram();
}

export interface StatementResult {
  /** Null exactly when errors is non-empty */
  statement: Statement | null;
  errors: ParseDiagnostic[];
}

/**
 * Parse exactly one statement; a trailing `;` is allowed, anything else after
 * it is an error
 */
export function parseStatement(sql: string, options?: ParserOptions): StatementResult {
  return new Parser(sql, options).parseSingleStatement();
}
