/**
 * SQL Server Query AST
 *
 * Closed tagged unions discriminated by `type`. Nodes are read-only once the
 * parser hands them out.
 *
 * @packageDocumentation
 */

import type { SourceLocation } from '../lexer/types.js';

// =============================================================================
// ENUMERATIONS
// =============================================================================

/**
 * Statement kinds the parser dispatches on
 */
export type StatementKind = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE';

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL';

export type SortDirection = 'ASC' | 'DESC';

export type ComparisonOperator = '=' | '<>' | '<' | '>' | '<=' | '>=';

export type LogicalOperator = 'AND' | 'OR';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';

export type PatternOperator = 'LIKE' | 'IN';

/**
 * Infix operators; `!=` is normalized to `<>`
 */
export type BinaryOperator =
  | ComparisonOperator
  | LogicalOperator
  | ArithmeticOperator
  | PatternOperator;

// =============================================================================
// EXPRESSIONS
// =============================================================================

/**
 * Column reference, qualified when a dot was parsed (`u.id`)
 */
export interface ColumnReference {
  readonly type: 'column';
  readonly table?: string;
  readonly column: string;
}

export interface NumericLiteral {
  readonly type: 'literal';
  readonly dataType: 'integer' | 'float';
  /** A bigint when the integer lies outside the safe integer range */
  readonly value: number | bigint;
  /** Source spelling of the number */
  readonly raw: string;
}

export interface StringLiteral {
  readonly type: 'literal';
  readonly dataType: 'string';
  /** Unescaped content */
  readonly value: string;
  readonly raw: string;
}

export type Literal = NumericLiteral | StringLiteral;

export interface BinaryExpression {
  readonly type: 'binary';
  readonly left: Expression;
  readonly operator: BinaryOperator;
  readonly right: Expression;
}

/**
 * `*` or `t.*`
 */
export interface StarExpression {
  readonly type: 'star';
  readonly table?: string;
}

export interface FunctionCall {
  readonly type: 'function';
  readonly name: string;
  readonly arguments: readonly Expression[];
}

/**
 * Parenthesized comma list, e.g. the right side of `IN (1, 2, 3)`
 */
export interface ExpressionList {
  readonly type: 'list';
  readonly items: readonly Expression[];
}

export type Expression =
  | ColumnReference
  | Literal
  | BinaryExpression
  | StarExpression
  | FunctionCall
  | ExpressionList;

// =============================================================================
// CLAUSES
// =============================================================================

export interface TopClause {
  readonly count: number;
  readonly percent: boolean;
}

/**
 * `[schema.]name [[AS] alias]`
 */
export interface TableReference {
  readonly schema?: string;
  readonly name: string;
  readonly alias?: string;
}

export interface FromClause {
  readonly tables: readonly TableReference[];
}

export interface JoinClause {
  readonly joinType: JoinType;
  readonly table: TableReference;
  readonly condition: Expression;
}

export interface OrderByClause {
  readonly expression: Expression;
  readonly direction: SortDirection;
}

// =============================================================================
// STATEMENTS
// =============================================================================

export interface SelectStatement {
  readonly type: 'select';
  readonly distinct: boolean;
  readonly top?: TopClause;
  /** Never empty for a successfully parsed statement */
  readonly columns: readonly Expression[];
  readonly from?: FromClause;
  /** Source order */
  readonly joins: readonly JoinClause[];
  readonly where?: Expression;
  readonly groupBy: readonly Expression[];
  readonly having?: Expression;
  readonly orderBy: readonly OrderByClause[];
  /** Location of the SELECT keyword */
  readonly location: SourceLocation;
}

/**
 * Only SELECT bodies are parsed; other kinds are reported as diagnostics
 */
export type Statement = SelectStatement;

/**
 * Map a statement node to its dispatch kind
 */
export function statementKind(statement: Statement): StatementKind {
  switch (statement.type) {
    case 'select':
      return 'SELECT';
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Mutable view of a node, used while the parser builds pooled nodes
 */
export type Draft<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Exhaustiveness check for switches over closed unions
 */
export function assertNever(value: never, message = 'Unexpected AST node'): never {
  throw new Error(`${message}: ${JSON.stringify(value)}`);
}
