/**
 * AST to SQL rendering
 *
 * Output re-parses to an equal tree: a binary expression on the right of
 * another is parenthesized, one on the left is not (chaining is flat and
 * left-associative), and identifiers that would not tokenize back as plain
 * identifiers are bracketed.
 *
 * @packageDocumentation
 */

import { lookupKeyword } from '../lexer/types.js';
import type {
  Expression,
  JoinClause,
  OrderByClause,
  SelectStatement,
  Statement,
  TableReference,
  TopClause,
} from './types.js';
import { assertNever } from './types.js';

const PLAIN_IDENTIFIER = /^[\p{L}_@#][\p{L}0-9_@#$]*$/u;

/** Bare words the parser interprets by position */
const CONTEXTUAL_WORDS = new Set(['PERCENT', 'ASC', 'DESC']);

export function quoteIdentifier(name: string): string {
  if (
    PLAIN_IDENTIFIER.test(name)
    && lookupKeyword(name) === undefined
    && !CONTEXTUAL_WORDS.has(name.toUpperCase())
  ) {
    return name;
  }
  return `[${name.replace(/]/g, ']]')}]`;
}

export function quoteString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

export function renderExpression(expression: Expression): string {
  switch (expression.type) {
    case 'column':
      return expression.table !== undefined
        ? `${quoteIdentifier(expression.table)}.${quoteIdentifier(expression.column)}`
        : quoteIdentifier(expression.column);
    case 'literal':
      return expression.dataType === 'string' ? quoteString(expression.value) : expression.raw;
    case 'binary': {
      const right = renderExpression(expression.right);
      return `${renderExpression(expression.left)} ${expression.operator} ${
        expression.right.type === 'binary' ? `(${right})` : right
      }`;
    }
    case 'star':
      return expression.table !== undefined ? `${quoteIdentifier(expression.table)}.*` : '*';
    case 'function':
      return `${quoteIdentifier(expression.name)}(${expression.arguments.map(renderExpression).join(', ')})`;
    case 'list':
      return `(${expression.items.map(renderExpression).join(', ')})`;
    default:
      return assertNever(expression);
  }
}

// =============================================================================
// CLAUSES
// =============================================================================

export function renderTableReference(table: TableReference): string {
  let sql = quoteIdentifier(table.name);
  if (table.schema !== undefined) {
    sql = `${quoteIdentifier(table.schema)}.${sql}`;
  }
  if (table.alias !== undefined) {
    sql += ` AS ${quoteIdentifier(table.alias)}`;
  }
  return sql;
}

function renderTop(top: TopClause): string {
  return top.percent ? `TOP ${top.count} PERCENT` : `TOP ${top.count}`;
}

function renderJoin(join: JoinClause): string {
  return `${join.joinType} JOIN ${renderTableReference(join.table)} ON ${renderExpression(join.condition)}`;
}

function renderOrderBy(item: OrderByClause): string {
  return `${renderExpression(item.expression)} ${item.direction}`;
}

// =============================================================================
// STATEMENTS
// =============================================================================

export function renderSelect(statement: SelectStatement): string {
  const parts: string[] = ['SELECT'];

  if (statement.distinct) parts.push('DISTINCT');
  if (statement.top) parts.push(renderTop(statement.top));
  parts.push(statement.columns.map(renderExpression).join(', '));

  if (statement.from) {
    parts.push(`FROM ${statement.from.tables.map(renderTableReference).join(', ')}`);
  }
  for (const join of statement.joins) {
    parts.push(renderJoin(join));
  }
  if (statement.where) {
    parts.push(`WHERE ${renderExpression(statement.where)}`);
  }
  if (statement.groupBy.length > 0) {
    parts.push(`GROUP BY ${statement.groupBy.map(renderExpression).join(', ')}`);
  }
  if (statement.having) {
    parts.push(`HAVING ${renderExpression(statement.having)}`);
  }
  if (statement.orderBy.length > 0) {
    parts.push(`ORDER BY ${statement.orderBy.map(renderOrderBy).join(', ')}`);
  }

  return parts.join(' ');
}

export function renderStatement(statement: Statement): string {
  switch (statement.type) {
    case 'select':
      return renderSelect(statement);
  }
}
