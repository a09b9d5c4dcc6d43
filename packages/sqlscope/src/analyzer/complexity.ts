/**
 * Complexity scoring
 *
 * @packageDocumentation
 */

import type { Expression, SelectStatement } from '../ast/types.js';
import { assertNever } from '../ast/types.js';

/**
 * Number of AND/OR operators anywhere in the expression
 */
export function countLogicalOperators(expression: Expression): number {
  switch (expression.type) {
    case 'binary': {
      const own = expression.operator === 'AND' || expression.operator === 'OR' ? 1 : 0;
      return own + countLogicalOperators(expression.left) + countLogicalOperators(expression.right);
    }
    case 'function':
      return expression.arguments.reduce((sum, arg) => sum + countLogicalOperators(arg), 0);
    case 'list':
      return expression.items.reduce((sum, item) => sum + countLogicalOperators(item), 0);
    case 'column':
    case 'literal':
    case 'star':
      return 0;
    default:
      return assertNever(expression);
  }
}

/**
 * Conditions in a predicate: one more than its AND/OR operators
 */
export function countConditions(expression: Expression | undefined): number {
  return expression ? countLogicalOperators(expression) + 1 : 0;
}

/**
 * `1 + joins + WHERE conditions + GROUP BY keys + HAVING conditions`
 */
export function computeComplexity(statement: SelectStatement): number {
  return 1
    + statement.joins.length
    + countConditions(statement.where)
    + statement.groupBy.length
    + countConditions(statement.having);
}
