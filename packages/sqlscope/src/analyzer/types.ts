/**
 * Analysis result types
 *
 * @packageDocumentation
 */

import type { JoinType, StatementKind } from '../ast/types.js';
import type { RuleSwitches, SuggestionKind } from '../config.js';

export type Severity = 'INFO' | 'WARNING' | 'ERROR';

/**
 * Clause in which a column occurrence was found
 */
export type ColumnUsage = 'SELECT' | 'WHERE' | 'JOIN' | 'GROUP_BY' | 'HAVING' | 'ORDER_BY';

export interface TableInfo {
  readonly name: string;
  readonly schema?: string;
  readonly alias?: string;
  readonly usage: StatementKind;
}

export interface ColumnInfo {
  /** Qualifier as written (table name or alias) */
  readonly table?: string;
  readonly name: string;
  readonly usage: ColumnUsage;
}

export interface JoinInfo {
  readonly type: JoinType;
  /** Earlier table the condition refers to; absent when there is none */
  readonly leftTable?: string;
  readonly rightTable: string;
  /** Rendered ON condition */
  readonly condition: string;
}

export interface Suggestion {
  readonly kind: SuggestionKind;
  readonly description: string;
  readonly severity: Severity;
}

export interface AnalysisResult {
  readonly fingerprint: string;
  readonly queryType: StatementKind;
  readonly tables: readonly TableInfo[];
  readonly columns: readonly ColumnInfo[];
  readonly joins: readonly JoinInfo[];
  readonly complexityScore: number;
  readonly suggestions: readonly Suggestion[];
}

export interface AnalyzeOptions {
  complexJoinThreshold?: number;
  rules?: Partial<RuleSwitches>;
  /** Fingerprint the caller already computed for this statement */
  fingerprint?: string;
}
