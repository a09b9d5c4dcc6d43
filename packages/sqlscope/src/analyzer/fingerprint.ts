/**
 * Statement fingerprints
 *
 * A fingerprint is the djb2 hash of the normalized canonical rendering of a
 * statement. Two statements that render identically share a fingerprint; the
 * canonical text travels with it so caches can detect hash collisions.
 *
 * @packageDocumentation
 */

import { renderStatement } from '../ast/render.js';
import type { Statement } from '../ast/types.js';

export interface StatementFingerprint {
  fingerprint: string;
  canonical: string;
}

/**
 * Hash a string (djb2, xor variant) to `qf_<hex>`
 */
export function computeFingerprint(str: string): string {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
  }
  return `qf_${(hash >>> 0).toString(16)}`;
}

/**
 * Collapse whitespace runs to one space outside quoted sections and
 * uppercase the reserved words the renderer emits
 */
export function normalizeQueryForFingerprint(sql: string): string {
  let result = '';
  let word = '';
  let pendingSpace = false;
  let i = 0;

  const flushWord = (): void => {
    if (word) {
      result += KEYWORDS.has(word.toUpperCase()) ? word.toUpperCase() : word;
      word = '';
    }
  };

  while (i < sql.length) {
    const char = sql[i] ?? '';

    if (/\s/.test(char)) {
      flushWord();
      pendingSpace = result.length > 0;
      i++;
      continue;
    }

    if (pendingSpace) {
      result += ' ';
      pendingSpace = false;
    }

    const close = char === "'" ? "'" : char === '[' ? ']' : char === '"' ? '"' : undefined;
    if (close !== undefined) {
      flushWord();
      const end = findClosing(sql, i + 1, close);
      result += sql.slice(i, end);
      i = end;
      continue;
    }

    if (/[\p{L}\p{N}_@#$]/u.test(char)) {
      word += char;
    } else {
      flushWord();
      result += char;
    }
    i++;
  }

  flushWord();
  return result;
}

/**
 * Index just past the closing delimiter; doubled delimiters are escapes
 */
function findClosing(sql: string, from: number, close: string): number {
  let i = from;
  while (i < sql.length) {
    if (sql[i] === close) {
      if (sql[i + 1] === close) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

const KEYWORDS: ReadonlySet<string> = new Set([
  'SELECT', 'DISTINCT', 'TOP', 'PERCENT', 'FROM', 'AS', 'INNER', 'LEFT', 'RIGHT',
  'FULL', 'JOIN', 'ON', 'WHERE', 'GROUP', 'BY', 'HAVING', 'ORDER', 'ASC', 'DESC',
  'AND', 'OR', 'LIKE', 'IN',
]);

export function canonicalize(statement: Statement): string {
  return normalizeQueryForFingerprint(renderStatement(statement));
}

export function fingerprintStatement(statement: Statement): StatementFingerprint {
  const canonical = canonicalize(statement);
  return { fingerprint: computeFingerprint(canonical), canonical };
}
