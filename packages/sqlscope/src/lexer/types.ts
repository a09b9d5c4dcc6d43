/**
 * Lexer Types
 *
 * Token and source location definitions shared by the tokenizer, the parser
 * and the error classes.
 *
 * @packageDocumentation
 */

// =============================================================================
// SOURCE LOCATION
// =============================================================================

/**
 * Location information for error reporting and AST node tracking
 */
export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
  /** 0-based character offset */
  offset: number;
}

// =============================================================================
// KEYWORDS
// =============================================================================

/**
 * Reserved words, matched case-insensitively
 */
export const KEYWORDS = [
  'SELECT', 'FROM', 'WHERE', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'ON',
  'GROUP', 'BY', 'HAVING', 'ORDER', 'TOP', 'DISTINCT', 'AS', 'AND', 'OR',
  'LIKE', 'IN', 'INSERT', 'UPDATE', 'DELETE', 'CREATE', 'DROP', 'ALTER',
] as const;

export type KeywordType = (typeof KEYWORDS)[number];

const KEYWORD_LOOKUP: ReadonlyMap<string, KeywordType> = new Map(
  KEYWORDS.map((keyword) => [keyword, keyword])
);

/**
 * Resolve an identifier to its keyword token type, if it is reserved
 */
export function lookupKeyword(word: string): KeywordType | undefined {
  return KEYWORD_LOOKUP.get(word.toUpperCase());
}

// =============================================================================
// TOKEN TYPES
// =============================================================================

export type OperatorType =
  | 'EQ'
  | 'NOT_EQ'
  | 'LT'
  | 'GT'
  | 'LTE'
  | 'GTE'
  | 'PLUS'
  | 'MINUS'
  | 'ASTERISK'
  | 'SLASH'
  | 'MODULO';

export type PunctuationType = 'COMMA' | 'SEMICOLON' | 'LPAREN' | 'RPAREN' | 'DOT';

/**
 * Token types recognized by the SQL lexer
 */
export type TokenType =
  | KeywordType
  | OperatorType
  | PunctuationType
  | 'IDENT'
  | 'NUMBER'
  | 'STRING'
  | 'ILLEGAL'
  | 'EOF';

/**
 * A single token from the lexer
 */
export interface Token {
  /** Token type classification */
  readonly type: TokenType;
  /** Source text of the token (string literals: the unquoted content) */
  readonly literal: string;
  /** Source location of the token */
  readonly location: SourceLocation;
}

/**
 * Keywords that can begin a statement; the parser synchronizes on these
 */
export const STATEMENT_KEYWORDS: ReadonlySet<TokenType> = new Set<TokenType>([
  'SELECT', 'INSERT', 'UPDATE', 'DELETE', 'CREATE', 'DROP', 'ALTER',
]);

/**
 * Human-readable spelling of a token type, used in diagnostics
 */
export function describeTokenType(type: TokenType): string {
  switch (type) {
    case 'EQ': return "'='";
    case 'NOT_EQ': return "'<>'";
    case 'LT': return "'<'";
    case 'GT': return "'>'";
    case 'LTE': return "'<='";
    case 'GTE': return "'>='";
    case 'PLUS': return "'+'";
    case 'MINUS': return "'-'";
    case 'ASTERISK': return "'*'";
    case 'SLASH': return "'/'";
    case 'MODULO': return "'%'";
    case 'COMMA': return "','";
    case 'SEMICOLON': return "';'";
    case 'LPAREN': return "'('";
    case 'RPAREN': return "')'";
    case 'DOT': return "'.'";
    case 'EOF': return 'end of input';
    default: return type;
  }
}
