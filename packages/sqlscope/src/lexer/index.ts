/**
 * SQL Server lexer
 *
 * @packageDocumentation
 */

export * from './types.js';
export { Tokenizer, tokenize } from './tokenizer.js';
