/**
 * Lexical analysis module.
 * Splits a byte buffer into a gapless sequence of tokens.
 */

export { type TokenizeResult, tokenize } from './lexer.ts'
