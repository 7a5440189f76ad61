/**
 * Per-file lexing context: the source bytes, their label and the grammar.
 * Tokens are not kept here; listeners receive them as they are produced.
 */

import { C_GRAMMAR, type LexicalGrammar } from './grammar.ts'
import type { Token } from './tokens.ts'

/**
 * Receives every token as the lexer emits it, in source order.
 */
export interface TokenListener {
	onToken(token: Token, context: LexContext): void
}

export class LexContext {
	/** Raw file content, never decoded */
	readonly source: Uint8Array

	/** Label written into stream records */
	readonly filename: string

	readonly grammar: LexicalGrammar

	constructor(source: Uint8Array, filename = '<input>', grammar: LexicalGrammar = C_GRAMMAR) {
		this.source = source
		this.filename = filename
		this.grammar = grammar
	}
}
