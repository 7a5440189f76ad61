import { fromBinaryString, toBinaryString } from '../src/core/bytes.ts'
import { LexContext, type TokenListener } from '../src/core/context.ts'
import { C_GRAMMAR, type LexicalGrammar } from '../src/core/grammar.ts'
import { type Token, tokenKindName } from '../src/core/tokens.ts'
import { type TokenizeResult, tokenize } from '../src/lex/lexer.ts'

/** Keeps every token it is handed, in order. */
export class TokenCollector implements TokenListener {
	readonly tokens: Token[] = []

	onToken(token: Token): void {
		this.tokens.push(token)
	}
}

export interface Lexed {
	tokens: Token[]
	result: TokenizeResult
}

export function lexText(
	text: string | Uint8Array,
	filename = 'test.c',
	grammar: LexicalGrammar = C_GRAMMAR
): Lexed {
	const source = typeof text === 'string' ? fromBinaryString(text) : text
	const collector = new TokenCollector()
	const result = tokenize(new LexContext(source, filename, grammar), [collector])
	return { result, tokens: collector.tokens }
}

/** [kind name, lexeme] pairs in source order. */
export function tokenPairs(lexed: Lexed): Array<[string, string]> {
	return lexed.tokens.map((token) => [tokenKindName(token.kind), toBinaryString(token.lexeme)])
}

/** [line, column] of every token. */
export function tokenPositions(lexed: Lexed): Array<[number, number]> {
	return lexed.tokens.map((token) => [token.line, token.column])
}

export function tokenAt(lexed: Lexed, index: number): Token {
	const token = lexed.tokens[index]
	if (token === undefined) throw new Error(`no token at ${index}`)
	return token
}
