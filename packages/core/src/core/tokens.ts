/**
 * Token kinds and the token record handed to listeners.
 */

/** Token kinds - small integer discriminant, declaration order is the summary order. */
export const TokenKind = {
	BlockComment: 3,
	Char: 9,
	Identifier: 5,
	Keyword: 6,
	LineComment: 2,
	Newline: 1,
	Number: 7,
	Preprocessor: 4,
	Punctuator: 10,
	String: 8,
	Whitespace: 0,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/** All kinds ordered by discriminant. */
export const TOKEN_KINDS: readonly TokenKind[] = [
	TokenKind.Whitespace,
	TokenKind.Newline,
	TokenKind.LineComment,
	TokenKind.BlockComment,
	TokenKind.Preprocessor,
	TokenKind.Identifier,
	TokenKind.Keyword,
	TokenKind.Number,
	TokenKind.String,
	TokenKind.Char,
	TokenKind.Punctuator,
]

/** Names used for kinds in stream records and stats summaries. */
export const TOKEN_KIND_NAMES: Readonly<Record<TokenKind, string>> = {
	[TokenKind.Whitespace]: 'WS',
	[TokenKind.Newline]: 'NEWLINE',
	[TokenKind.LineComment]: 'LINE_COMMENT',
	[TokenKind.BlockComment]: 'BLOCK_COMMENT',
	[TokenKind.Preprocessor]: 'PREPROC',
	[TokenKind.Identifier]: 'IDENT',
	[TokenKind.Keyword]: 'KEYWORD',
	[TokenKind.Number]: 'NUMBER',
	[TokenKind.String]: 'STRING',
	[TokenKind.Char]: 'CHAR',
	[TokenKind.Punctuator]: 'PUNCT',
}

const KIND_BY_NAME: ReadonlyMap<string, TokenKind> = new Map(
	TOKEN_KINDS.map((kind) => [TOKEN_KIND_NAMES[kind], kind])
)

export function tokenKindName(kind: TokenKind): string {
	return TOKEN_KIND_NAMES[kind]
}

export function parseTokenKindName(name: string): TokenKind | undefined {
	return KIND_BY_NAME.get(name)
}

export function isCommentKind(kind: TokenKind): boolean {
	return kind === TokenKind.LineComment || kind === TokenKind.BlockComment
}

export function isWhitespaceKind(kind: TokenKind): boolean {
	return kind === TokenKind.Whitespace || kind === TokenKind.Newline
}

export function isWordKind(kind: TokenKind): boolean {
	return kind === TokenKind.Identifier || kind === TokenKind.Keyword
}

/**
 * A single token.
 * `lexeme` is a view into the source buffer covering [offset, offset + length).
 */
export interface Token {
	readonly kind: TokenKind
	/** Byte offset into the source (0-indexed) */
	readonly offset: number
	readonly length: number
	/** Line number (1-indexed) */
	readonly line: number
	/** Column in bytes (1-indexed) */
	readonly column: number
	readonly lexeme: Uint8Array
}
