/**
 * Core data structures: bytes, tokens, grammar and the per-file context.
 */

export {
	type ByteSink,
	bytesEqual,
	ChunkSink,
	concatBytes,
	fromBinaryString,
	toBinaryString,
	utf8Bytes,
	utf8Text,
} from './bytes.ts'
export { LexContext, type TokenListener } from './context.ts'
export {
	C_GRAMMAR,
	GrammarError,
	type GrammarSpec,
	LexicalGrammar,
	loadGrammar,
	parseGrammarSpec,
} from './grammar.ts'
export {
	isCommentKind,
	isWhitespaceKind,
	isWordKind,
	parseTokenKindName,
	TOKEN_KIND_NAMES,
	TOKEN_KINDS,
	type Token,
	TokenKind,
	tokenKindName,
} from './tokens.ts'
