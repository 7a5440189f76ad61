import type { LexContext, TokenListener } from '../core/context.ts'
import type { LexicalGrammar } from '../core/grammar.ts'
import { type Token, TokenKind } from '../core/tokens.ts'
import {
	Byte,
	type ByteTest,
	isBlank,
	isDigit,
	isDigitOrSeparator,
	isHexDigitOrSeparator,
	isIdentPart,
	isIdentStart,
	isLetter,
	isLineBreak,
	skipWhile,
} from './chars.ts'

export interface TokenizeResult {
	tokenCount: number
	/** Block comments, strings and chars that ran to end of input without closing */
	unterminated: Token[]
}

interface LexerState {
	readonly source: Uint8Array
	pos: number
	line: number
	column: number
}

interface Match {
	kind: TokenKind
	end: number
	terminated: boolean
}

function match(kind: TokenKind, end: number, terminated = true): Match {
	return { end, kind, terminated }
}

// =============================================================================
// SCANNERS
// Each takes the start position and returns the exclusive end of its token.
// =============================================================================

function scanNewline(source: Uint8Array, pos: number): number {
	if (source[pos] === Byte.CarriageReturn && source[pos + 1] === Byte.LineFeed) {
		return pos + 2
	}
	return pos + 1
}

/**
 * `#` line up to its terminating line break. A backslash right before a
 * line break continues the directive onto the next physical line.
 */
function scanPreprocessor(source: Uint8Array, pos: number): number {
	let end = pos + 1
	while (end < source.length) {
		const byte = source[end]
		if (!isLineBreak(byte)) {
			end++
			continue
		}
		if (source[end - 1] !== Byte.Backslash) break
		end = scanNewline(source, end)
	}
	return end
}

function scanLineComment(source: Uint8Array, pos: number): number {
	return skipWhile(source, pos + 2, (byte) => !isLineBreak(byte))
}

function scanBlockComment(source: Uint8Array, pos: number): Match {
	for (let end = pos + 2; end + 1 < source.length; end++) {
		if (source[end] === Byte.Asterisk && source[end + 1] === Byte.Slash) {
			return match(TokenKind.BlockComment, end + 2)
		}
	}
	return match(TokenKind.BlockComment, source.length, false)
}

/**
 * Quoted literal; a backslash escapes the byte after it.
 */
function scanQuoted(source: Uint8Array, pos: number, kind: TokenKind): Match {
	const quote = source[pos]
	let end = pos + 1
	while (end < source.length) {
		const byte = source[end++]
		if (byte === Byte.Backslash) {
			if (end < source.length) end++
		} else if (byte === quote) {
			return match(kind, end)
		}
	}
	return match(kind, end, false)
}

function scanExponent(source: Uint8Array, pos: number, upper: number, lower: number): number {
	const marker = source[pos]
	if (marker !== upper && marker !== lower) return pos
	let end = pos + 1
	if (source[end] === Byte.Plus || source[end] === Byte.Minus) end++
	return skipWhile(source, end, isDigit)
}

function scanFraction(source: Uint8Array, pos: number, digits: ByteTest): number {
	if (source[pos] !== Byte.Dot) return pos
	return skipWhile(source, pos + 1, digits)
}

function isHexPrefix(source: Uint8Array, pos: number): boolean {
	const marker = source[pos + 1]
	return source[pos] === Byte.Zero && (marker === 0x78 || marker === 0x58)
}

/**
 * Greedy numeric literal: hex or decimal digits with `'` separators, an
 * optional fraction and exponent, then any letter/underscore suffix.
 */
function scanNumber(source: Uint8Array, pos: number): number {
	let end: number
	if (isHexPrefix(source, pos)) {
		end = skipWhile(source, pos + 2, isHexDigitOrSeparator)
		end = scanFraction(source, end, isHexDigitOrSeparator)
		end = scanExponent(source, end, 0x50, 0x70)
	} else {
		end = skipWhile(source, pos, isDigitOrSeparator)
		end = scanFraction(source, end, isDigitOrSeparator)
		end = scanExponent(source, end, 0x45, 0x65)
	}
	return skipWhile(source, end, (byte) => isLetter(byte) || byte === Byte.Underscore)
}

function isNumberStart(source: Uint8Array, pos: number): boolean {
	const byte = source[pos]
	return isDigit(byte) || (byte === Byte.Dot && isDigit(source[pos + 1]))
}

function classifyWord(
	source: Uint8Array,
	pos: number,
	end: number,
	grammar: LexicalGrammar
): TokenKind {
	let text = ''
	for (let i = pos; i < end; i++) {
		text += String.fromCharCode(source[i] ?? 0)
	}
	return grammar.isKeyword(text) ? TokenKind.Keyword : TokenKind.Identifier
}

// =============================================================================
// DISPATCH
// =============================================================================

function matchComment(source: Uint8Array, pos: number): Match | null {
	if (source[pos] !== Byte.Slash) return null
	const next = source[pos + 1]
	if (next === Byte.Slash) return match(TokenKind.LineComment, scanLineComment(source, pos))
	if (next === Byte.Asterisk) return scanBlockComment(source, pos)
	return null
}

/**
 * Maximal munch with fixed precedence; the first rule that applies wins.
 * Always consumes at least one byte.
 */
function nextMatch(state: LexerState, grammar: LexicalGrammar): Match {
	const { source, pos } = state
	const byte = source[pos]

	if (isLineBreak(byte)) return match(TokenKind.Newline, scanNewline(source, pos))
	if (isBlank(byte)) return match(TokenKind.Whitespace, skipWhile(source, pos, isBlank))
	if (byte === Byte.Hash && state.column === 1) {
		return match(TokenKind.Preprocessor, scanPreprocessor(source, pos))
	}

	const comment = matchComment(source, pos)
	if (comment !== null) return comment

	if (byte === Byte.Quote) return scanQuoted(source, pos, TokenKind.String)
	if (byte === Byte.Apostrophe) return scanQuoted(source, pos, TokenKind.Char)

	if (isIdentStart(byte)) {
		const end = skipWhile(source, pos + 1, isIdentPart)
		return match(classifyWord(source, pos, end, grammar), end)
	}

	if (isNumberStart(source, pos)) return match(TokenKind.Number, scanNumber(source, pos))

	const punctuator = grammar.matchPunctuator(source, pos)
	// Unknown bytes become single-byte punctuators so every byte is covered
	return match(TokenKind.Punctuator, pos + Math.max(punctuator, 1))
}

/**
 * Move the cursor to `end`, counting every physical line break on the way.
 * A CR immediately followed by LF counts once.
 */
function advance(state: LexerState, end: number): void {
	const { source } = state
	for (let i = state.pos; i < end; i++) {
		const byte = source[i]
		const breaksLine =
			byte === Byte.LineFeed ||
			(byte === Byte.CarriageReturn && source[i + 1] !== Byte.LineFeed)
		if (breaksLine) {
			state.line++
			state.column = 1
		} else {
			state.column++
		}
	}
	state.pos = end
}

/**
 * Split the context's source into tokens covering every byte exactly once,
 * handing each token to every listener in source order.
 */
export function tokenize(
	context: LexContext,
	listeners: readonly TokenListener[] = []
): TokenizeResult {
	const state: LexerState = { column: 1, line: 1, pos: 0, source: context.source }
	const unterminated: Token[] = []
	let tokenCount = 0

	while (state.pos < state.source.length) {
		const { kind, end, terminated } = nextMatch(state, context.grammar)
		const token: Token = {
			column: state.column,
			kind,
			length: end - state.pos,
			lexeme: state.source.subarray(state.pos, end),
			line: state.line,
			offset: state.pos,
		}
		tokenCount++
		if (!terminated) unterminated.push(token)
		for (const listener of listeners) {
			listener.onToken(token, context)
		}
		advance(state, end)
	}

	return { tokenCount, unterminated }
}
