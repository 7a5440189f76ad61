import assert from 'node:assert'
import { describe, it } from 'node:test'
import { fromBinaryString, toBinaryString } from '../../src/core/bytes.ts'
import { LexContext, type TokenListener } from '../../src/core/context.ts'
import { type Token, TokenKind } from '../../src/core/tokens.ts'
import { tokenize } from '../../src/lex/lexer.ts'
import { lexText, tokenPairs, tokenPositions } from '../helpers.ts'

describe('lex/lexer', () => {
	describe('basic tokenization', () => {
		it('should produce no tokens for empty input', () => {
			const result = tokenize(new LexContext(new Uint8Array(0)))
			assert.strictEqual(result.tokenCount, 0)
			assert.deepStrictEqual(result.unterminated, [])
		})

		it('should tokenize a declaration', () => {
			assert.deepStrictEqual(tokenPairs(lexText('int x = 1;\n')), [
				['KEYWORD', 'int'],
				['WS', ' '],
				['IDENT', 'x'],
				['WS', ' '],
				['PUNCT', '='],
				['WS', ' '],
				['NUMBER', '1'],
				['PUNCT', ';'],
				['NEWLINE', '\n'],
			])
		})

		it('should report offsets and positions', () => {
			const lexed = lexText('int x = 1;\n')
			const offsets = lexed.tokens.map((token) => token.offset)
			assert.deepStrictEqual(offsets, [0, 3, 4, 5, 6, 7, 8, 9, 10])
			assert.deepStrictEqual(tokenPositions(lexed), [
				[1, 1],
				[1, 4],
				[1, 5],
				[1, 6],
				[1, 7],
				[1, 8],
				[1, 9],
				[1, 10],
				[1, 11],
			])
		})

		it('should return the number of tokens added', () => {
			assert.strictEqual(tokenize(new LexContext(fromBinaryString('a b'))).tokenCount, 3)
		})
	})

	describe('newlines and whitespace', () => {
		it('should treat LF, CRLF and lone CR as newline tokens', () => {
			const lexed = lexText('a\r\nb\rc\n')
			assert.deepStrictEqual(tokenPairs(lexed), [
				['IDENT', 'a'],
				['NEWLINE', '\r\n'],
				['IDENT', 'b'],
				['NEWLINE', '\r'],
				['IDENT', 'c'],
				['NEWLINE', '\n'],
			])
			assert.deepStrictEqual(tokenPositions(lexed), [
				[1, 1],
				[1, 2],
				[2, 1],
				[2, 2],
				[3, 1],
				[3, 2],
			])
		})

		it('should group space, tab, vertical tab and form feed into one run', () => {
			assert.deepStrictEqual(tokenPairs(lexText(' \t\v\f x')), [
				['WS', ' \t\v\f '],
				['IDENT', 'x'],
			])
		})

		it('should keep consecutive newlines as separate tokens', () => {
			assert.deepStrictEqual(tokenPairs(lexText('\n\n')), [
				['NEWLINE', '\n'],
				['NEWLINE', '\n'],
			])
		})
	})

	describe('preprocessor lines', () => {
		it('should consume a directive up to the line break', () => {
			assert.deepStrictEqual(tokenPairs(lexText('#define A 1\nint')), [
				['PREPROC', '#define A 1'],
				['NEWLINE', '\n'],
				['KEYWORD', 'int'],
			])
		})

		it('should follow backslash continuations', () => {
			const lexed = lexText('#define A \\\n  1\nx')
			assert.deepStrictEqual(tokenPairs(lexed), [
				['PREPROC', '#define A \\\n  1'],
				['NEWLINE', '\n'],
				['IDENT', 'x'],
			])
			assert.deepStrictEqual(tokenPositions(lexed), [
				[1, 1],
				[2, 4],
				[3, 1],
			])
		})

		it('should follow continuations ending in CRLF', () => {
			assert.deepStrictEqual(tokenPairs(lexText('#if X \\\r\n&& Y\r\n')), [
				['PREPROC', '#if X \\\r\n&& Y'],
				['NEWLINE', '\r\n'],
			])
		})

		it('should only start at column 1', () => {
			assert.deepStrictEqual(tokenPairs(lexText('  #pragma')), [
				['WS', '  '],
				['PUNCT', '#'],
				['IDENT', 'pragma'],
			])
		})

		it('should run to end of input without a line break', () => {
			assert.deepStrictEqual(tokenPairs(lexText('#endif')), [['PREPROC', '#endif']])
		})
	})

	describe('comments', () => {
		it('should stop a line comment before the newline', () => {
			assert.deepStrictEqual(tokenPairs(lexText('// hi\n')), [
				['LINE_COMMENT', '// hi'],
				['NEWLINE', '\n'],
			])
		})

		it('should stop a line comment before a carriage return', () => {
			assert.deepStrictEqual(tokenPairs(lexText('//x\r\n')), [
				['LINE_COMMENT', '//x'],
				['NEWLINE', '\r\n'],
			])
		})

		it('should include the closing delimiter of a block comment', () => {
			const lexed = lexText('/* a */b')
			const { result } = lexed
			assert.deepStrictEqual(tokenPairs(lexed), [
				['BLOCK_COMMENT', '/* a */'],
				['IDENT', 'b'],
			])
			assert.deepStrictEqual(result.unterminated, [])
		})

		it('should run an unterminated block comment to end of input', () => {
			const lexed = lexText('/* oops')
			const { result } = lexed
			assert.deepStrictEqual(tokenPairs(lexed), [['BLOCK_COMMENT', '/* oops']])
			assert.deepStrictEqual(result.unterminated.map((token) => token.offset), [0])
		})

		it('should not close a block comment on its own opening slash', () => {
			const lexed = lexText('/*/')
			const { result } = lexed
			assert.deepStrictEqual(tokenPairs(lexed), [['BLOCK_COMMENT', '/*/']])
			assert.strictEqual(result.unterminated.length, 1)
		})

		it('should track lines inside block comments', () => {
			const lexed = lexText('/*\n*/x')
			assert.deepStrictEqual(tokenPositions(lexed), [
				[1, 1],
				[2, 3],
			])
		})
	})

	describe('string and char literals', () => {
		it('should not end a string at an escaped quote', () => {
			assert.deepStrictEqual(tokenPairs(lexText('"a\\"b" c')), [
				['STRING', '"a\\"b"'],
				['WS', ' '],
				['IDENT', 'c'],
			])
		})

		it('should run an unterminated string to end of input', () => {
			const lexed = lexText('"abc\\')
			const { result } = lexed
			assert.deepStrictEqual(tokenPairs(lexed), [['STRING', '"abc\\']])
			assert.deepStrictEqual(
				result.unterminated.map((token) => toBinaryString(token.lexeme)),
				['"abc\\']
			)
		})

		it('should lex escaped char literals', () => {
			assert.deepStrictEqual(tokenPairs(lexText("'\\'';")), [
				['CHAR', "'\\''"],
				['PUNCT', ';'],
			])
		})

		it('should carry a string across a raw line break', () => {
			const lexed = lexText('"a\nb" x')
			assert.deepStrictEqual(tokenPairs(lexed), [
				['STRING', '"a\nb"'],
				['WS', ' '],
				['IDENT', 'x'],
			])
			assert.deepStrictEqual(tokenPositions(lexed)[2], [2, 4])
		})
	})

	describe('identifiers and keywords', () => {
		it('should classify reserved words case-sensitively', () => {
			assert.deepStrictEqual(tokenPairs(lexText('int integer _Bool INT')), [
				['KEYWORD', 'int'],
				['WS', ' '],
				['IDENT', 'integer'],
				['WS', ' '],
				['KEYWORD', '_Bool'],
				['WS', ' '],
				['IDENT', 'INT'],
			])
		})

		it('should include digits and underscores after the first byte', () => {
			assert.deepStrictEqual(tokenPairs(lexText('_a1_b2')), [['IDENT', '_a1_b2']])
		})
	})

	describe('numbers', () => {
		const cases: Array<[string, string[]]> = [
			['0x1Fu', ['0x1Fu']],
			["1'000'000", ["1'000'000"]],
			['3.14e-10f', ['3.14e-10f']],
			['.5', ['.5']],
			['0x1.8p3', ['0x1.8p3']],
			['0xffULL', ['0xffULL']],
			['123abc', ['123abc']],
			['1.2.3', ['1.2', '.3']],
			['1e+', ['1e+']],
		]

		for (const [input, lexemes] of cases) {
			it(`should lex ${input}`, () => {
				assert.deepStrictEqual(
					tokenPairs(lexText(input)),
					lexemes.map((lexeme) => ['NUMBER', lexeme])
				)
			})
		}

		it('should stop a hex literal before a sign', () => {
			assert.deepStrictEqual(tokenPairs(lexText('0x1e+2')), [
				['NUMBER', '0x1e'],
				['PUNCT', '+'],
				['NUMBER', '2'],
			])
		})
	})

	describe('punctuators', () => {
		it('should prefer three-byte operators', () => {
			assert.deepStrictEqual(tokenPairs(lexText('a<<=b')), [
				['IDENT', 'a'],
				['PUNCT', '<<='],
				['IDENT', 'b'],
			])
		})

		it('should match member pointer operators', () => {
			assert.deepStrictEqual(tokenPairs(lexText('p->*q.*r->s')), [
				['IDENT', 'p'],
				['PUNCT', '->*'],
				['IDENT', 'q'],
				['PUNCT', '.*'],
				['IDENT', 'r'],
				['PUNCT', '->'],
				['IDENT', 's'],
			])
		})

		it('should lex an ellipsis before single dots', () => {
			assert.deepStrictEqual(tokenPairs(lexText('f(...)')), [
				['IDENT', 'f'],
				['PUNCT', '('],
				['PUNCT', '...'],
				['PUNCT', ')'],
			])
		})

		it('should split runs greedily', () => {
			assert.deepStrictEqual(tokenPairs(lexText('+++')), [
				['PUNCT', '++'],
				['PUNCT', '+'],
			])
		})

		it('should lex token pasting away from column 1', () => {
			assert.deepStrictEqual(tokenPairs(lexText('a##b')), [
				['IDENT', 'a'],
				['PUNCT', '##'],
				['IDENT', 'b'],
			])
		})
	})

	describe('fallback', () => {
		it('should emit unknown ASCII bytes as single punctuators', () => {
			assert.deepStrictEqual(tokenPairs(lexText('a$b@`\\')), [
				['IDENT', 'a'],
				['PUNCT', '$'],
				['IDENT', 'b'],
				['PUNCT', '@'],
				['PUNCT', '`'],
				['PUNCT', '\\'],
			])
		})

		it('should emit each non-ASCII byte and NUL on its own', () => {
			const lexed = lexText(new Uint8Array([0xc3, 0xa9, 0x00]))
			const tokens = lexed.tokens
			assert.deepStrictEqual(
				tokens.map((token) => [token.kind, token.length, token.offset]),
				[
					[TokenKind.Punctuator, 1, 0],
					[TokenKind.Punctuator, 1, 1],
					[TokenKind.Punctuator, 1, 2],
				]
			)
		})
	})

	describe('listeners', () => {
		it('should notify every listener once per token in order', () => {
			const seen: string[] = []
			const first: TokenListener = {
				onToken: (token: Token) => {
					seen.push(`first:${token.offset}`)
				},
			}
			const second: TokenListener = {
				onToken: (token: Token, context) => {
					seen.push(`second:${token.offset}:${context.filename}`)
				},
			}
			tokenize(new LexContext(fromBinaryString('a b'), 'x.c'), [first, second])
			assert.deepStrictEqual(seen, [
				'first:0',
				'second:0:x.c',
				'first:1',
				'second:1:x.c',
				'first:2',
				'second:2:x.c',
			])
		})
	})
})
