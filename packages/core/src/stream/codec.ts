/**
 * JSONL token stream: one record per token,
 * `{"file":…,"off":…,"line":…,"col":…,"kind":…,"lexeme":…}`.
 *
 * Records are produced and read as bytes, never through a text decoder, so
 * lexemes holding invalid UTF-8 or NUL survive the trip unchanged.
 */

import {
	type ByteSink,
	concatBytes,
	fromBinaryString,
	toBinaryString,
	utf8Bytes,
	utf8Text,
} from '../core/bytes.ts'
import type { LexContext, TokenListener } from '../core/context.ts'
import { parseTokenKindName, type Token, type TokenKind, tokenKindName } from '../core/tokens.ts'
import { escapeBytes, unescapeBytes } from './escape.ts'

export interface StreamRecord {
	readonly file: string
	readonly lexeme: Uint8Array
	readonly offset?: number
	readonly line?: number
	readonly column?: number
	readonly kind?: TokenKind
}

const LF = 0x0a

function recordPrefix(file: string): string {
	return `{"file":"${escapeBytes(utf8Bytes(file))}",`
}

function recordBody(prefix: string, token: Token): Uint8Array {
	const fields = `"off":${token.offset},"line":${token.line},"col":${token.column},"kind":"${tokenKindName(token.kind)}"`
	return fromBinaryString(`${prefix}${fields},"lexeme":"${escapeBytes(token.lexeme)}"}\n`)
}

/**
 * Serialize one token as a newline-terminated record.
 */
export function encodeRecord(file: string, token: Token): Uint8Array {
	return recordBody(recordPrefix(file), token)
}

/**
 * Token listener writing one record per token to a sink.
 */
export class StreamEncoder implements TokenListener {
	private readonly sink: ByteSink
	private prefixFile: string | null = null
	private prefix = ''

	constructor(sink: ByteSink) {
		this.sink = sink
	}

	onToken(token: Token, context: LexContext): void {
		if (this.prefixFile !== context.filename) {
			this.prefixFile = context.filename
			this.prefix = recordPrefix(context.filename)
		}
		this.sink.write(recordBody(this.prefix, token))
	}
}

/**
 * Lines of a stream buffer, split on LF. A final line without LF is
 * included; an empty final segment is not.
 */
export function* splitLines(data: Uint8Array): Generator<Uint8Array> {
	let start = 0
	while (start < data.length) {
		const end = data.indexOf(LF, start)
		if (end < 0) {
			yield data.subarray(start)
			return
		}
		yield data.subarray(start, end)
		start = end + 1
	}
}

/**
 * Raw (still escaped) content of the string field `key`, read up to the
 * first unescaped quote or the end of the line.
 */
function readStringField(line: string, key: string): string | null {
	const marker = `"${key}":"`
	const at = line.indexOf(marker)
	if (at < 0) return null
	const start = at + marker.length
	let end = start
	while (end < line.length) {
		const ch = line[end]
		if (ch === '"') break
		end += ch === '\\' ? 2 : 1
	}
	return line.slice(start, Math.min(end, line.length))
}

function readNumberField(line: string, key: string): number | undefined {
	const found = new RegExp(`"${key}":(\\d+)`).exec(line)
	return found?.[1] !== undefined ? Number(found[1]) : undefined
}

function readKindField(line: string): TokenKind | undefined {
	const found = /"kind":"([A-Z_]+)"/.exec(line)
	return found?.[1] !== undefined ? parseTokenKindName(found[1]) : undefined
}

/**
 * Parse one record line. Returns null when the line has no `file` or no
 * `lexeme` field; such lines carry no content and are skipped by readers.
 */
export function decodeRecord(line: Uint8Array): StreamRecord | null {
	const text = toBinaryString(line)
	const file = readStringField(text, 'file')
	const lexeme = readStringField(text, 'lexeme')
	if (file === null || lexeme === null) return null
	return {
		column: readNumberField(text, 'col'),
		file: utf8Text(unescapeBytes(file)),
		kind: readKindField(text),
		lexeme: unescapeBytes(lexeme),
		line: readNumberField(text, 'line'),
		offset: readNumberField(text, 'off'),
	}
}

/**
 * Decode every record of a stream buffer, in order.
 */
export function* readRecords(data: Uint8Array): Generator<StreamRecord> {
	for (const line of splitLines(data)) {
		const record = decodeRecord(line)
		if (record !== null) yield record
	}
}

/**
 * Concatenate lexemes per file in record order, entirely in memory.
 */
export function collectFiles(records: Iterable<StreamRecord>): Map<string, Uint8Array> {
	const parts = new Map<string, Uint8Array[]>()
	for (const record of records) {
		const chunks = parts.get(record.file)
		if (chunks === undefined) {
			parts.set(record.file, [record.lexeme])
		} else {
			chunks.push(record.lexeme)
		}
	}
	const files = new Map<string, Uint8Array>()
	for (const [file, chunks] of parts) {
		files.set(file, concatBytes(chunks))
	}
	return files
}
