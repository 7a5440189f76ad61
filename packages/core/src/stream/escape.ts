/**
 * Byte-wise string escaping for stream records.
 *
 * `"` and `\` get a backslash, LF/CR/TAB use their short forms, every other
 * control byte and DEL is written as `\u00XX`. All remaining bytes, 0x80-0xFF
 * included, are copied through as they are.
 */

import { utf8Bytes } from '../core/bytes.ts'

const BACKSLASH = 0x5c

function escapeByte(byte: number): string {
	switch (byte) {
		case 0x22:
			return '\\"'
		case BACKSLASH:
			return '\\\\'
		case 0x0a:
			return '\\n'
		case 0x0d:
			return '\\r'
		case 0x09:
			return '\\t'
		default:
			if (byte < 0x20 || byte === 0x7f) {
				return `\\u00${byte.toString(16).toUpperCase().padStart(2, '0')}`
			}
			return String.fromCharCode(byte)
	}
}

const ESCAPED: readonly string[] = Array.from({ length: 256 }, (_, byte) => escapeByte(byte))

/**
 * Escape bytes into a binary string (one char per output byte).
 */
export function escapeBytes(bytes: Uint8Array): string {
	let out = ''
	for (const byte of bytes) {
		out += ESCAPED[byte] ?? ''
	}
	return out
}

const SHORT_ESCAPES: ReadonlyMap<number, number> = new Map([
	[0x22, 0x22], // \"
	[0x2f, 0x2f], // \/
	[BACKSLASH, BACKSLASH],
	[0x62, 0x08], // \b
	[0x66, 0x0c], // \f
	[0x6e, 0x0a], // \n
	[0x72, 0x0d], // \r
	[0x74, 0x09], // \t
])

const HEX4 = /^[0-9A-Fa-f]{4}$/

function readHex4(raw: string, pos: number): number | null {
	const digits = raw.slice(pos, pos + 4)
	return HEX4.test(digits) ? Number.parseInt(digits, 16) : null
}

function isHighSurrogate(code: number): boolean {
	return code >= 0xd800 && code <= 0xdbff
}

function isLowSurrogate(code: number): boolean {
	return code >= 0xdc00 && code <= 0xdfff
}

/**
 * Reverse `escapeBytes`. `raw` is a binary string holding the text between
 * the quotes of a string field.
 *
 * `\u00XX` yields the single byte XX; larger code units are written as UTF-8
 * (surrogate pairs combined). Unknown or malformed escapes are kept verbatim,
 * backslash included.
 */
export function unescapeBytes(raw: string): Uint8Array {
	const out: number[] = []
	let i = 0
	while (i < raw.length) {
		const ch = raw.charCodeAt(i++)
		if (ch !== BACKSLASH) {
			out.push(ch)
			continue
		}
		if (i >= raw.length) {
			out.push(BACKSLASH)
			break
		}
		const escape = raw.charCodeAt(i++)
		const short = SHORT_ESCAPES.get(escape)
		if (short !== undefined) {
			out.push(short)
			continue
		}
		const code = escape === 0x75 ? readHex4(raw, i) : null
		if (code === null) {
			out.push(BACKSLASH, escape)
			continue
		}
		i += 4
		if (code <= 0xff) {
			out.push(code)
			continue
		}
		let codePoint = code
		const low = isHighSurrogate(code) && raw.startsWith('\\u', i) ? readHex4(raw, i + 2) : null
		if (low !== null && isLowSurrogate(low)) {
			codePoint = 0x10000 + ((code - 0xd800) << 10) + (low - 0xdc00)
			i += 6
		}
		out.push(...utf8Bytes(String.fromCodePoint(codePoint)))
	}
	return Uint8Array.from(out)
}
