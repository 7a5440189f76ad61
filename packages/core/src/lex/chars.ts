/**
 * ASCII byte classes used by the lexer. Bytes >= 0x80 belong to none of them.
 */

export const Byte = {
	Apostrophe: 0x27,
	Asterisk: 0x2a,
	Backslash: 0x5c,
	CarriageReturn: 0x0d,
	Dot: 0x2e,
	FormFeed: 0x0c,
	Hash: 0x23,
	LineFeed: 0x0a,
	Minus: 0x2d,
	Plus: 0x2b,
	Quote: 0x22,
	Slash: 0x2f,
	Space: 0x20,
	Tab: 0x09,
	Underscore: 0x5f,
	VerticalTab: 0x0b,
	Zero: 0x30,
} as const

export type ByteTest = (byte: number | undefined) => boolean

export function isLineBreak(byte: number | undefined): boolean {
	return byte === Byte.LineFeed || byte === Byte.CarriageReturn
}

export function isBlank(byte: number | undefined): boolean {
	return (
		byte === Byte.Space || byte === Byte.Tab || byte === Byte.VerticalTab || byte === Byte.FormFeed
	)
}

export function isDigit(byte: number | undefined): boolean {
	return byte !== undefined && byte >= 0x30 && byte <= 0x39
}

export function isHexDigit(byte: number | undefined): boolean {
	if (byte === undefined) return false
	return isDigit(byte) || (byte >= 0x41 && byte <= 0x46) || (byte >= 0x61 && byte <= 0x66)
}

export function isLetter(byte: number | undefined): boolean {
	if (byte === undefined) return false
	return (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a)
}

export function isIdentStart(byte: number | undefined): boolean {
	return isLetter(byte) || byte === Byte.Underscore
}

export function isIdentPart(byte: number | undefined): boolean {
	return isIdentStart(byte) || isDigit(byte)
}

export function isDigitOrSeparator(byte: number | undefined): boolean {
	return isDigit(byte) || byte === Byte.Apostrophe
}

export function isHexDigitOrSeparator(byte: number | undefined): boolean {
	return isHexDigit(byte) || byte === Byte.Apostrophe
}

/**
 * Advance from `pos` while `test` holds; returns the first position where it fails.
 */
export function skipWhile(source: Uint8Array, pos: number, test: ByteTest): number {
	let end = pos
	while (end < source.length && test(source[end])) end++
	return end
}
