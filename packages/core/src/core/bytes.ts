/**
 * Byte helpers. Source text is handled as length-delimited bytes end to end;
 * "binary strings" map each byte to the char code of the same value (latin1),
 * which converts both ways without loss.
 */

import { Buffer } from 'node:buffer'

export function toBinaryString(bytes: Uint8Array): string {
	return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1')
}

export function fromBinaryString(text: string): Uint8Array {
	return new Uint8Array(Buffer.from(text, 'latin1'))
}

export function utf8Bytes(text: string): Uint8Array {
	return new Uint8Array(Buffer.from(text, 'utf8'))
}

export function utf8Text(bytes: Uint8Array): string {
	return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8')
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false
	}
	return true
}

export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
	let total = 0
	for (const chunk of chunks) total += chunk.length
	const out = new Uint8Array(total)
	let pos = 0
	for (const chunk of chunks) {
		out.set(chunk, pos)
		pos += chunk.length
	}
	return out
}

/**
 * Sink that accepts byte chunks in order.
 */
export interface ByteSink {
	write(chunk: Uint8Array): void
}

/**
 * In-memory sink; `take()` returns everything written so far and resets it.
 */
export class ChunkSink implements ByteSink {
	private chunks: Uint8Array[] = []
	private byteCount = 0

	write(chunk: Uint8Array): void {
		this.chunks.push(chunk)
		this.byteCount += chunk.length
	}

	get size(): number {
		return this.byteCount
	}

	take(): Uint8Array {
		const out = concatBytes(this.chunks)
		this.chunks = []
		this.byteCount = 0
		return out
	}
}
