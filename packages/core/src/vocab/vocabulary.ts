import { concatBytes, fromBinaryString, toBinaryString } from '../core/bytes.ts'
import type { TokenListener } from '../core/context.ts'
import { isWordKind, type Token } from '../core/tokens.ts'
import { BYTE_KEYS, CountingMap } from './counting-map.ts'

export interface VocabularyEntry {
	/** Lexeme as a binary string (one char per byte) */
	readonly text: string
	readonly bytes: Uint8Array
	readonly count: number
}

/**
 * Occurrence counts of identifier and keyword lexemes, keyed by exact bytes.
 */
export class Vocabulary implements TokenListener {
	private readonly words = new CountingMap(BYTE_KEYS)

	onToken(token: Token): void {
		if (isWordKind(token.kind)) this.words.increment(token.lexeme)
	}

	add(word: Uint8Array | string, by = 1): number {
		return this.words.increment(typeof word === 'string' ? fromBinaryString(word) : word, by)
	}

	count(word: Uint8Array | string): number {
		return this.words.get(typeof word === 'string' ? fromBinaryString(word) : word)
	}

	get size(): number {
		return this.words.size
	}

	*entries(): Generator<VocabularyEntry> {
		for (const { key, count } of this.words.entries()) {
			yield { bytes: key, count, text: toBinaryString(key) }
		}
	}

	/** Fold another vocabulary (typically one file's shard) into this one. */
	merge(other: Vocabulary): void {
		this.words.merge(other.words)
	}

	/**
	 * `<lexeme>\t<count>\n` per entry, in enumeration order.
	 */
	toTsv(): Uint8Array {
		const chunks: Uint8Array[] = []
		for (const { key, count } of this.words.entries()) {
			chunks.push(key, fromBinaryString(`\t${count}\n`))
		}
		return concatBytes(chunks)
	}
}
