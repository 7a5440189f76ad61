/**
 * Content-keyed counting map.
 * Keys are hashed into buckets; entries sharing a bucket are told apart with
 * the key codec's equality, so colliding keys never merge.
 */

import { bytesEqual } from '../core/bytes.ts'

/**
 * How a key type is hashed, compared and stored.
 */
export interface KeyCodec<K> {
	hash(key: K): number
	equals(a: K, b: K): boolean
	/** Called once when a key is first inserted; the map keeps the returned value. */
	retain(key: K): K
}

export interface CountEntry<K> {
	readonly key: K
	readonly count: number
}

interface MutableEntry<K> {
	readonly key: K
	count: number
}

const FNV_OFFSET_BASIS = 0x811c9dc5
const FNV_PRIME = 0x01000193

/** 32-bit FNV-1a. */
export function fnv1a(bytes: Uint8Array): number {
	let hash = FNV_OFFSET_BASIS
	for (const byte of bytes) {
		hash ^= byte
		hash = Math.imul(hash, FNV_PRIME) >>> 0
	}
	return hash
}

/**
 * Byte-sequence keys compared by exact content. Retained keys are copied so
 * views into a source buffer don't pin or alias it.
 */
export const BYTE_KEYS: KeyCodec<Uint8Array> = {
	equals: bytesEqual,
	hash: fnv1a,
	retain: (key) => key.slice(),
}

export class CountingMap<K> {
	private readonly codec: KeyCodec<K>
	private readonly buckets = new Map<number, MutableEntry<K>[]>()
	private entryCount = 0

	constructor(codec: KeyCodec<K>) {
		this.codec = codec
	}

	private find(bucket: readonly MutableEntry<K>[], key: K): MutableEntry<K> | undefined {
		return bucket.find((entry) => this.codec.equals(entry.key, key))
	}

	/**
	 * Add `by` to the count for `key`, creating the entry on first sighting.
	 * Returns the new count.
	 */
	increment(key: K, by = 1): number {
		const hash = this.codec.hash(key)
		let bucket = this.buckets.get(hash)
		if (bucket === undefined) {
			bucket = []
			this.buckets.set(hash, bucket)
		}
		const existing = this.find(bucket, key)
		if (existing !== undefined) {
			existing.count += by
			return existing.count
		}
		bucket.push({ count: by, key: this.codec.retain(key) })
		this.entryCount++
		return by
	}

	get(key: K): number {
		const bucket = this.buckets.get(this.codec.hash(key))
		if (bucket === undefined) return 0
		return this.find(bucket, key)?.count ?? 0
	}

	has(key: K): boolean {
		return this.get(key) > 0
	}

	get size(): number {
		return this.entryCount
	}

	/** Entries in no particular order. */
	*entries(): Generator<CountEntry<K>> {
		for (const bucket of this.buckets.values()) {
			yield* bucket
		}
	}

	merge(other: CountingMap<K>): void {
		for (const entry of other.entries()) {
			this.increment(entry.key, entry.count)
		}
	}
}
