/**
 * Token counts and byte totals. One instance per file, folded into a
 * run-wide aggregate with `merge`.
 */

import type { TokenListener } from '../core/context.ts'
import {
	isCommentKind,
	isWhitespaceKind,
	TOKEN_KIND_NAMES,
	TOKEN_KINDS,
	type Token,
	TokenKind,
} from '../core/tokens.ts'

/**
 * Stats summary record. Key order is the order written on the wire.
 */
export interface StatsSummary {
	files: number
	tokens: number
	bytes: number
	lines: number
	bytes_comments: number
	bytes_whitespace: number
	kinds: Record<string, number>
}

export class Metrics implements TokenListener {
	private readonly counts: number[] = TOKEN_KINDS.map(() => 0)
	private tokens = 0
	private bytes = 0
	private commentBytes = 0
	private whitespaceBytes = 0
	private newlines = 0

	record(kind: TokenKind, length: number): void {
		this.counts[kind] = this.count(kind) + 1
		this.tokens++
		this.bytes += length
		if (isCommentKind(kind)) this.commentBytes += length
		if (isWhitespaceKind(kind)) this.whitespaceBytes += length
		if (kind === TokenKind.Newline) this.newlines++
	}

	onToken(token: Token): void {
		this.record(token.kind, token.length)
	}

	count(kind: TokenKind): number {
		return this.counts[kind] ?? 0
	}

	get tokensTotal(): number {
		return this.tokens
	}

	get bytesTotal(): number {
		return this.bytes
	}

	get bytesInComments(): number {
		return this.commentBytes
	}

	get bytesInWhitespace(): number {
		return this.whitespaceBytes
	}

	get newlineCount(): number {
		return this.newlines
	}

	merge(other: Metrics): void {
		for (const kind of TOKEN_KINDS) {
			this.counts[kind] = this.count(kind) + other.count(kind)
		}
		this.tokens += other.tokens
		this.bytes += other.bytes
		this.commentBytes += other.commentBytes
		this.whitespaceBytes += other.whitespaceBytes
		this.newlines += other.newlines
	}

	toSummary(files: number): StatsSummary {
		const kinds: Record<string, number> = {}
		for (const kind of TOKEN_KINDS) {
			kinds[TOKEN_KIND_NAMES[kind]] = this.count(kind)
		}
		return {
			files,
			tokens: this.tokens,
			bytes: this.bytes,
			lines: this.newlines,
			bytes_comments: this.commentBytes,
			bytes_whitespace: this.whitespaceBytes,
			kinds,
		}
	}
}

/**
 * One JSON line for a summary.
 */
export function formatSummary(summary: StatsSummary): string {
	return `${JSON.stringify(summary)}\n`
}
