/**
 * A run over many files. Each file is lexed with its own metrics and
 * vocabulary shard; shards are folded into the run's aggregates once the
 * file is done, which is the only place shared state is written.
 */

import type { ByteSink } from './core/bytes.ts'
import { LexContext, type TokenListener } from './core/context.ts'
import { C_GRAMMAR, type LexicalGrammar } from './core/grammar.ts'
import { tokenize } from './lex/lexer.ts'
import { Metrics, type StatsSummary } from './metrics/metrics.ts'
import { StreamEncoder } from './stream/codec.ts'
import { Vocabulary } from './vocab/vocabulary.ts'

export interface ProcessOptions {
	/** Receives one stream record per token when set */
	stream?: ByteSink
	/** Count identifier/keyword lexemes (default true) */
	vocabulary?: boolean
}

export interface FileReport {
	readonly filename: string
	readonly tokenCount: number
	readonly bytes: number
	/** Comments and literals cut off by end of input */
	readonly unterminated: number
	readonly metrics: Metrics
}

export class CorpusRun {
	readonly metrics = new Metrics()
	readonly vocabulary = new Vocabulary()
	private readonly grammar: LexicalGrammar
	private fileCount = 0

	constructor(grammar: LexicalGrammar = C_GRAMMAR) {
		this.grammar = grammar
	}

	get files(): number {
		return this.fileCount
	}

	processFile(source: Uint8Array, filename: string, options: ProcessOptions = {}): FileReport {
		const context = new LexContext(source, filename, this.grammar)
		const metrics = new Metrics()
		const listeners: TokenListener[] = [metrics]
		const shard = options.vocabulary === false ? null : new Vocabulary()
		if (shard !== null) listeners.push(shard)
		if (options.stream !== undefined) listeners.push(new StreamEncoder(options.stream))

		const result = tokenize(context, listeners)

		this.metrics.merge(metrics)
		if (shard !== null) this.vocabulary.merge(shard)
		this.fileCount++

		return {
			bytes: source.length,
			filename,
			metrics,
			tokenCount: result.tokenCount,
			unterminated: result.unterminated.length,
		}
	}

	summary(): StatsSummary {
		return this.metrics.toSummary(this.fileCount)
	}

	/** Vocabulary as `<lexeme>\t<count>\n` lines. */
	formatVocabulary(): Uint8Array {
		return this.vocabulary.toTsv()
	}
}
